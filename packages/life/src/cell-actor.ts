/**
 * Cell actor: the sole owner of one grid position's state.
 *
 * All mutation happens inside the actor's own mailbox loop. A neighbor
 * count is applied only if it is tagged with a generation newer than the
 * one the cell has already committed to, so duplicate or reordered
 * deliveries are harmless.
 */

import { ProtocolViolationError } from "@toroid/core";
import type { Logger } from "@toroid/core";
import type { ActorBehavior, ActorContext, ActorSystem } from "@toroid/mesh";
import { nextAlive } from "./rules.js";
import { isCellMessage } from "./protocol.js";
import type { ApplyNeighborCount, CellHandle, CellMessage, CellState } from "./protocol.js";

export class Cell {
	readonly offset: number;
	private state: CellState;
	private readonly log: Logger;

	constructor(offset: number, alive: boolean, log: Logger) {
		this.offset = offset;
		this.state = { generation: 0, lastUpdate: 0, alive };
		this.log = log;
	}

	/** A copy of the current state. */
	get snapshot(): CellState {
		return { ...this.state };
	}

	readonly behavior: ActorBehavior<CellMessage> = (message, ctx) => {
		switch (message.kind) {
			case "query-state":
				ctx.reply(this.snapshot);
				return;
			case "apply-neighbor-count":
				this.apply(message, ctx);
				return;
			default:
				throw new ProtocolViolationError(ctx.self, unreachable(message));
		}
	};

	/**
	 * @returns `true` if the update was committed, `false` if it was stale.
	 */
	apply(message: ApplyNeighborCount, ctx?: Pick<ActorContext, "self">): boolean {
		const current = this.state;
		if (message.generation <= current.generation) {
			this.log.debug("Ignoring stale neighbor count", {
				actorId: ctx?.self,
				generation: message.generation,
				committed: current.generation,
			});
			return false;
		}

		const alive = nextAlive(current.alive, message.count);
		this.state = {
			generation: message.generation,
			lastUpdate: alive !== current.alive ? message.generation : current.lastUpdate,
			alive,
		};
		return true;
	}
}

function unreachable(message: never): unknown {
	return message;
}

export function cellId(offset: number): string {
	return `cell-${offset}`;
}

/**
 * Spawn the actor for the cell at `offset` and return its handle.
 */
export function spawnCell(
	system: ActorSystem,
	offset: number,
	alive: boolean,
	log: Logger,
	mailboxSize?: number,
): CellHandle {
	const cell = new Cell(offset, alive, log);
	return system.spawn<CellMessage>(cellId(offset), {
		accepts: isCellMessage,
		behavior: cell.behavior,
		mailboxSize,
	});
}
