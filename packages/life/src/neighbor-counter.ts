/**
 * Neighbor counter: a transient actor that tallies one cell's live
 * neighbors for one step attempt, reports to the aggregator, and stops.
 */

import { ProtocolViolationError } from "@toroid/core";
import type { Logger } from "@toroid/core";
import type { ActorBehavior, ActorRef, ActorSystem } from "@toroid/mesh";
import type { Board } from "./board.js";
import { neighborOffsets } from "./coordinates.js";
import { isCellState, isCounterMessage } from "./protocol.js";
import type { AggregatorMessage, CounterMessage } from "./protocol.js";

export interface CounterTask {
	board: Board;
	offset: number;
	step: number;
	aggregator: ActorRef<AggregatorMessage>;
	askTimeoutMs: number;
}

export function counterId(step: number, offset: number): string {
	return `counter-${step}-${offset}`;
}

export function neighborCounterBehavior(task: CounterTask, log: Logger): ActorBehavior<CounterMessage> {
	const { board, offset, step, aggregator, askTimeoutMs } = task;

	return async (_message, ctx) => {
		const neighbors = neighborOffsets(offset, board.width, board.height);
		const replies = await Promise.all(
			neighbors.map((n) => ctx.ask(board.cells[n], { kind: "query-state" }, { timeout: askTimeoutMs })),
		);

		let count = 0;
		for (const reply of replies) {
			const state = reply.payload;
			if (!isCellState(state)) {
				throw new ProtocolViolationError(ctx.self, state, "expected a cell state reply");
			}
			if (state.generation !== board.generation) {
				throw new ProtocolViolationError(
					ctx.self,
					state,
					`snapshot from generation ${state.generation} during step from generation ${board.generation}`,
				);
			}
			if (state.alive) count++;
		}

		log.debug("Neighbor count ready", { actorId: ctx.self, offset, count });
		ctx.tell(aggregator, {
			kind: "neighbor-count",
			step,
			offset,
			cell: board.cells[offset],
			count,
		});
		ctx.stop();
	};
}

export function spawnNeighborCounter(
	system: ActorSystem,
	task: CounterTask,
	log: Logger,
): ActorRef<CounterMessage> {
	return system.spawn<CounterMessage>(counterId(task.step, task.offset), {
		accepts: isCounterMessage,
		behavior: neighborCounterBehavior(task, log),
		mailboxSize: 1,
	});
}
