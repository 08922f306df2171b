/**
 * Step aggregator: the per-step barrier.
 *
 * Collects exactly one neighbor count per cell for the current step
 * attempt. Only once every count is in does it send the
 * generation-tagged updates, so no cell can observe generation N+1
 * while any neighbor is still being counted from generation N.
 */

import { EngineStoppedError, StepTimeoutError } from "@toroid/core";
import type { Logger } from "@toroid/core";
import type { ActorBehavior, ActorContext, ActorSystem } from "@toroid/mesh";
import type { Board } from "./board.js";
import { spawnNeighborCounter, counterId } from "./neighbor-counter.js";
import { isAggregatorMessage } from "./protocol.js";
import type { AggregatorMessage, CellHandle, NeighborCountReport } from "./protocol.js";

export class StepAggregator {
	private readonly counts = new Map<CellHandle, number>();
	private readonly board: Board;
	private readonly step: number;
	private readonly log: Logger;
	private readonly onComplete: () => void;
	private done = false;

	constructor(board: Board, step: number, log: Logger, onComplete: () => void) {
		this.board = board;
		this.step = step;
		this.log = log;
		this.onComplete = onComplete;
	}

	get expected(): number {
		return this.board.cells.length;
	}

	get received(): number {
		return this.counts.size;
	}

	get isComplete(): boolean {
		return this.done;
	}

	readonly behavior: ActorBehavior<AggregatorMessage> = (report, ctx) => {
		this.record(report, ctx);
	};

	private record(report: NeighborCountReport, ctx: ActorContext): void {
		if (this.done) return;
		if (report.step !== this.step) {
			this.log.warn("Dropping neighbor count from another step", {
				actorId: ctx.self,
				offset: report.offset,
				reportStep: report.step,
				step: this.step,
			});
			return;
		}
		if (this.counts.has(report.cell)) {
			this.log.warn("Dropping duplicate neighbor count", { actorId: ctx.self, offset: report.offset });
			return;
		}

		this.counts.set(report.cell, report.count);
		if (this.counts.size === this.expected) {
			this.commit(ctx);
		}
	}

	private commit(ctx: ActorContext): void {
		this.done = true;
		const generation = this.board.generation + 1;
		for (const [cell, count] of this.counts) {
			ctx.tell(cell, { kind: "apply-neighbor-count", generation, count });
		}
		this.counts.clear();
		this.log.debug("Barrier released", { actorId: ctx.self, generation });
		ctx.stop();
		this.onComplete();
	}
}

export interface RunStepOptions {
	/** Unique number of this step attempt; names its actors. */
	step: number;
	stepTimeoutMs: number;
	askTimeoutMs: number;
	/** Configured mailbox capacity; the aggregator always holds at least one report per cell. */
	mailboxSize?: number;
	log: Logger;
	/** Aborting rejects the step with the abort reason. */
	signal?: AbortSignal;
}

export function aggregatorId(step: number): string {
	return `aggregator-${step}`;
}

/**
 * Run one generation step for `board`: spawn the aggregator and one
 * neighbor counter per cell, and resolve once every cell has been sent
 * its update.
 *
 * @throws StepTimeoutError when the counts do not all arrive within
 *   `stepTimeoutMs`. No cell is updated in that case.
 */
export function runStep(system: ActorSystem, board: Board, options: RunStepOptions): Promise<void> {
	const { step, stepTimeoutMs, askTimeoutMs, mailboxSize, log, signal } = options;
	const total = board.cells.length;

	return new Promise<void>((resolve, reject) => {
		if (signal?.aborted) {
			reject(abortReason(signal));
			return;
		}

		let timer: ReturnType<typeof setTimeout> | undefined;
		const cleanup = (): void => {
			if (timer !== undefined) clearTimeout(timer);
			signal?.removeEventListener("abort", onAbort);
			system.stop(aggregatorId(step));
			for (let offset = 0; offset < total; offset++) {
				system.stop(counterId(step, offset));
			}
		};
		const onAbort = (): void => {
			cleanup();
			reject(signal ? abortReason(signal) : new EngineStoppedError());
		};

		const aggregator = new StepAggregator(board, step, log, () => {
			cleanup();
			resolve();
		});

		try {
			const aggregatorRef = system.spawn<AggregatorMessage>(aggregatorId(step), {
				accepts: isAggregatorMessage,
				behavior: aggregator.behavior,
				mailboxSize: Math.max(total, mailboxSize ?? 0),
			});

			timer = setTimeout(() => {
				if (aggregator.isComplete) return;
				const received = aggregator.received;
				cleanup();
				reject(new StepTimeoutError(board.generation, total, received, stepTimeoutMs));
			}, stepTimeoutMs);
			signal?.addEventListener("abort", onAbort, { once: true });

			for (let offset = 0; offset < total; offset++) {
				const counter = spawnNeighborCounter(
					system,
					{ board, offset, step, aggregator: aggregatorRef, askTimeoutMs },
					log,
				);
				counter.tell(aggregatorRef.actorId, { kind: "start-count" });
			}
		} catch (err) {
			cleanup();
			reject(err);
		}
	});
}

function abortReason(signal: AbortSignal): Error {
	const reason: unknown = signal.reason;
	return reason instanceof Error ? reason : new EngineStoppedError();
}
