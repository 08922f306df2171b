/**
 * LifeEngine: owns one actor system and the board that lives in it.
 *
 * Steps are strictly serialized: a `step` issued while another is in
 * flight waits for it to settle. A protocol violation or rule error
 * anywhere in the mesh is fatal. The engine logs it, aborts the step
 * in flight, shuts the actor system down and rejects every later call
 * with the same error.
 */

import {
	EngineStoppedError,
	ProtocolViolationError,
	RuleError,
	StaleBoardError,
	StepTimeoutError,
	ToroidError,
	createLogger,
} from "@toroid/core";
import type { Logger } from "@toroid/core";
import { ActorSystem } from "@toroid/mesh";
import type { ActorFault, MeshEnvelope } from "@toroid/mesh";
import { runStep } from "./aggregator.js";
import { advance, assertDimensions, createBoard, formatGenerationLine, formatRows } from "./board.js";
import type { Board } from "./board.js";
import { spawnCell } from "./cell-actor.js";
import { layoutFromRows, parsePattern } from "./pattern.js";
import type { Layout } from "./pattern.js";
import { isCellState } from "./protocol.js";
import type { CellState } from "./protocol.js";
import { coinFlip } from "./random.js";
import type { RandomBoolean } from "./random.js";

export interface LifeEngineOptions {
	/** Upper bound on one step. Default 5000. */
	stepTimeoutMs?: number;
	/** Upper bound on one cell state query. Default 2000. */
	askTimeoutMs?: number;
	/** Mailbox capacity per actor. Default 10000. */
	maxMailboxSize?: number;
	logger?: Logger;
}

const ENGINE_ID = "engine";

/** Envelopes one step puts in a cell's mailbox: 8 state queries and 1 update. */
const CELL_STEP_LOAD = 9;

/** Faults that mean the coordination protocol itself is broken. */
export function isFatalFault(error: Error): boolean {
	return error instanceof ProtocolViolationError || error instanceof RuleError;
}

export class LifeEngine {
	private readonly system: ActorSystem;
	private readonly log: Logger;
	private readonly stepTimeoutMs: number;
	private readonly askTimeoutMs: number;
	private readonly maxMailboxSize: number;
	private readonly abort = new AbortController();
	private current?: Board;
	private queue: Promise<unknown> = Promise.resolve();
	private stepSeq = 0;
	private fatal?: Error;
	private stopped = false;

	constructor(options: LifeEngineOptions = {}) {
		this.log = options.logger ?? createLogger("life");
		this.stepTimeoutMs = options.stepTimeoutMs ?? 5_000;
		this.askTimeoutMs = options.askTimeoutMs ?? 2_000;
		this.maxMailboxSize = options.maxMailboxSize ?? 10_000;
		this.system = new ActorSystem({
			maxMailboxSize: this.maxMailboxSize,
			defaultAskTimeout: this.askTimeoutMs,
			logger: this.log.child("mesh"),
		});
		this.system.onFault((fault) => this.handleFault(fault));
	}

	// ─── Construction ──────────────────────────────────────────────

	/**
	 * Spawn `width * height` cells, each seeded from `random`.
	 *
	 * @throws InvalidDimensionsError unless both sides are positive integers.
	 */
	generate(width: number, height: number, random: RandomBoolean = coinFlip): Board {
		assertDimensions(width, height);
		const cells: boolean[] = [];
		for (let i = 0; i < width * height; i++) {
			cells.push(random());
		}
		return this.fromCells({ width, height, cells });
	}

	/** Build a board from rows of `*`/`_` (or `O`/`.`). */
	fromLayout(rows: readonly string[]): Board {
		return this.fromCells(layoutFromRows(rows));
	}

	/** Build a board from pattern text; see {@link parsePattern}. */
	fromPattern(text: string): Board {
		return this.fromCells(parsePattern(text));
	}

	fromCells(layout: Layout): Board {
		this.ensureRunning();
		if (this.current) {
			throw new ToroidError("This engine already holds a board", "BOARD_EXISTS");
		}
		const { width, height, cells } = layout;
		assertDimensions(width, height);

		const cellLog = this.log.child("cell");
		const handles = cells.map((alive, offset) =>
			spawnCell(this.system, offset, alive, cellLog, Math.max(this.maxMailboxSize, CELL_STEP_LOAD)),
		);
		const board = createBoard(width, height, handles);
		this.current = board;
		this.log.info("Board created", { width, height, cells: handles.length, generation: 0 });
		return board;
	}

	// ─── Stepping ──────────────────────────────────────────────────

	/**
	 * Advance the board by one generation.
	 *
	 * @throws StepTimeoutError if the counts did not all arrive in time;
	 *   the board keeps its generation and the step may be retried.
	 * @throws StaleBoardError if `board` is not the engine's latest board.
	 */
	step(board: Board): Promise<Board> {
		const run = this.queue.then(() => this.runSerialized(board));
		// The caller sees the failure through `run`; the chain only orders steps.
		this.queue = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}

	private async runSerialized(board: Board): Promise<Board> {
		this.ensureRunning();
		const current = this.assertOwned(board);
		if (board.generation !== current.generation) {
			throw new StaleBoardError(board.generation, current.generation);
		}

		const step = ++this.stepSeq;
		const started = Date.now();
		this.log.debug("Step started", { generation: board.generation, step });

		try {
			await runStep(this.system, board, {
				step,
				stepTimeoutMs: this.stepTimeoutMs,
				askTimeoutMs: this.askTimeoutMs,
				mailboxSize: this.maxMailboxSize,
				log: this.log.child("step"),
				signal: this.abort.signal,
			});
		} catch (err) {
			if (err instanceof StepTimeoutError) {
				this.log.warn("Step timed out", {
					generation: err.generation,
					expected: err.expected,
					received: err.received,
				});
			}
			throw this.fatal ?? err;
		}
		this.ensureRunning();

		const next = advance(board);
		this.current = next;
		this.log.debug("Step finished", { generation: next.generation, step, duration: Date.now() - started });
		return next;
	}

	// ─── Reading ───────────────────────────────────────────────────

	/** Current state of the cell at `offset`. */
	async inspect(board: Board, offset: number): Promise<CellState> {
		this.ensureRunning();
		this.assertOwned(board);
		const cell = board.cells[offset];
		if (!cell) {
			throw new RangeError(`Offset ${offset} is outside 0..${board.cells.length - 1}`);
		}

		let reply: MeshEnvelope;
		try {
			reply = await this.system.ask(ENGINE_ID, cell, { kind: "query-state" }, this.askTimeoutMs);
		} catch (err) {
			throw this.fatal ?? err;
		}
		if (!isCellState(reply.payload)) {
			throw new ProtocolViolationError(ENGINE_ID, reply.payload, "expected a cell state reply");
		}
		return reply.payload;
	}

	/** Liveness of every cell in offset order. */
	async snapshot(board: Board): Promise<boolean[]> {
		const states = await Promise.all(board.cells.map((_, offset) => this.inspect(board, offset)));
		return states.map((s) => s.alive);
	}

	/** `height` rows of `width` characters, `*` alive and `_` dead. */
	async render(board: Board): Promise<string[]> {
		return formatRows(await this.snapshot(board), board.width);
	}

	/** The rendered rows followed by a `generation <n>` line. */
	async renderFrame(board: Board): Promise<string> {
		const rows = await this.render(board);
		return [...rows, formatGenerationLine(board.generation)].join("\n");
	}

	// ─── Lifecycle ─────────────────────────────────────────────────

	/** Stop every actor and reject pending work. Idempotent. */
	shutdown(): void {
		if (this.stopped) return;
		this.stopped = true;
		if (!this.abort.signal.aborted) {
			this.abort.abort(new EngineStoppedError());
		}
		this.system.shutdown();
		this.log.debug("Engine shut down");
	}

	get isStopped(): boolean {
		return this.stopped;
	}

	/** The fatal fault that stopped the engine, if any. */
	get fatalError(): Error | undefined {
		return this.fatal;
	}

	/** Latest board, or `undefined` before one is built. */
	get board(): Board | undefined {
		return this.current;
	}

	/** The mesh the cells live in. */
	get actorSystem(): ActorSystem {
		return this.system;
	}

	// ─── Internal ──────────────────────────────────────────────────

	private handleFault(fault: ActorFault): void {
		if (!isFatalFault(fault.error)) {
			this.log.warn("Recoverable actor fault", {
				actorId: fault.actorId,
				code: fault.error instanceof ToroidError ? fault.error.code : fault.error.name,
			});
			return;
		}
		if (this.fatal) return;

		this.fatal = fault.error;
		this.log.fatal("Aborting simulation", fault.error, {
			actorId: fault.actorId,
			from: fault.envelope.from,
			generation: this.current?.generation,
		});
		this.abort.abort(fault.error);
		this.shutdown();
	}

	private ensureRunning(): void {
		if (this.fatal) throw this.fatal;
		if (this.stopped) throw new EngineStoppedError();
	}

	private assertOwned(board: Board): Board {
		const current = this.current;
		if (!current || current.cells !== board.cells) {
			throw new ToroidError("Board does not belong to this engine", "FOREIGN_BOARD");
		}
		return current;
	}
}
