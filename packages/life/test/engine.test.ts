import { describe, it, expect, afterEach } from "vitest";
import {
	EngineStoppedError,
	InvalidDimensionsError,
	ProtocolViolationError,
	StaleBoardError,
	StepTimeoutError,
	ToroidError,
} from "@toroid/core";
import type { LogEntry } from "@toroid/core";
import { LifeEngine } from "../src/engine.js";
import type { LifeEngineOptions } from "../src/engine.js";
import { layoutFromPoints } from "../src/pattern.js";
import { seededCoin } from "../src/random.js";
import { sequentialStep } from "../src/reference.js";
import { aliveOffsets, recordingLogger } from "./helpers.js";

describe("LifeEngine", () => {
	const engines: LifeEngine[] = [];

	function makeEngine(entries: LogEntry[] = [], options: LifeEngineOptions = {}): LifeEngine {
		const engine = new LifeEngine({ stepTimeoutMs: 2_000, logger: recordingLogger(entries), ...options });
		engines.push(engine);
		return engine;
	}

	afterEach(() => {
		for (const engine of engines.splice(0)) engine.shutdown();
	});

	// ═══════════════════════════════════════════════════════════════════════
	// CONSTRUCTION
	// ═══════════════════════════════════════════════════════════════════════

	describe("generate", () => {
		it("builds width * height cells at generation 0", async () => {
			const engine = makeEngine();
			const board = engine.generate(4, 3, () => true);
			expect(board.width).toBe(4);
			expect(board.height).toBe(3);
			expect(board.generation).toBe(0);
			expect(board.cells).toHaveLength(12);
			expect(await engine.snapshot(board)).toEqual(new Array<boolean>(12).fill(true));
		});

		it("seeds each cell from the random source in offset order", async () => {
			const engine = makeEngine();
			const values = [true, false, false, true];
			let i = 0;
			const board = engine.generate(2, 2, () => values[i++]);
			expect(await engine.snapshot(board)).toEqual(values);
		});

		it.each([[0, 3], [3, 0], [-2, 4], [2.5, 2]])("rejects %s x %s", (width, height) => {
			const engine = makeEngine();
			expect(() => engine.generate(width, height)).toThrow(InvalidDimensionsError);
		});

		it("holds a single board", () => {
			const engine = makeEngine();
			engine.generate(2, 2);
			expect(() => engine.generate(2, 2)).toThrow(ToroidError);
			expect(() => engine.fromLayout(["*"])).toThrow("This engine already holds a board");
		});

		it("builds boards from pattern text", async () => {
			const engine = makeEngine();
			const board = engine.fromPattern("! glider\n.O.\n..O\nOOO\n");
			expect(await engine.render(board)).toEqual(["_*_", "__*", "***"]);
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// STEPPING
	// ═══════════════════════════════════════════════════════════════════════

	describe("step", () => {
		it("rotates a blinker and returns it after two steps", async () => {
			const engine = makeEngine();
			const board0 = engine.fromCells(layoutFromPoints(5, 5, [{ x: 1, y: 2 }, { x: 2, y: 2 }, { x: 3, y: 2 }]));
			expect(aliveOffsets(await engine.snapshot(board0))).toEqual([11, 12, 13]);

			const board1 = await engine.step(board0);
			expect(aliveOffsets(await engine.snapshot(board1))).toEqual([7, 12, 17]);

			const board2 = await engine.step(board1);
			expect(aliveOffsets(await engine.snapshot(board2))).toEqual([11, 12, 13]);
		});

		it("leaves a block unchanged on 4x4", async () => {
			const engine = makeEngine();
			const board = engine.fromLayout(["____", "_**_", "_**_", "____"]);
			const next = await engine.step(board);
			expect(await engine.render(next)).toEqual(["____", "_**_", "_**_", "____"]);
		});

		it("matches the sequential reference on 20 random 4x4 boards", async () => {
			for (let seed = 1; seed <= 20; seed++) {
				const engine = makeEngine();
				const board = engine.generate(4, 4, seededCoin(seed));
				const initial = await engine.snapshot(board);

				const next = await engine.step(board);
				expect(await engine.snapshot(next)).toEqual(sequentialStep(initial, 4, 4));
			}
		});

		it("matches the reference over several generations on a non-square board", async () => {
			const engine = makeEngine();
			let board = engine.generate(6, 5, seededCoin(99));
			let expected = await engine.snapshot(board);
			for (let i = 0; i < 5; i++) {
				board = await engine.step(board);
				expected = sequentialStep(expected, 6, 5);
				expect(await engine.snapshot(board)).toEqual(expected);
			}
		});

		it("steps boards with more cells than the mailbox capacity", async () => {
			const entries: LogEntry[] = [];
			const engine = makeEngine(entries, { maxMailboxSize: 4 });
			let board = engine.generate(5, 4, seededCoin(11));
			let expected = await engine.snapshot(board);
			for (let i = 0; i < 3; i++) {
				board = await engine.step(board);
				expected = sequentialStep(expected, 5, 4);
				expect(await engine.snapshot(board)).toEqual(expected);
			}
			expect(entries.filter((e) => e.message === "Recoverable actor fault")).toEqual([]);
		});

		it("increments the generation by exactly one per step", async () => {
			const engine = makeEngine();
			let board = engine.generate(3, 3, () => false);
			for (let expected = 1; expected <= 3; expected++) {
				board = await engine.step(board);
				expect(board.generation).toBe(expected);
			}
			expect(engine.board?.generation).toBe(3);
			expect((await engine.inspect(board, 0)).generation).toBe(3);
		});

		it("returns a new board with the same cells", async () => {
			const engine = makeEngine();
			const board = engine.generate(2, 2);
			const next = await engine.step(board);
			expect(next).not.toBe(board);
			expect(next.cells).toBe(board.cells);
			expect(board.generation).toBe(0);
			expect(Object.isFrozen(next)).toBe(true);
		});

		it("records the generation in which a cell last changed", async () => {
			const engine = makeEngine();
			const board0 = engine.fromCells(layoutFromPoints(5, 5, [{ x: 1, y: 2 }, { x: 2, y: 2 }, { x: 3, y: 2 }]));
			const board1 = await engine.step(board0);

			expect(await engine.inspect(board1, 12)).toEqual({ generation: 1, lastUpdate: 0, alive: true });
			expect(await engine.inspect(board1, 7)).toEqual({ generation: 1, lastUpdate: 1, alive: true });
			expect(await engine.inspect(board1, 11)).toEqual({ generation: 1, lastUpdate: 1, alive: false });
		});

		it("works on 1x1 and 2x1 boards", async () => {
			const single = makeEngine();
			const one = single.generate(1, 1, () => true);
			// Eight self-neighbors: overcrowded.
			expect(await single.snapshot(await single.step(one))).toEqual([false]);

			const pair = makeEngine();
			const two = pair.generate(2, 1, () => true);
			expect(await pair.snapshot(await pair.step(two))).toEqual(sequentialStep([true, true], 2, 1));
		});

		it("serializes concurrent steps", async () => {
			const engine = makeEngine();
			const board = engine.generate(3, 3, seededCoin(5));
			const first = engine.step(board);
			const second = engine.step(board);

			await expect(first).resolves.toMatchObject({ generation: 1 });
			await expect(second).rejects.toBeInstanceOf(StaleBoardError);
		});

		it("rejects a board from an earlier generation", async () => {
			const engine = makeEngine();
			const board0 = engine.generate(2, 2);
			await engine.step(board0);
			await expect(engine.step(board0)).rejects.toThrow(
				"Board is at generation 0 but the engine is at generation 1",
			);
		});

		it("rejects a board from another engine", async () => {
			const a = makeEngine();
			const b = makeEngine();
			b.generate(2, 2);
			const foreign = a.generate(2, 2);
			await expect(b.step(foreign)).rejects.toMatchObject({ code: "FOREIGN_BOARD" });
		});

		it("does not leave counters or aggregators behind", async () => {
			const engine = makeEngine();
			const board = engine.generate(3, 3, seededCoin(3));
			await engine.step(board);
			expect(engine.actorSystem.actorCount).toBe(9);
			expect(engine.actorSystem.pendingAsks).toBe(0);
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// FAILURES
	// ═══════════════════════════════════════════════════════════════════════

	describe("failures", () => {
		it("times out when a cell stops answering, without advancing", async () => {
			const entries: LogEntry[] = [];
			const engine = makeEngine(entries, { stepTimeoutMs: 50 });
			const board = engine.generate(3, 3, () => false);
			engine.actorSystem.stop(board.cells[4].actorId);

			const err = await engine.step(board).catch((e: unknown) => e);
			expect(err).toBeInstanceOf(StepTimeoutError);
			if (!(err instanceof StepTimeoutError)) return;
			// Only the counter for cell 4 reaches all of its neighbors.
			expect(err.expected).toBe(9);
			expect(err.received).toBe(1);
			expect(err.generation).toBe(0);

			expect(engine.board?.generation).toBe(0);
			expect(engine.isStopped).toBe(false);
			expect(entries.some((e) => e.message === "Step timed out" && e.levelName === "WARN")).toBe(true);
		});

		it("lets the caller retry after a timeout", async () => {
			const engine = makeEngine([], { stepTimeoutMs: 50 });
			const board = engine.generate(3, 3, () => false);
			engine.actorSystem.stop(board.cells[0].actorId);

			await expect(engine.step(board)).rejects.toBeInstanceOf(StepTimeoutError);
			await expect(engine.step(board)).rejects.toBeInstanceOf(StepTimeoutError);
			expect(engine.board?.generation).toBe(0);
		});

		it("treats a protocol violation as fatal", async () => {
			const entries: LogEntry[] = [];
			const engine = makeEngine(entries);
			const board = engine.generate(3, 3, () => false);

			engine.actorSystem.tell("intruder", board.cells[2].actorId, { kind: "explode" });
			await expect(engine.step(board)).rejects.toBeInstanceOf(ProtocolViolationError);

			expect(engine.isStopped).toBe(true);
			expect(engine.fatalError).toBeInstanceOf(ProtocolViolationError);
			await expect(engine.render(board)).rejects.toBe(engine.fatalError);

			const fatal = entries.filter((e) => e.levelName === "FATAL");
			expect(fatal).toHaveLength(1);
			expect(fatal[0].actorId).toBe("cell-2");
			expect(fatal[0].error?.code).toBe("PROTOCOL_VIOLATION");
		});

		it("rejects every call after shutdown", async () => {
			const engine = makeEngine();
			const board = engine.generate(2, 2);
			engine.shutdown();
			engine.shutdown();

			expect(engine.isStopped).toBe(true);
			await expect(engine.step(board)).rejects.toBeInstanceOf(EngineStoppedError);
			await expect(engine.snapshot(board)).rejects.toBeInstanceOf(EngineStoppedError);
		});

		it("rejects offsets outside the board", async () => {
			const engine = makeEngine();
			const board = engine.generate(2, 2);
			await expect(engine.inspect(board, 4)).rejects.toThrow("Offset 4 is outside 0..3");
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// RENDERING
	// ═══════════════════════════════════════════════════════════════════════

	describe("render", () => {
		it("renders height rows of width characters", async () => {
			const engine = makeEngine();
			const board = engine.fromCells(layoutFromPoints(5, 5, [{ x: 1, y: 2 }, { x: 2, y: 2 }, { x: 3, y: 2 }]));
			expect(await engine.render(board)).toEqual(["_____", "_____", "_***_", "_____", "_____"]);
		});

		it("appends the generation line to a frame", async () => {
			const engine = makeEngine();
			const board = engine.fromLayout(["*_", "_*"]);
			const next = await engine.step(board);
			expect(await engine.renderFrame(next)).toBe("__\n__\ngeneration 1");
		});
	});
});
