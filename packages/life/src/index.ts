/**
 * @toroid/life — Conway's Game of Life on a torus, one actor per cell.
 */

// Coordinates & rule
export { MOORE_DELTAS, neighborOffsets, toOffset, toXY, wrap } from "./coordinates.js";
export type { Point } from "./coordinates.js";
export { nextAlive } from "./rules.js";

// Protocol
export {
	isAggregatorMessage,
	isCellMessage,
	isCellState,
	isCounterMessage,
} from "./protocol.js";
export type {
	AggregatorMessage,
	ApplyNeighborCount,
	CellHandle,
	CellMessage,
	CellState,
	CounterMessage,
	NeighborCountReport,
	QueryState,
	StartCount,
} from "./protocol.js";

// Actors
export { Cell, cellId, spawnCell } from "./cell-actor.js";
export { counterId, neighborCounterBehavior, spawnNeighborCounter } from "./neighbor-counter.js";
export type { CounterTask } from "./neighbor-counter.js";
export { StepAggregator, aggregatorId, runStep } from "./aggregator.js";
export type { RunStepOptions } from "./aggregator.js";

// Board & engine
export {
	ALIVE_CHAR,
	DEAD_CHAR,
	advance,
	assertDimensions,
	cellAt,
	createBoard,
	formatGenerationLine,
	formatRows,
} from "./board.js";
export type { Board } from "./board.js";
export { LifeEngine, isFatalFault } from "./engine.js";
export type { LifeEngineOptions } from "./engine.js";

// Seeding, layouts, reference
export { Xorshift32, coinFlip, seededCoin } from "./random.js";
export type { RandomBoolean } from "./random.js";
export { layoutFromPoints, layoutFromRows, parsePattern } from "./pattern.js";
export type { Layout } from "./pattern.js";
export { sequentialRun, sequentialStep } from "./reference.js";
