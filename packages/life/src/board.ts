/**
 * Board: an immutable value naming one generation of a simulation.
 *
 * The cell handles are fixed for the life of the simulation; cell
 * state lives inside the actors. Each step yields a new Board with the
 * same handles and `generation + 1`.
 */

import { InvalidDimensionsError } from "@toroid/core";
import type { CellHandle } from "./protocol.js";
import { toOffset } from "./coordinates.js";

export interface Board {
	readonly width: number;
	readonly height: number;
	readonly generation: number;
	/** `cells[i]` is the cell at `(i mod width, i div width)`. */
	readonly cells: readonly CellHandle[];
}

/**
 * @throws InvalidDimensionsError unless both sides are positive integers.
 */
export function assertDimensions(width: number, height: number): void {
	if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
		throw new InvalidDimensionsError(width, height);
	}
}

export function createBoard(
	width: number,
	height: number,
	cells: readonly CellHandle[],
	generation = 0,
): Board {
	assertDimensions(width, height);
	if (cells.length !== width * height) {
		throw new InvalidDimensionsError(width, height);
	}
	return Object.freeze({ width, height, generation, cells: Object.freeze([...cells]) });
}

/** The same board, one generation later. */
export function advance(board: Board): Board {
	return Object.freeze({ ...board, generation: board.generation + 1 });
}

/** Handle of the cell at (x, y), wrapping out-of-range coordinates. */
export function cellAt(board: Board, x: number, y: number): CellHandle {
	return board.cells[toOffset(x, y, board.width, board.height)];
}

export const ALIVE_CHAR = "*";
export const DEAD_CHAR = "_";

/** Group a row-major liveness array into `*`/`_` rows. */
export function formatRows(alive: readonly boolean[], width: number): string[] {
	const rows: string[] = [];
	for (let start = 0; start < alive.length; start += width) {
		rows.push(alive.slice(start, start + width).map((a) => (a ? ALIVE_CHAR : DEAD_CHAR)).join(""));
	}
	return rows;
}

export function formatGenerationLine(generation: number): string {
	return `generation ${generation}`;
}
