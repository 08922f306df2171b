/**
 * Toroidal coordinate mapping.
 *
 * A board stores its cells in a flat array in row-major order; these
 * functions translate between that offset and (x, y), wrapping both
 * axes so the grid has no edges.
 */

export interface Point {
	x: number;
	y: number;
}

/** Moore neighborhood deltas, in the fixed iteration order. */
export const MOORE_DELTAS: readonly (readonly [number, number])[] = [
	[-1, -1], [0, -1], [1, -1],
	[-1, 0], [1, 0],
	[-1, 1], [0, 1], [1, 1],
];

/** Modulo that is never negative for a positive divisor. */
export function wrap(value: number, size: number): number {
	return ((value % size) + size) % size;
}

export function toXY(offset: number, width: number): Point {
	return { x: offset % width, y: Math.floor(offset / width) };
}

/**
 * Map (x, y) to a flat offset, wrapping any out-of-range coordinate
 * (`-1 → size - 1`, `size → 0`, `-7 → ...`) onto the torus.
 */
export function toOffset(x: number, y: number, width: number, height: number): number {
	return wrap(x, width) + wrap(y, height) * width;
}

/**
 * The eight neighbor offsets of a cell. On boards narrower or shorter
 * than 3 cells some entries repeat, and a cell may be its own neighbor.
 */
export function neighborOffsets(offset: number, width: number, height: number): number[] {
	const { x, y } = toXY(offset, width);
	return MOORE_DELTAS.map(([dx, dy]) => toOffset(x + dx, y + dy, width, height));
}
