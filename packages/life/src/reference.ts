/**
 * Single-pass, array-based generation step.
 *
 * Shares the coordinate mapper and rule with the actor engine, so the
 * two must agree cell for cell on any board.
 */

import { neighborOffsets } from "./coordinates.js";
import { assertDimensions } from "./board.js";
import { nextAlive } from "./rules.js";

export function sequentialStep(cells: readonly boolean[], width: number, height: number): boolean[] {
	assertDimensions(width, height);
	if (cells.length !== width * height) {
		throw new RangeError(`Expected ${width * height} cells, received ${cells.length}`);
	}
	return cells.map((alive, offset) => {
		let count = 0;
		for (const n of neighborOffsets(offset, width, height)) {
			if (cells[n]) count++;
		}
		return nextAlive(alive, count);
	});
}

/** Apply {@link sequentialStep} `generations` times. */
export function sequentialRun(
	cells: readonly boolean[],
	width: number,
	height: number,
	generations: number,
): boolean[] {
	let current = [...cells];
	for (let i = 0; i < generations; i++) {
		current = sequentialStep(current, width, height);
	}
	return current;
}
