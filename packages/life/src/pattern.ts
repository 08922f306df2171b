/**
 * Plain-text board layouts.
 *
 * One row per line; `*` or `O` is alive, `_` or `.` is dead. Lines
 * starting with `!` are comments and blank lines are skipped. Short
 * rows are padded with dead cells to the widest row.
 */

import { ToroidError } from "@toroid/core";
import { assertDimensions } from "./board.js";
import { toOffset } from "./coordinates.js";

export interface Layout {
	width: number;
	height: number;
	/** Row-major liveness. */
	cells: boolean[];
}

const ALIVE = new Set(["*", "O"]);
const DEAD = new Set(["_", "."]);

/**
 * @throws ToroidError `INVALID_PATTERN` for an unknown character or a
 *   layout with no rows.
 */
export function parsePattern(text: string): Layout {
	const rows = text
		.split(/\r?\n/)
		.map((line) => line.trimEnd())
		.filter((line) => line.length > 0 && !line.startsWith("!"));
	return layoutFromRows(rows);
}

export function layoutFromRows(rows: readonly string[]): Layout {
	if (rows.length === 0) {
		throw new ToroidError("Pattern has no rows", "INVALID_PATTERN");
	}
	const width = Math.max(...rows.map((row) => row.length));
	if (width === 0) {
		throw new ToroidError("Pattern has no columns", "INVALID_PATTERN");
	}

	const cells: boolean[] = [];
	rows.forEach((row, y) => {
		for (let x = 0; x < width; x++) {
			const ch = row[x] ?? "_";
			if (ALIVE.has(ch)) cells.push(true);
			else if (DEAD.has(ch)) cells.push(false);
			else {
				throw new ToroidError(
					`Unexpected character ${JSON.stringify(ch)} at row ${y + 1}, column ${x + 1}`,
					"INVALID_PATTERN",
				);
			}
		}
	});
	return { width, height: rows.length, cells };
}

/**
 * Layout of the given size with exactly the listed points alive.
 * Points outside the board wrap onto it.
 */
export function layoutFromPoints(
	width: number,
	height: number,
	alive: readonly { x: number; y: number }[],
): Layout {
	assertDimensions(width, height);
	const cells = new Array<boolean>(width * height).fill(false);
	for (const { x, y } of alive) {
		cells[toOffset(x, y, width, height)] = true;
	}
	return { width, height, cells };
}
