import { RuleError } from "@toroid/core";

/**
 * Conway's B3/S23 transition.
 *
 * A live cell survives with 2 or 3 live neighbors; a dead cell is born
 * with exactly 3. Everything else is dead in the next generation.
 *
 * @throws RuleError for a count that is not an integer in 0..8.
 */
export function nextAlive(alive: boolean, count: number): boolean {
	if (!Number.isInteger(count) || count < 0 || count > 8) {
		throw new RuleError(count);
	}
	if (alive) return count === 2 || count === 3;
	return count === 3;
}
