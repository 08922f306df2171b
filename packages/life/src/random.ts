/**
 * Sources of initial cell liveness.
 */

/** Yields one liveness value per call. */
export type RandomBoolean = () => boolean;

/**
 * xorshift32 PRNG for reproducible boards.
 * Not cryptographic.
 */
export class Xorshift32 {
	private state: number;

	constructor(seed: number) {
		this.state = seed | 0 || 1; // zero is a fixed point
	}

	/** Next pseudo-random number in [0, 1). */
	next(): number {
		let x = this.state;
		x ^= x << 13;
		x ^= x >> 17;
		x ^= x << 5;
		this.state = x;
		return (x >>> 0) / 0x1_0000_0000;
	}
}

export const coinFlip: RandomBoolean = () => Math.random() > 0.5;

/** A fair coin whose sequence is fully determined by `seed`. */
export function seededCoin(seed: number): RandomBoolean {
	const rng = new Xorshift32(seed);
	return () => rng.next() >= 0.5;
}
