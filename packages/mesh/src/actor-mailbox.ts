/**
 * @toroid/mesh — bounded 4-lane priority mailbox.
 *
 * Envelopes are partitioned across four priority lanes (0 = low ...
 * 3 = critical). Dequeue favours the highest non-empty lane; within a
 * lane delivery is strictly FIFO, which is what gives the mesh its
 * per-sender ordering guarantee.
 */

import type { MeshEnvelope, MeshPriority } from "./types.js";

/** Number of priority lanes. */
const LANE_COUNT = 4;

/**
 * A bounded priority queue for MeshEnvelope messages.
 *
 * - `push` returns false when the total capacity is exhausted.
 * - `pop` drains from the highest non-empty lane first.
 * - No locks: the single-threaded event loop makes each call atomic.
 */
export class ActorMailbox {
	private readonly lanes: MeshEnvelope[][] = [];
	private readonly maxSize: number;
	private count = 0;

	constructor(maxSize = 10_000) {
		this.maxSize = maxSize;
		for (let i = 0; i < LANE_COUNT; i++) {
			this.lanes.push([]);
		}
	}

	// ─── Accessors ─────────────────────────────────────────────────

	get size(): number {
		return this.count;
	}

	get capacity(): number {
		return this.maxSize;
	}

	get isEmpty(): boolean {
		return this.count === 0;
	}

	get isFull(): boolean {
		return this.count >= this.maxSize;
	}

	// ─── Enqueue ───────────────────────────────────────────────────

	/**
	 * Push an envelope into its priority lane.
	 *
	 * @returns `true` if accepted, `false` if the mailbox is full.
	 */
	push(envelope: MeshEnvelope): boolean {
		if (this.count >= this.maxSize) return false;
		this.lanes[clampPriority(envelope.priority)].push(envelope);
		this.count++;
		return true;
	}

	// ─── Dequeue ───────────────────────────────────────────────────

	/**
	 * Pop the highest-priority envelope, or `undefined` if empty.
	 */
	pop(): MeshEnvelope | undefined {
		for (let lane = LANE_COUNT - 1; lane >= 0; lane--) {
			const next = this.lanes[lane].shift();
			if (next) {
				this.count--;
				return next;
			}
		}
		return undefined;
	}

	/**
	 * Drain all envelopes in priority order (highest first).
	 */
	drain(): MeshEnvelope[] {
		const result: MeshEnvelope[] = [];
		for (let lane = LANE_COUNT - 1; lane >= 0; lane--) {
			result.push(...this.lanes[lane]);
			this.lanes[lane] = [];
		}
		this.count = 0;
		return result;
	}
}

/** Clamp a priority value to a valid lane index [0, 3]. */
function clampPriority(p: MeshPriority): number {
	return Math.max(0, Math.min(3, p)) | 0;
}
