/**
 * Messages exchanged by cells, neighbor counters and step aggregators.
 *
 * Each actor kind accepts a closed union. The guards below are what the
 * actor runtime checks every incoming payload against; a payload that
 * fails its guard never reaches the behavior and is reported as a
 * protocol violation.
 */

import { ActorRef } from "@toroid/mesh";

// ─── Cell ────────────────────────────────────────────────────────────────────

/** Ask for a snapshot of the cell's state. */
export interface QueryState {
	kind: "query-state";
}

/** Commit the cell to `generation` using its neighbor count. */
export interface ApplyNeighborCount {
	kind: "apply-neighbor-count";
	generation: number;
	count: number;
}

export type CellMessage = QueryState | ApplyNeighborCount;

/** A cell's state, as held by the actor and as sent in query replies. */
export interface CellState {
	/** Highest generation the cell has committed to. */
	generation: number;
	/** Most recent generation in which `alive` flipped. */
	lastUpdate: number;
	alive: boolean;
}

/** Opaque address of a cell actor. */
export type CellHandle = ActorRef<CellMessage>;

// ─── Neighbor counter ────────────────────────────────────────────────────────

export interface StartCount {
	kind: "start-count";
}

export type CounterMessage = StartCount;

// ─── Aggregator ──────────────────────────────────────────────────────────────

/** One cell's live-neighbor tally for one step attempt. */
export interface NeighborCountReport {
	kind: "neighbor-count";
	/** Step attempt the count belongs to. */
	step: number;
	offset: number;
	cell: CellHandle;
	count: number;
}

export type AggregatorMessage = NeighborCountReport;

// ─── Guards ──────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
	return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

export function isCellMessage(payload: unknown): payload is CellMessage {
	if (!isRecord(payload)) return false;
	switch (payload.kind) {
		case "query-state":
			return true;
		case "apply-neighbor-count":
			return isNonNegativeInteger(payload.generation) && typeof payload.count === "number";
		default:
			return false;
	}
}

export function isCellState(payload: unknown): payload is CellState {
	return isRecord(payload)
		&& isNonNegativeInteger(payload.generation)
		&& isNonNegativeInteger(payload.lastUpdate)
		&& typeof payload.alive === "boolean";
}

export function isCounterMessage(payload: unknown): payload is CounterMessage {
	return isRecord(payload) && payload.kind === "start-count";
}

export function isAggregatorMessage(payload: unknown): payload is AggregatorMessage {
	return isRecord(payload)
		&& payload.kind === "neighbor-count"
		&& isNonNegativeInteger(payload.step)
		&& isNonNegativeInteger(payload.offset)
		&& payload.cell instanceof ActorRef
		&& isNonNegativeInteger(payload.count);
}
