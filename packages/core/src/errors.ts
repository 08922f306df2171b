/**
 * Typed error hierarchy for Toroid.
 *
 * All Toroid errors extend {@link ToroidError} with a machine-readable
 * `code` string for programmatic error handling.
 */

/**
 * Base error class for all Toroid errors.
 *
 * Carries a machine-readable `code` field (e.g. `"STEP_TIMEOUT"`) for
 * programmatic error detection in addition to the human-readable `message`.
 */
export class ToroidError extends Error {
	readonly code: string;

	constructor(message: string, code: string, cause?: Error) {
		super(message, { cause });
		this.name = "ToroidError";
		this.code = code;
	}
}

/**
 * Configuration error (missing file, invalid JSON, unknown key, etc.).
 */
export class ConfigError extends ToroidError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIG_ERROR", cause);
		this.name = "ConfigError";
	}
}

/**
 * Board dimensions that are not positive integers.
 */
export class InvalidDimensionsError extends ToroidError {
	readonly width: number;
	readonly height: number;

	constructor(width: number, height: number) {
		super(
			`Invalid board dimensions ${width}x${height}: width and height must be positive integers`,
			"INVALID_DIMENSIONS",
		);
		this.name = "InvalidDimensionsError";
		this.width = width;
		this.height = height;
	}
}

/**
 * An actor received a message outside its recognized set.
 *
 * Always fatal: it means the coordination protocol is broken upstream.
 */
export class ProtocolViolationError extends ToroidError {
	readonly actorId: string;
	readonly receivedMessage: unknown;

	constructor(actorId: string, receivedMessage: unknown, detail?: string) {
		const shown = describeMessage(receivedMessage);
		super(
			`Protocol violation in actor "${actorId}": unexpected message ${shown}${detail ? ` (${detail})` : ""}`,
			"PROTOCOL_VIOLATION",
		);
		this.name = "ProtocolViolationError";
		this.actorId = actorId;
		this.receivedMessage = receivedMessage;
	}
}

/**
 * A generation step did not collect every neighbor-count report in time.
 *
 * Recoverable: no cell was updated and the board keeps its generation.
 */
export class StepTimeoutError extends ToroidError {
	readonly generation: number;
	readonly expected: number;
	readonly received: number;

	constructor(generation: number, expected: number, received: number, timeoutMs: number) {
		super(
			`Step from generation ${generation} timed out after ${timeoutMs}ms: received ${received} of ${expected} neighbor counts`,
			"STEP_TIMEOUT",
		);
		this.name = "StepTimeoutError";
		this.generation = generation;
		this.expected = expected;
		this.received = received;
	}
}

/**
 * A board value from an earlier generation was handed back to the engine.
 */
export class StaleBoardError extends ToroidError {
	readonly boardGeneration: number;
	readonly currentGeneration: number;

	constructor(boardGeneration: number, currentGeneration: number) {
		super(
			`Board is at generation ${boardGeneration} but the engine is at generation ${currentGeneration}`,
			"STALE_BOARD",
		);
		this.name = "StaleBoardError";
		this.boardGeneration = boardGeneration;
		this.currentGeneration = currentGeneration;
	}
}

/**
 * A request-reply exchange got no answer within its timeout.
 */
export class AskTimeoutError extends ToroidError {
	readonly to: string;
	readonly timeoutMs: number;

	constructor(to: string, timeoutMs: number) {
		super(`Ask timed out after ${timeoutMs}ms (to=${to})`, "ASK_TIMEOUT");
		this.name = "AskTimeoutError";
		this.to = to;
		this.timeoutMs = timeoutMs;
	}
}

/**
 * An envelope addressed to an actor that does not exist (or has stopped).
 */
export class UndeliverableError extends ToroidError {
	readonly to: string;

	constructor(to: string, reason: string) {
		super(`Cannot deliver to "${to}": ${reason}`, "UNDELIVERABLE");
		this.name = "UndeliverableError";
		this.to = to;
	}
}

/**
 * An actor's bounded mailbox rejected an envelope.
 */
export class MailboxFullError extends ToroidError {
	readonly actorId: string;
	readonly capacity: number;

	constructor(actorId: string, capacity: number) {
		super(`Mailbox of actor "${actorId}" is full (capacity ${capacity})`, "MAILBOX_FULL");
		this.name = "MailboxFullError";
		this.actorId = actorId;
		this.capacity = capacity;
	}
}

/**
 * The engine or actor system was shut down, or aborted by a fatal fault.
 */
export class EngineStoppedError extends ToroidError {
	constructor(message = "Engine has been shut down", cause?: Error) {
		super(message, "ENGINE_STOPPED", cause);
		this.name = "EngineStoppedError";
	}
}

/**
 * A neighbor count outside 0..8 reached the transition rule.
 */
export class RuleError extends ToroidError {
	readonly count: number;

	constructor(count: number) {
		super(`Neighbor count ${count} is outside 0..8`, "INVALID_NEIGHBOR_COUNT");
		this.name = "RuleError";
		this.count = count;
	}
}

function describeMessage(message: unknown): string {
	try {
		const json = JSON.stringify(message);
		return json === undefined ? String(message) : json;
	} catch {
		return String(message);
	}
}
