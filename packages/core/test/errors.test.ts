import { describe, it, expect } from "vitest";
import {
	ToroidError,
	ConfigError,
	InvalidDimensionsError,
	ProtocolViolationError,
	StepTimeoutError,
	StaleBoardError,
	AskTimeoutError,
	EngineStoppedError,
	RuleError,
	UndeliverableError,
	MailboxFullError,
} from "../src/errors.js";

// ═══════════════════════════════════════════════════════════════════════════
// TOROID ERROR (Base)
// ═══════════════════════════════════════════════════════════════════════════

describe("ToroidError", () => {
	it("should have name 'ToroidError'", () => {
		const err = new ToroidError("test", "TEST");
		expect(err.name).toBe("ToroidError");
	});

	it("should store the message and code", () => {
		const err = new ToroidError("something broke", "MY_CODE");
		expect(err.message).toBe("something broke");
		expect(err.code).toBe("MY_CODE");
	});

	it("should be an instance of Error", () => {
		expect(new ToroidError("msg", "C")).toBeInstanceOf(Error);
	});

	it("should support cause chaining", () => {
		const cause = new Error("root cause");
		const err = new ToroidError("wrapper", "WRAP", cause);
		expect(err.cause).toBe(cause);
	});

	it("should have undefined cause when not provided", () => {
		expect(new ToroidError("msg", "C").cause).toBeUndefined();
	});
});

// ═══════════════════════════════════════════════════════════════════════════
// SUBCLASSES
// ═══════════════════════════════════════════════════════════════════════════

describe("ConfigError", () => {
	it("should carry CONFIG_ERROR", () => {
		const err = new ConfigError("bad file");
		expect(err.code).toBe("CONFIG_ERROR");
		expect(err.name).toBe("ConfigError");
		expect(err).toBeInstanceOf(ToroidError);
	});
});

describe("InvalidDimensionsError", () => {
	it("should name the rejected dimensions", () => {
		const err = new InvalidDimensionsError(0, 5);
		expect(err.code).toBe("INVALID_DIMENSIONS");
		expect(err.width).toBe(0);
		expect(err.height).toBe(5);
		expect(err.message).toBe(
			"Invalid board dimensions 0x5: width and height must be positive integers",
		);
	});
});

describe("ProtocolViolationError", () => {
	it("should identify the actor and the message", () => {
		const err = new ProtocolViolationError("cell-3", { kind: "explode" });
		expect(err.code).toBe("PROTOCOL_VIOLATION");
		expect(err.actorId).toBe("cell-3");
		expect(err.receivedMessage).toEqual({ kind: "explode" });
		expect(err.message).toBe(
			'Protocol violation in actor "cell-3": unexpected message {"kind":"explode"}',
		);
	});

	it("should append the detail when given", () => {
		const err = new ProtocolViolationError("agg", 42, "expected neighbor-count");
		expect(err.message).toBe(
			'Protocol violation in actor "agg": unexpected message 42 (expected neighbor-count)',
		);
	});

	it("should fall back to String() for undefined", () => {
		const err = new ProtocolViolationError("c", undefined);
		expect(err.message).toBe('Protocol violation in actor "c": unexpected message undefined');
	});
});

describe("StepTimeoutError", () => {
	it("should report how many counts arrived", () => {
		const err = new StepTimeoutError(4, 16, 15, 100);
		expect(err.code).toBe("STEP_TIMEOUT");
		expect(err.generation).toBe(4);
		expect(err.expected).toBe(16);
		expect(err.received).toBe(15);
		expect(err.message).toBe(
			"Step from generation 4 timed out after 100ms: received 15 of 16 neighbor counts",
		);
	});
});

describe("StaleBoardError", () => {
	it("should carry both generations", () => {
		const err = new StaleBoardError(1, 3);
		expect(err.code).toBe("STALE_BOARD");
		expect(err.boardGeneration).toBe(1);
		expect(err.currentGeneration).toBe(3);
	});
});

describe("AskTimeoutError", () => {
	it("should name the target", () => {
		const err = new AskTimeoutError("cell-0", 50);
		expect(err.code).toBe("ASK_TIMEOUT");
		expect(err.message).toBe("Ask timed out after 50ms (to=cell-0)");
	});
});

describe("EngineStoppedError", () => {
	it("should default its message", () => {
		const err = new EngineStoppedError();
		expect(err.code).toBe("ENGINE_STOPPED");
		expect(err.message).toBe("Engine has been shut down");
	});
});

describe("RuleError", () => {
	it("should carry the offending count", () => {
		const err = new RuleError(9);
		expect(err.code).toBe("INVALID_NEIGHBOR_COUNT");
		expect(err.count).toBe(9);
	});
});

describe("UndeliverableError", () => {
	it("should name the destination", () => {
		const err = new UndeliverableError("ghost", "no such actor");
		expect(err.code).toBe("UNDELIVERABLE");
		expect(err.message).toBe('Cannot deliver to "ghost": no such actor');
	});
});

describe("MailboxFullError", () => {
	it("should carry the capacity", () => {
		const err = new MailboxFullError("cell-0", 2);
		expect(err.code).toBe("MAILBOX_FULL");
		expect(err.capacity).toBe(2);
	});
});
