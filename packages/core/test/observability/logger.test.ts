import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
	LogLevel,
	Logger,
	ConsoleTransport,
	JsonTransport,
	createLogger,
	configureLogging,
	resetLoggingConfig,
	parseLogLevel,
	formatConsoleLine,
	ProtocolViolationError,
} from "@toroid/core";
import type { LogEntry, LogTransport } from "@toroid/core";

// ─── Test Transport ──────────────────────────────────────────────────────────

class TestTransport implements LogTransport {
	entries: LogEntry[] = [];
	write(entry: LogEntry): void {
		this.entries.push(entry);
	}
	last(): LogEntry | undefined {
		return this.entries[this.entries.length - 1];
	}
}

class LineBuffer {
	lines: string[] = [];
	write(line: string): boolean {
		this.lines.push(line);
		return true;
	}
}

describe("Logger", () => {
	let transport: TestTransport;
	const envLevel = process.env.LOG_LEVEL;

	beforeEach(() => {
		transport = new TestTransport();
		delete process.env.LOG_LEVEL;
		resetLoggingConfig();
	});

	afterEach(() => {
		resetLoggingConfig();
		if (envLevel === undefined) delete process.env.LOG_LEVEL;
		else process.env.LOG_LEVEL = envLevel;
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Log Level Filtering
	// ═══════════════════════════════════════════════════════════════════════

	describe("log level filtering", () => {
		it("should emit entries at or above the configured level", () => {
			const logger = new Logger("test", { level: LogLevel.INFO, transports: [transport] });
			logger.debug("should not appear");
			logger.info("should appear");
			logger.warn("should also appear");
			expect(transport.entries.map((e) => e.message)).toEqual(["should appear", "should also appear"]);
		});

		it("should default to WARN", () => {
			const logger = new Logger("test", { transports: [transport] });
			expect(logger.getLevel()).toBe(LogLevel.WARN);
			expect(logger.isEnabled(LogLevel.INFO)).toBe(false);
		});

		it("should let LOG_LEVEL override explicit config", () => {
			process.env.LOG_LEVEL = "error";
			const logger = new Logger("test", { level: LogLevel.DEBUG, transports: [transport] });
			expect(logger.getLevel()).toBe(LogLevel.ERROR);
		});

		it("should ignore an unknown LOG_LEVEL", () => {
			process.env.LOG_LEVEL = "chatty";
			const logger = new Logger("test", { level: LogLevel.INFO, transports: [transport] });
			expect(logger.getLevel()).toBe(LogLevel.INFO);
		});

		it("should allow dynamic level change via setLevel", () => {
			const logger = new Logger("test", { level: LogLevel.ERROR, transports: [transport] });
			logger.info("hidden");
			logger.setLevel(LogLevel.DEBUG);
			logger.debug("shown");
			expect(transport.entries).toHaveLength(1);
			expect(transport.last()?.message).toBe("shown");
		});
	});

	describe("parseLogLevel", () => {
		it("should parse names case-insensitively", () => {
			expect(parseLogLevel("Warn")).toBe(LogLevel.WARN);
			expect(parseLogLevel(" fatal ")).toBe(LogLevel.FATAL);
			expect(parseLogLevel("nope")).toBeUndefined();
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Entry structure
	// ═══════════════════════════════════════════════════════════════════════

	describe("log entry structure", () => {
		it("should include level, message and scope", () => {
			const logger = new Logger("life:engine", { level: LogLevel.DEBUG, transports: [transport] });
			logger.info("step done");
			const entry = transport.last();
			expect(entry?.level).toBe(LogLevel.INFO);
			expect(entry?.levelName).toBe("INFO");
			expect(entry?.message).toBe("step done");
			expect(entry?.scope).toBe("life:engine");
			expect(entry?.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
		});

		it("should lift actorId, generation and duration out of the context", () => {
			const logger = new Logger("t", { level: LogLevel.DEBUG, transports: [transport] });
			logger.debug("applied", { actorId: "cell-4", generation: 3, duration: 12, count: 2 });
			const entry = transport.last();
			expect(entry?.actorId).toBe("cell-4");
			expect(entry?.generation).toBe(3);
			expect(entry?.duration).toBe(12);
			expect(entry?.context).toEqual({ count: 2 });
		});

		it("should serialize errors with their code", () => {
			const logger = new Logger("t", { level: LogLevel.DEBUG, transports: [transport] });
			logger.fatal("abort", new ProtocolViolationError("cell-1", "boom"));
			expect(transport.last()?.error?.name).toBe("ProtocolViolationError");
			expect(transport.last()?.error?.code).toBe("PROTOCOL_VIOLATION");
		});

		it("should handle non-Error values in the error field", () => {
			const logger = new Logger("t", { level: LogLevel.DEBUG, transports: [transport] });
			logger.error("odd", "plain string");
			expect(transport.last()?.error).toEqual({ name: "Error", message: "plain string" });
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Children and context
	// ═══════════════════════════════════════════════════════════════════════

	describe("child loggers", () => {
		it("should prefix the name and inherit level and context", () => {
			const parent = new Logger("life", {
				level: LogLevel.INFO,
				transports: [transport],
				defaultContext: { board: "4x4" },
			});
			const child = parent.child("aggregator");
			expect(child.getName()).toBe("life:aggregator");
			child.debug("hidden");
			child.info("shown");
			expect(transport.entries).toHaveLength(1);
			expect(transport.last()?.context).toEqual({ board: "4x4" });
		});
	});

	describe("withContext", () => {
		it("should merge context without mutating the original", () => {
			const base = new Logger("t", { level: LogLevel.DEBUG, transports: [transport] });
			const scoped = base.withContext({ step: 7 });
			scoped.info("a");
			base.info("b");
			expect(transport.entries[0].context).toEqual({ step: 7 });
			expect(transport.entries[1].context).toEqual({});
		});
	});

	describe("global configuration", () => {
		it("should use global transports and level when none specified", () => {
			configureLogging({ level: LogLevel.DEBUG, transports: [transport] });
			const logger = createLogger("global");
			logger.debug("visible");
			expect(transport.last()?.message).toBe("visible");
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Transports
	// ═══════════════════════════════════════════════════════════════════════

	describe("transports", () => {
		const entry: LogEntry = {
			timestamp: "2024-01-02T03:04:05.678Z",
			level: LogLevel.WARN,
			levelName: "WARN",
			message: "late report",
			context: { cell: 3 },
			actorId: "aggregator-1",
			generation: 2,
			scope: "life",
		};

		it("formatConsoleLine should render a plain line", () => {
			expect(formatConsoleLine(entry)).toBe(
				"03:04:05.678 WARN  [life] late report actor=aggregator-1 gen=2 cell=3",
			);
		});

		it("ConsoleTransport should write the formatted line to its stream", () => {
			const sink = new LineBuffer();
			new ConsoleTransport({ colors: false, stream: sink }).write(entry);
			expect(sink.lines).toEqual([
				"03:04:05.678 WARN  [life] late report actor=aggregator-1 gen=2 cell=3\n",
			]);
		});

		it("JsonTransport should write one JSON object per line", () => {
			const sink = new LineBuffer();
			new JsonTransport({ stream: sink }).write(entry);
			expect(JSON.parse(sink.lines[0])).toEqual({
				timestamp: "2024-01-02T03:04:05.678Z",
				level: "WARN",
				message: "late report",
				scope: "life",
				actorId: "aggregator-1",
				generation: 2,
				context: { cell: 3 },
			});
		});

		it("should survive transport errors", () => {
			const broken: LogTransport = {
				write(): void {
					throw new Error("disk full");
				},
			};
			const logger = new Logger("t", { level: LogLevel.DEBUG, transports: [broken, transport] });
			expect(() => logger.info("still logged")).not.toThrow();
			expect(transport.last()?.message).toBe("still logged");
		});
	});
});
