import { Logger, LogLevel } from "@toroid/core";
import type { LogEntry } from "@toroid/core";

/** A DEBUG-level logger that records entries instead of printing them. */
export function recordingLogger(entries: LogEntry[] = [], name = "life"): Logger {
	return new Logger(name, {
		level: LogLevel.DEBUG,
		transports: [{ write: (e: LogEntry) => entries.push(e) }],
	});
}

/** Offsets of the live cells in a row-major snapshot. */
export function aliveOffsets(cells: readonly boolean[]): number[] {
	const out: number[] = [];
	cells.forEach((alive, i) => {
		if (alive) out.push(i);
	});
	return out;
}
