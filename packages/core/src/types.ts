/**
 * @toroid/core — Foundation types shared by every Toroid package.
 */

// ─── Configuration ───────────────────────────────────────────────────────────

/** The scope/priority tier of a configuration layer. */
export type ConfigLayer = "global" | "project" | "session";

/** A configuration store with dot-notation key access and layer awareness. */
export interface Config {
	get<T>(key: string): T | undefined;
	get<T>(key: string, fallback: T): T;
	set(key: string, value: unknown): void;
	has(key: string): boolean;
	delete(key: string): void;
	layer: ConfigLayer;
	all(): Record<string, unknown>;
	merge(other: Record<string, unknown>): void;
}

/** Log level names accepted in settings files and on the command line. */
export type LogLevelName = "debug" | "info" | "warn" | "error" | "fatal";

/** Global user settings persisted at ~/.toroid/config/settings.json. */
export interface ToroidSettings {
	/** Board width in cells. */
	width: number;
	/** Board height in cells. */
	height: number;
	/** Pause between rendered generations, in milliseconds. */
	delayMs: number;
	/** Upper bound on one generation step before it fails with STEP_TIMEOUT. */
	stepTimeoutMs: number;
	/** How many times the driver retries a timed-out step before giving up. */
	stepRetries: number;
	/** Timeout for a single neighbor state query. */
	askTimeoutMs: number;
	/** Mailbox capacity per actor. */
	maxMailboxSize: number;
	logLevel: LogLevelName;
	/** Optional seed for reproducible boards. */
	seed?: number;
}

export const DEFAULT_SETTINGS: ToroidSettings = {
	width: 10,
	height: 10,
	delayMs: 0,
	stepTimeoutMs: 5_000,
	stepRetries: 2,
	askTimeoutMs: 2_000,
	maxMailboxSize: 10_000,
	logLevel: "info",
};
