/**
 * Structured logger for Toroid.
 *
 * Level filtering, pluggable transports, child loggers and contextual
 * metadata. Actor ids and generation numbers are lifted out of the
 * context into first-class fields so a step can be followed across
 * thousands of cell actors.
 */

// ─── Log Level ───────────────────────────────────────────────────────────────

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	FATAL = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "DEBUG",
	[LogLevel.INFO]: "INFO",
	[LogLevel.WARN]: "WARN",
	[LogLevel.ERROR]: "ERROR",
	[LogLevel.FATAL]: "FATAL",
};

const LOG_LEVEL_PARSE = new Map<string, LogLevel>([
	["debug", LogLevel.DEBUG],
	["info", LogLevel.INFO],
	["warn", LogLevel.WARN],
	["error", LogLevel.ERROR],
	["fatal", LogLevel.FATAL],
]);

/** Parse a level name (case-insensitive). Returns `undefined` for unknown names. */
export function parseLogLevel(name: string): LogLevel | undefined {
	return LOG_LEVEL_PARSE.get(name.trim().toLowerCase());
}

// ─── Types ───────────────────────────────────────────────────────────────────

export interface LogEntry {
	/** ISO-8601 timestamp */
	timestamp: string;
	level: LogLevel;
	levelName: string;
	message: string;
	/** Structured context metadata */
	context: Record<string, unknown>;
	/** Actor that produced or is the subject of the entry. */
	actorId?: string;
	/** Board generation the entry refers to. */
	generation?: number;
	error?: { name: string; code?: string; message: string; stack?: string };
	/** Duration in milliseconds for timed operations */
	duration?: number;
	/** Logger name, e.g. "life:engine" */
	scope?: string;
}

export interface LogTransport {
	write(entry: LogEntry): void;
}

/** Anything a transport can write whole lines to (process.stderr, a test buffer). */
export interface LineSink {
	write(line: string): unknown;
}

export interface LoggerConfig {
	/** Minimum level to emit. Entries below this level are silently discarded. */
	level?: LogLevel;
	/** Output transports. Defaults to [ConsoleTransport]. */
	transports?: LogTransport[];
	/** Default context merged into every log entry. */
	defaultContext?: Record<string, unknown>;
}

// ─── Global Configuration ────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {};

/**
 * Configure global logging defaults. Affects loggers created after this call.
 */
export function configureLogging(config: LoggerConfig): void {
	globalConfig = { ...config };
}

export function getLoggingConfig(): LoggerConfig {
	return { ...globalConfig };
}

/** Reset global config to defaults. Primarily for testing. */
export function resetLoggingConfig(): void {
	globalConfig = {};
}

// ─── ANSI Colors ─────────────────────────────────────────────────────────────

const ANSI_RESET = "\x1b[0m";
const ANSI_DIM = "\x1b[2m";
const ANSI_BOLD = "\x1b[1m";

const LEVEL_COLORS: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "\x1b[36m",   // cyan
	[LogLevel.INFO]: "\x1b[32m",    // green
	[LogLevel.WARN]: "\x1b[33m",    // yellow
	[LogLevel.ERROR]: "\x1b[31m",   // red
	[LogLevel.FATAL]: "\x1b[35;1m", // bold magenta
};

// ─── Transports ──────────────────────────────────────────────────────────────

/**
 * Human-readable colored output. Everything goes to stderr so that the
 * rendered board on stdout stays clean.
 */
export class ConsoleTransport implements LogTransport {
	private readonly useColors: boolean;
	private readonly stream: LineSink;

	constructor(opts?: { colors?: boolean; stream?: LineSink }) {
		this.stream = opts?.stream ?? process.stderr;
		this.useColors = opts?.colors ?? (process.stderr.isTTY ?? false);
	}

	write(entry: LogEntry): void {
		this.stream.write(formatConsoleLine(entry, this.useColors) + "\n");
	}
}

/** Format an entry the way {@link ConsoleTransport} prints it (without newline). */
export function formatConsoleLine(entry: LogEntry, useColors = false): string {
	const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
	const lvl = LOG_LEVEL_NAMES[entry.level].padEnd(5);
	const scope = entry.scope ? ` [${entry.scope}]` : "";

	let line: string;
	if (useColors) {
		const color = LEVEL_COLORS[entry.level];
		line = `${ANSI_DIM}${ts}${ANSI_RESET} ${color}${lvl}${ANSI_RESET}${ANSI_BOLD}${scope}${ANSI_RESET} ${entry.message}`;
	} else {
		line = `${ts} ${lvl}${scope} ${entry.message}`;
	}

	if (entry.actorId) line += ` actor=${entry.actorId}`;
	if (entry.generation !== undefined) line += ` gen=${entry.generation}`;

	const ctxKeys = Object.keys(entry.context);
	if (ctxKeys.length > 0) {
		const ctxStr = ctxKeys
			.map((k) => `${k}=${JSON.stringify(entry.context[k])}`)
			.join(" ");
		line += ` ${useColors ? ANSI_DIM : ""}${ctxStr}${useColors ? ANSI_RESET : ""}`;
	}

	if (entry.duration !== undefined) {
		line += ` duration=${entry.duration}ms`;
	}
	if (entry.error) {
		const code = entry.error.code ? ` [${entry.error.code}]` : "";
		line += `\n  ${entry.error.name}${code}: ${entry.error.message}`;
	}
	return line;
}

/**
 * JSON lines for log aggregation, one object per entry on stderr.
 */
export class JsonTransport implements LogTransport {
	private readonly stream: LineSink;

	constructor(opts?: { stream?: LineSink }) {
		this.stream = opts?.stream ?? process.stderr;
	}

	write(entry: LogEntry): void {
		const obj: Record<string, unknown> = {
			timestamp: entry.timestamp,
			level: LOG_LEVEL_NAMES[entry.level],
			message: entry.message,
			scope: entry.scope,
		};

		if (entry.actorId) obj.actorId = entry.actorId;
		if (entry.generation !== undefined) obj.generation = entry.generation;
		if (Object.keys(entry.context).length > 0) obj.context = entry.context;
		if (entry.error) obj.error = entry.error;
		if (entry.duration !== undefined) obj.duration = entry.duration;

		this.stream.write(JSON.stringify(obj) + "\n");
	}
}

// ─── Logger ──────────────────────────────────────────────────────────────────

/**
 * Resolve the effective log level: `LOG_LEVEL` env, then explicit config,
 * then global config, then WARN.
 */
function resolveLevel(configLevel?: LogLevel): LogLevel {
	const envLevel = process.env.LOG_LEVEL;
	if (envLevel) {
		const parsed = parseLogLevel(envLevel);
		if (parsed !== undefined) return parsed;
	}
	if (configLevel !== undefined) return configLevel;
	if (globalConfig.level !== undefined) return globalConfig.level;
	return LogLevel.WARN;
}

export class Logger {
	private readonly name: string;
	private level: LogLevel;
	private readonly transports: LogTransport[];
	private readonly context: Record<string, unknown>;

	constructor(name: string, config?: LoggerConfig) {
		this.name = name;
		this.level = resolveLevel(config?.level);
		this.transports = config?.transports
			?? globalConfig.transports
			?? [new ConsoleTransport()];
		this.context = {
			...(globalConfig.defaultContext ?? {}),
			...(config?.defaultContext ?? {}),
		};
	}

	debug(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.DEBUG, message, undefined, ctx);
	}

	info(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.INFO, message, undefined, ctx);
	}

	warn(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.WARN, message, undefined, ctx);
	}

	error(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.ERROR, message, error, ctx);
	}

	fatal(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.FATAL, message, error, ctx);
	}

	/**
	 * Create a child logger named `parent:child` that shares transports,
	 * level and context with the parent.
	 */
	child(childName: string): Logger {
		return new Logger(`${this.name}:${childName}`, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context },
		});
	}

	/**
	 * Return a new logger with additional context merged in.
	 */
	withContext(ctx: Record<string, unknown>): Logger {
		return new Logger(this.name, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context, ...ctx },
		});
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	getLevel(): LogLevel {
		return this.level;
	}

	getName(): string {
		return this.name;
	}

	/** Whether an entry at `level` would be emitted. */
	isEnabled(level: LogLevel): boolean {
		return level >= this.level;
	}

	// ─── Internal ────────────────────────────────────────────────────────

	private emit(
		level: LogLevel,
		message: string,
		error?: unknown,
		ctx?: Record<string, unknown>,
	): void {
		if (level < this.level) return;

		const { actorId, generation, duration, ...rest } = { ...this.context, ...(ctx ?? {}) };
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			levelName: LOG_LEVEL_NAMES[level],
			message,
			context: rest,
			scope: this.name,
		};

		if (actorId !== undefined) entry.actorId = String(actorId);
		if (generation !== undefined) entry.generation = Number(generation);
		if (duration !== undefined) entry.duration = Number(duration);

		if (error !== undefined) {
			if (error instanceof Error) {
				const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
				entry.error = {
					name: error.name,
					...(code ? { code } : {}),
					message: error.message,
					stack: error.stack,
				};
			} else {
				entry.error = { name: "Error", message: String(error) };
			}
		}

		for (const transport of this.transports) {
			try {
				transport.write(entry);
			} catch {
				// Transport failure must never crash the simulation
			}
		}
	}
}

// ─── Factory ─────────────────────────────────────────────────────────────────

/**
 * Create a named logger with global defaults.
 *
 * @param name - Package or module identifier (e.g. "mesh", "life:engine")
 */
export function createLogger(name: string): Logger {
	return new Logger(name);
}
