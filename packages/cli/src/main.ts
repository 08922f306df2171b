/**
 * @toroid/cli — The render → step driving loop.
 */

import {
	ConfigError,
	InvalidDimensionsError,
	ProtocolViolationError,
	RuleError,
	StepTimeoutError,
	ToroidError,
	createLogger,
} from "@toroid/core";
import type { LineSink, Logger, ToroidSettings } from "@toroid/core";
import { LifeEngine, coinFlip, seededCoin } from "@toroid/life";
import type { Board } from "@toroid/life";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_STEP_TIMEOUT = 2;
/** Bad input: dimensions, settings, pattern or flags (sysexits EX_USAGE). */
export const EXIT_USAGE = 64;

const USAGE_CODES = new Set(["INVALID_PATTERN", "VALIDATION_ERROR"]);

/** Process exit code for an error that ended a run. */
export function exitCodeFor(error: unknown): number {
	if (error instanceof ProtocolViolationError || error instanceof RuleError) return EXIT_FATAL;
	if (error instanceof StepTimeoutError) return EXIT_STEP_TIMEOUT;
	if (error instanceof InvalidDimensionsError || error instanceof ConfigError) return EXIT_USAGE;
	if (error instanceof ToroidError && USAGE_CODES.has(error.code)) return EXIT_USAGE;
	return EXIT_FATAL;
}

export interface RunOptions {
	settings: ToroidSettings;
	/** Pattern text; when set, the board takes its size from it. */
	pattern?: string;
	/** Number of steps before stopping. Runs until aborted when absent. */
	generations?: number;
	/** Where frames are written. */
	out: LineSink;
	logger?: Logger;
	/** Aborting ends the run after the current frame. */
	signal?: AbortSignal;
}

export interface RunResult {
	exitCode: number;
	/** Generation of the last board written. */
	generation: number;
	error?: unknown;
}

/**
 * Write the current frame, step, pause, repeat.
 *
 * Step timeouts are retried `settings.stepRetries` times before the run
 * ends with {@link EXIT_STEP_TIMEOUT}. Never rejects: failures are
 * logged and mapped to an exit code.
 */
export async function runSimulation(options: RunOptions): Promise<RunResult> {
	const { settings, pattern, generations, out, signal } = options;
	const log = options.logger ?? createLogger("cli");
	const engine = new LifeEngine({
		stepTimeoutMs: settings.stepTimeoutMs,
		askTimeoutMs: settings.askTimeoutMs,
		maxMailboxSize: settings.maxMailboxSize,
		logger: log.child("life"),
	});

	let board: Board | undefined;
	try {
		board = pattern !== undefined
			? engine.fromPattern(pattern)
			: engine.generate(
				settings.width,
				settings.height,
				settings.seed !== undefined ? seededCoin(settings.seed) : coinFlip,
			);
		log.info("Simulation started", {
			width: board.width,
			height: board.height,
			seed: settings.seed,
			generations,
		});

		for (;;) {
			out.write((await engine.renderFrame(board)) + "\n");
			if (generations !== undefined && board.generation >= generations) break;
			if (signal?.aborted) break;

			await pause(settings.delayMs, signal);
			if (signal?.aborted) break;

			board = await stepWithRetries(engine, board, settings.stepRetries, log);
		}

		log.info("Simulation finished", { generation: board.generation });
		return { exitCode: EXIT_OK, generation: board.generation };
	} catch (err) {
		const exitCode = exitCodeFor(err);
		// The engine has already logged fatal faults with their actor.
		if (!engine.fatalError) {
			log.error("Simulation failed", err, { generation: board?.generation });
		}
		return { exitCode, generation: board?.generation ?? 0, error: err };
	} finally {
		engine.shutdown();
	}
}

async function stepWithRetries(engine: LifeEngine, board: Board, retries: number, log: Logger): Promise<Board> {
	for (let attempt = 1; ; attempt++) {
		try {
			return await engine.step(board);
		} catch (err) {
			if (!(err instanceof StepTimeoutError) || attempt > retries) throw err;
			log.warn("Retrying step", { generation: board.generation, attempt, retries });
		}
	}
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function pause(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise<void>((resolve) => {
		if (signal?.aborted) {
			resolve();
			return;
		}
		const done = (): void => {
			clearTimeout(timer);
			signal?.removeEventListener("abort", done);
			resolve();
		};
		const timer = setTimeout(done, ms);
		signal?.addEventListener("abort", done, { once: true });
	});
}
