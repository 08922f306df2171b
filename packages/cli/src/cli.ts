/**
 * @toroid/cli — Entry point.
 *
 * Parses arguments, resolves settings, configures logging and runs the
 * simulation until `--generations` is reached or Ctrl+C.
 */

import fs from "node:fs";
import {
	ConfigError,
	ConsoleTransport,
	JsonTransport,
	configureLogging,
	createLogger,
	parseLogLevel,
} from "@toroid/core";
import type { ToroidSettings } from "@toroid/core";
import { helpText, parseArgs } from "./args.js";
import { EXIT_USAGE, exitCodeFor, runSimulation } from "./main.js";
import { resolveRunSettings } from "./settings.js";

const VERSION = "0.1.0";

async function run(): Promise<number> {
	const args = parseArgs(process.argv.slice(2));

	// ─── Version ────────────────────────────────────────────────────────
	if (args.version) {
		process.stdout.write(`toroid v${VERSION}\n`);
		return 0;
	}

	// ─── Help ───────────────────────────────────────────────────────────
	if (args.help) {
		process.stdout.write(helpText());
		return 0;
	}

	const problems = [...args.errors, ...args.rest.map((a) => `Unknown argument "${a}"`)];
	if (problems.length > 0) {
		process.stderr.write(`\nError: ${problems.join("\n       ")}\n\nRun \`toroid --help\` for usage.\n\n`);
		return EXIT_USAGE;
	}

	let settings: ToroidSettings;
	let pattern: string | undefined;
	try {
		settings = resolveRunSettings(args, process.cwd());
		if (args.pattern !== undefined) {
			pattern = readPattern(args.pattern);
		}
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		process.stderr.write(`\nConfiguration error: ${message}\n\n`);
		return exitCodeFor(error);
	}

	configureLogging({
		level: parseLogLevel(settings.logLevel),
		transports: [args.jsonLogs ? new JsonTransport() : new ConsoleTransport()],
	});
	const log = createLogger("cli");

	const controller = new AbortController();
	const onSignal = (): void => {
		log.info("Interrupted, stopping after this frame");
		controller.abort();
	};
	process.once("SIGINT", onSignal);
	process.once("SIGTERM", onSignal);

	try {
		const result = await runSimulation({
			settings,
			pattern,
			generations: args.generations,
			out: process.stdout,
			logger: log,
			signal: controller.signal,
		});
		return result.exitCode;
	} finally {
		process.off("SIGINT", onSignal);
		process.off("SIGTERM", onSignal);
	}
}

function readPattern(file: string): string {
	try {
		return fs.readFileSync(file, "utf-8");
	} catch (err) {
		throw new ConfigError(`Cannot read pattern file ${file}`, err instanceof Error ? err : undefined);
	}
}

run().then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		process.stderr.write(`\nFatal error: ${error instanceof Error ? error.message : String(error)}\n\n`);
		process.exitCode = 1;
	},
);
