/**
 * @toroid/cli — Argument parser.
 *
 * Simple CLI argument parser with no external dependencies.
 * Parses flags and their values from argv; malformed values are
 * collected in `errors` rather than thrown.
 */

export interface ParsedArgs {
	width?: number;
	height?: number;
	seed?: number;
	/** Pause between generations (--delay, in ms). */
	delayMs?: number;
	/** Stop after this many steps. Runs forever when absent. */
	generations?: number;
	/** Path of a pattern file to start from. */
	pattern?: string;
	logLevel?: string;
	jsonLogs?: boolean;
	version?: boolean;
	help?: boolean;
	/** Problems found while parsing, one message each. */
	errors: string[];
	/** Unrecognized arguments. */
	rest: string[];
}

type IntegerFlag = "width" | "height" | "seed" | "delayMs" | "generations";

const INTEGER_FLAGS = new Map<string, IntegerFlag>([
	["--width", "width"],
	["-W", "width"],
	["--height", "height"],
	["-H", "height"],
	["--seed", "seed"],
	["--delay", "delayMs"],
	["--generations", "generations"],
	["-n", "generations"],
]);

/**
 * Parse process.argv (or a custom argv array) into structured arguments.
 *
 * Expects argv WITHOUT the leading `node` and script path entries,
 * i.e., pass `process.argv.slice(2)`. Both `--flag value` and
 * `--flag=value` are accepted.
 */
export function parseArgs(argv: string[]): ParsedArgs {
	const result: ParsedArgs = {
		errors: [],
		rest: [],
	};

	let i = 0;

	while (i < argv.length) {
		let arg = argv[i];
		let inline: string | undefined;
		const eq = arg.indexOf("=");
		if (arg.startsWith("--") && eq > 0) {
			inline = arg.slice(eq + 1);
			arg = arg.slice(0, eq);
		}

		// ─── Flags with values ──────────────────────────────────────────
		const integerFlag = INTEGER_FLAGS.get(arg);
		if (integerFlag || arg === "--pattern" || arg === "-p" || arg === "--log-level") {
			let value = inline;
			if (value === undefined) {
				i++;
				value = i < argv.length ? argv[i] : undefined;
			}
			i++;

			if (value === undefined) {
				result.errors.push(`${arg} requires a value`);
				continue;
			}

			if (integerFlag) {
				const parsed = parseInteger(value);
				if (parsed === undefined) {
					result.errors.push(`${arg} expects an integer, received "${value}"`);
				} else {
					result[integerFlag] = parsed;
				}
			} else if (arg === "--log-level") {
				result.logLevel = value;
			} else {
				result.pattern = value;
			}
			continue;
		}

		// ─── Boolean flags ──────────────────────────────────────────────
		if (arg === "--json-logs") {
			result.jsonLogs = true;
			i++;
			continue;
		}

		if (arg === "-v" || arg === "--version") {
			result.version = true;
			i++;
			continue;
		}

		if (arg === "-h" || arg === "--help") {
			result.help = true;
			i++;
			continue;
		}

		// ─── Unknown — push to rest ─────────────────────────────────────
		result.rest.push(argv[i]);
		i++;
	}

	return result;
}

function parseInteger(value: string): number | undefined {
	if (!/^-?\d+$/.test(value.trim())) return undefined;
	return Number.parseInt(value, 10);
}

/**
 * The CLI help text.
 */
export function helpText(): string {
	return `
Toroid — Conway's Game of Life on a torus, one actor per cell

Usage:
  toroid [options]

Options:
  -W, --width <n>               Board width in cells (default 10)
  -H, --height <n>              Board height in cells (default 10)
  --seed <n>                    Seed for a reproducible random board (1..4294967295)
  -p, --pattern <file>          Start from a pattern file (* or O alive, _ or . dead)
  --delay <ms>                  Pause between generations (default 0)
  -n, --generations <n>         Stop after n generations (default: run until Ctrl+C)
  --log-level <level>           debug|info|warn|error|fatal
  --json-logs                   Write logs to stderr as JSON lines
  -v, --version                 Show version
  -h, --help                    Show this help

Settings are read from $TOROID_HOME/config/settings.json, then ./toroid.json,
then the flags above. Logs go to stderr; the board goes to stdout.
`.trimStart();
}
