/**
 * @toroid/cli — programmatic surface of the command-line driver.
 */

export { helpText, parseArgs } from "./args.js";
export type { ParsedArgs } from "./args.js";
export { flagOverrides, resolveRunSettings } from "./settings.js";
export {
	EXIT_FATAL,
	EXIT_OK,
	EXIT_STEP_TIMEOUT,
	EXIT_USAGE,
	exitCodeFor,
	pause,
	runSimulation,
} from "./main.js";
export type { RunOptions, RunResult } from "./main.js";
