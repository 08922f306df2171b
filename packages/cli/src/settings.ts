/**
 * Settings cascade for a run: global settings, then the project's
 * `toroid.json`, then command-line flags.
 */

import {
	cascadeConfigs,
	createConfig,
	loadGlobalSettings,
	loadProjectConfig,
	resolveSettings,
} from "@toroid/core";
import type { ToroidSettings } from "@toroid/core";
import type { ParsedArgs } from "./args.js";

/** Flag values that override settings, keyed by settings field. */
export function flagOverrides(args: ParsedArgs): Record<string, unknown> {
	const overrides: Record<string, unknown> = {};
	if (args.width !== undefined) overrides.width = args.width;
	if (args.height !== undefined) overrides.height = args.height;
	if (args.seed !== undefined) overrides.seed = args.seed;
	if (args.delayMs !== undefined) overrides.delayMs = args.delayMs;
	if (args.logLevel !== undefined) overrides.logLevel = args.logLevel;
	return overrides;
}

/**
 * @throws ConfigError if `toroid.json` is unreadable or any merged value
 *   is out of range.
 */
export function resolveRunSettings(args: ParsedArgs, projectPath: string): ToroidSettings {
	const global = createConfig("global", { ...loadGlobalSettings() });
	const project = createConfig("project", loadProjectConfig(projectPath));
	const flags = createConfig("session", flagOverrides(args));
	return resolveSettings(cascadeConfigs(global, project, flags).all());
}
