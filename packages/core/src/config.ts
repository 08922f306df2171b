import fs from "fs";
import path from "path";
import { ConfigError } from "./errors.js";
import type { Config, ConfigLayer, ToroidSettings } from "./types.js";
import { DEFAULT_SETTINGS } from "./types.js";
import { assertValid, v } from "./validation.js";

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep-get a nested value from an object using dot-notation keys.
 */
function deepGet(obj: Record<string, unknown>, key: string): unknown {
	const parts = key.split(".");
	let current: unknown = obj;
	for (const part of parts) {
		if (!isRecord(current)) return undefined;
		current = current[part];
	}
	return current;
}

/**
 * Deep-set a nested value on an object using dot-notation keys.
 */
export function deepSet(obj: Record<string, unknown>, key: string, value: unknown): void {
	const parts = key.split(".");
	let current: Record<string, unknown> = obj;
	for (let i = 0; i < parts.length - 1; i++) {
		const part = parts[i];
		const next = current[part];
		if (isRecord(next)) {
			current = next;
		} else {
			const created: Record<string, unknown> = {};
			current[part] = created;
			current = created;
		}
	}
	current[parts[parts.length - 1]] = value;
}

/**
 * Deep-delete a nested key from an object.
 */
function deepDelete(obj: Record<string, unknown>, key: string): void {
	const parts = key.split(".");
	let current: Record<string, unknown> = obj;
	for (let i = 0; i < parts.length - 1; i++) {
		const next = current[parts[i]];
		if (!isRecord(next)) return;
		current = next;
	}
	delete current[parts[parts.length - 1]];
}

/**
 * Deep-merge source into target (mutates target). Arrays are replaced, not concatenated.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
	for (const key of Object.keys(source)) {
		const sv = source[key];
		const tv = target[key];
		if (isRecord(sv) && isRecord(tv)) {
			deepMerge(tv, sv);
		} else if (isRecord(sv)) {
			const copy: Record<string, unknown> = {};
			deepMerge(copy, sv);
			target[key] = copy;
		} else {
			target[key] = sv;
		}
	}
}

/**
 * Create a config layer backed by an in-memory object with dot-notation key support.
 *
 * @example
 * ```ts
 * const cfg = createConfig("project", { width: 40 });
 * cfg.set("mesh.maxMailboxSize", 500);
 * cfg.get("mesh.maxMailboxSize"); // 500
 * ```
 */
export function createConfig(layer: ConfigLayer, initial: Record<string, unknown> = {}): Config {
	const data: Record<string, unknown> = {};
	deepMerge(data, initial);

	function get<T>(key: string): T | undefined;
	function get<T>(key: string, fallback: T): T;
	function get<T>(key: string, fallback?: T): T | undefined {
		const val = deepGet(data, key);
		// Values are stored untyped; callers narrow through the validator.
		return val !== undefined ? (val as T) : fallback;
	}

	return {
		layer,
		get,

		set(key: string, value: unknown): void {
			deepSet(data, key, value);
		},

		has(key: string): boolean {
			return deepGet(data, key) !== undefined;
		},

		delete(key: string): void {
			deepDelete(data, key);
		},

		all(): Record<string, unknown> {
			return { ...data };
		},

		merge(other: Record<string, unknown>): void {
			deepMerge(data, other);
		},
	};
}

/**
 * Cascade multiple config layers into a single merged config.
 *
 * Layers are applied left-to-right, so later layers override earlier ones
 * on key conflicts. The resulting config has layer type "session".
 */
export function cascadeConfigs(...layers: Config[]): Config {
	const merged = createConfig("session");
	for (const layer of layers) {
		merged.merge(layer.all());
	}
	return merged;
}

/**
 * Get the Toroid home directory path (~/.toroid).
 *
 * Honors `TOROID_HOME` when set, otherwise falls back to
 * `$HOME/.toroid` (`$USERPROFILE` on Windows).
 */
export function getToroidHome(): string {
	const override = process.env.TOROID_HOME?.trim();
	if (override) return override;
	return path.join(process.env.HOME || process.env.USERPROFILE || "~", ".toroid");
}

/** Seeds map onto the non-zero 32-bit generator states one-to-one only inside this range. */
const SEED_MIN = 1;
const SEED_MAX = 0xffff_ffff;

const logLevelValidator = v.union<string>(
	v.literal("debug").validate,
	v.literal("info").validate,
	v.literal("warn").validate,
	v.literal("error").validate,
	v.literal("fatal").validate,
).validate;

const settingsValidator = v.object({
	width: v.number().integer().min(1).validate,
	height: v.number().integer().min(1).validate,
	delayMs: v.number().integer().min(0).validate,
	stepTimeoutMs: v.number().integer().min(1).validate,
	stepRetries: v.number().integer().min(0).validate,
	askTimeoutMs: v.number().integer().min(1).validate,
	maxMailboxSize: v.number().integer().min(1).validate,
	logLevel: logLevelValidator,
	seed: v.optional(v.number().integer().min(SEED_MIN).max(SEED_MAX).validate).validate,
}).validate;

/**
 * Validate a merged settings record, filling gaps from {@link DEFAULT_SETTINGS}.
 *
 * @throws {ConfigError} If any field has the wrong type or range.
 */
export function resolveSettings(raw: Record<string, unknown>): ToroidSettings {
	const candidate = { ...DEFAULT_SETTINGS, ...raw };
	try {
		const checked = assertValid(candidate, settingsValidator, "settings");
		return {
			width: checked.width,
			height: checked.height,
			delayMs: checked.delayMs,
			stepTimeoutMs: checked.stepTimeoutMs,
			stepRetries: checked.stepRetries,
			askTimeoutMs: checked.askTimeoutMs,
			maxMailboxSize: checked.maxMailboxSize,
			logLevel: parseLogLevelName(checked.logLevel),
			...(checked.seed !== undefined ? { seed: checked.seed } : {}),
		};
	} catch (err) {
		throw new ConfigError(
			err instanceof Error ? err.message : String(err),
			err instanceof Error ? err : undefined,
		);
	}
}

function parseLogLevelName(name: string): ToroidSettings["logLevel"] {
	switch (name) {
		case "debug":
		case "info":
		case "warn":
		case "error":
		case "fatal":
			return name;
		default:
			return DEFAULT_SETTINGS.logLevel;
	}
}

/**
 * Load global settings from `~/.toroid/config/settings.json`.
 *
 * Merges the on-disk settings with {@link DEFAULT_SETTINGS} so that any
 * missing keys fall back to their defaults. Returns pure defaults if the
 * file does not exist or is corrupted.
 */
export function loadGlobalSettings(): ToroidSettings {
	const settingsPath = path.join(getToroidHome(), "config", "settings.json");
	let parsed: unknown;
	try {
		if (!fs.existsSync(settingsPath)) return { ...DEFAULT_SETTINGS };
		parsed = JSON.parse(fs.readFileSync(settingsPath, "utf-8"));
	} catch {
		// Corrupted settings file — use defaults
		return { ...DEFAULT_SETTINGS };
	}
	return resolveSettings(isRecord(parsed) ? parsed : {});
}

/**
 * Load project-level configuration from `<projectPath>/toroid.json`.
 *
 * Returns an empty object if the file does not exist.
 *
 * @throws {ConfigError} If the file exists but is not a JSON object.
 */
export function loadProjectConfig(projectPath: string): Record<string, unknown> {
	const configPath = path.join(projectPath, "toroid.json");
	if (!fs.existsSync(configPath)) return {};
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
	} catch (err) {
		throw new ConfigError(
			`Failed to parse ${configPath}`,
			err instanceof Error ? err : undefined,
		);
	}
	if (!isRecord(parsed)) {
		throw new ConfigError(`${configPath} must contain a JSON object`);
	}
	return parsed;
}
