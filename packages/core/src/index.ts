// @toroid/core — Foundation
export * from "./types.js";
export * from "./errors.js";
export {
	createConfig,
	cascadeConfigs,
	getToroidHome,
	loadGlobalSettings,
	loadProjectConfig,
	resolveSettings,
	deepSet,
} from "./config.js";

// Validation
export { v, assertValid } from "./validation.js";
export type { ValidatorFn } from "./validation.js";

// Observability
export * from "./observability/index.js";
