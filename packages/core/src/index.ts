// @dvara/core: Foundation shared by the client packages
export * from "./errors.js";
export {
	DEFAULT_CLIENT_SETTINGS,
	CLIENT_SETTINGS_ENV,
	readSettingsFromEnv,
	resolveClientSettings,
} from "./config.js";
export type { ClientSettings } from "./config.js";

// Validation (Niyama)
export { v, validate, assertValid } from "./validation.js";
export type { ValidatorFn, ValidationError, ValidationResult } from "./validation.js";

// Observability (Drishti)
export * from "./observability/index.js";
