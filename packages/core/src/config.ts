import { ConfigurationError } from "./errors.js";
import { v, assertValid } from "./validation.js";

/**
 * Tunables for one client connection.
 */
export interface ClientSettings {
	/** Deadline for transport open plus the handshake exchange. `0` disables it. */
	handshakeTimeoutMs: number;
	/** Longest status or header line accepted in the handshake response. */
	maxHeaderLineBytes: number;
	/** Most header lines accepted in the handshake response. */
	maxHeaders: number;
	/** Largest reassembled message accepted after the connection opens. */
	maxMessageBytes: number;
}

export const DEFAULT_CLIENT_SETTINGS: Readonly<ClientSettings> = Object.freeze({
	handshakeTimeoutMs: 10_000,
	maxHeaderLineBytes: 4096,
	maxHeaders: 256,
	maxMessageBytes: 16 * 1024 * 1024,
});

/** Environment variables read by {@link resolveClientSettings}. */
export const CLIENT_SETTINGS_ENV: Readonly<Record<keyof ClientSettings, string>> = Object.freeze({
	handshakeTimeoutMs: "DVARA_HANDSHAKE_TIMEOUT_MS",
	maxHeaderLineBytes: "DVARA_MAX_HEADER_LINE_BYTES",
	maxHeaders: "DVARA_MAX_HEADERS",
	maxMessageBytes: "DVARA_MAX_MESSAGE_BYTES",
});

const SETTING_KEYS = [
	"handshakeTimeoutMs",
	"maxHeaderLineBytes",
	"maxHeaders",
	"maxMessageBytes",
] as const satisfies ReadonlyArray<keyof ClientSettings>;

const settingsValidator = v.object({
	handshakeTimeoutMs: v.number().integer().min(0).validate,
	maxHeaderLineBytes: v.number().integer().min(64).validate,
	maxHeaders: v.number().integer().min(1).validate,
	maxMessageBytes: v.number().integer().min(1).validate,
}).validate;

/**
 * Read the settings layer contributed by environment variables.
 *
 * @throws {ConfigurationError} If a variable is set but is not a
 * non-negative integer.
 */
export function readSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ClientSettings> {
	const layer: Partial<ClientSettings> = {};
	for (const key of SETTING_KEYS) {
		const name = CLIENT_SETTINGS_ENV[key];
		const raw = env[name]?.trim();
		if (!raw) continue;
		if (!/^\d+$/.test(raw)) {
			throw new ConfigurationError(`${name} must be a non-negative integer, got ${JSON.stringify(raw)}`);
		}
		layer[key] = Number(raw);
	}
	return layer;
}

/**
 * Cascade defaults, environment and explicit overrides into validated
 * settings. Later layers win; `undefined` override values are skipped.
 *
 * @example
 * ```ts
 * const settings = resolveClientSettings({ handshakeTimeoutMs: 2_000 });
 * ```
 */
export function resolveClientSettings(
	overrides: Partial<ClientSettings> = {},
	env: NodeJS.ProcessEnv = process.env,
): ClientSettings {
	const merged: Record<string, unknown> = { ...DEFAULT_CLIENT_SETTINGS, ...readSettingsFromEnv(env) };
	for (const [key, value] of Object.entries(overrides)) {
		if (value !== undefined) merged[key] = value;
	}
	return assertValid(merged, settingsValidator, "client settings");
}
