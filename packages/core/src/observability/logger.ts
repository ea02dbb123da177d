/**
 * Drishti — structured, pluggable logging for Dvara.
 * Sanskrit: Drishti (दृष्टि) = sight, observation.
 *
 * Level filtering, pluggable transports, child loggers and contextual
 * metadata. Entries below the active level are dropped before any
 * formatting happens.
 */

// ─── Log Level ───────────────────────────────────────────────────────────────

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	SILENT = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "DEBUG",
	[LogLevel.INFO]: "INFO",
	[LogLevel.WARN]: "WARN",
	[LogLevel.ERROR]: "ERROR",
	[LogLevel.SILENT]: "SILENT",
};

const LOG_LEVEL_PARSE: Record<string, LogLevel> = {
	debug: LogLevel.DEBUG,
	info: LogLevel.INFO,
	warn: LogLevel.WARN,
	error: LogLevel.ERROR,
	silent: LogLevel.SILENT,
};

/** Environment variable that overrides every configured level. */
export const LOG_LEVEL_ENV = "DVARA_LOG_LEVEL";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface LogEntry {
	/** ISO-8601 timestamp */
	timestamp: string;
	level: LogLevel;
	levelName: string;
	message: string;
	/** Structured context metadata */
	context: Record<string, unknown>;
	/** Serialized error, if one was passed */
	error?: { name: string; message: string; code?: string; stack?: string };
	/** Duration in milliseconds for timed operations */
	duration?: number;
	/** Logger name that produced this entry */
	logger?: string;
}

export interface LogTransport {
	/** Write a log entry to the output destination. */
	write(entry: LogEntry): void;
}

export interface LoggerConfig {
	/** Minimum level to emit. Entries below this level are discarded. */
	level?: LogLevel;
	/** Level used when neither the environment, `level` nor global config sets one. */
	defaultLevel?: LogLevel;
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

/** Get the current global logging configuration. */
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
	[LogLevel.SILENT]: "",
};

// ─── Transports ──────────────────────────────────────────────────────────────

/**
 * Console transport: human-readable colored output with timestamps.
 */
export class ConsoleTransport implements LogTransport {
	private readonly useColors: boolean;

	constructor(opts?: { colors?: boolean }) {
		this.useColors = opts?.colors ?? (process.stdout.isTTY ?? false);
	}

	/** Render an entry as a single console line (plus error lines). */
	format(entry: LogEntry): string {
		const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
		const lvl = LOG_LEVEL_NAMES[entry.level].padEnd(5);
		const name = entry.logger ? ` [${entry.logger}]` : "";

		let line: string;
		if (this.useColors) {
			const color = LEVEL_COLORS[entry.level];
			line = `${ANSI_DIM}${ts}${ANSI_RESET} ${color}${lvl}${ANSI_RESET}${ANSI_BOLD}${name}${ANSI_RESET} ${entry.message}`;
		} else {
			line = `${ts} ${lvl}${name} ${entry.message}`;
		}

		const ctxKeys = Object.keys(entry.context);
		if (ctxKeys.length > 0) {
			const ctxStr = ctxKeys
				.map((k) => `${k}=${JSON.stringify(entry.context[k])}`)
				.join(" ");
			line += ` ${this.useColors ? ANSI_DIM : ""}${ctxStr}${this.useColors ? ANSI_RESET : ""}`;
		}

		if (entry.duration !== undefined) {
			line += ` duration=${entry.duration}ms`;
		}
		if (entry.error) {
			line += `\n  ${entry.error.name}: ${entry.error.message}`;
		}
		return line;
	}

	write(entry: LogEntry): void {
		const stream = entry.level >= LogLevel.ERROR ? process.stderr : process.stdout;
		stream.write(this.format(entry) + "\n");
	}
}

/**
 * JSON transport: one JSON object per line for log aggregation.
 */
export class JsonTransport implements LogTransport {
	/** Build the JSON object written for an entry. */
	serialize(entry: LogEntry): Record<string, unknown> {
		const obj: Record<string, unknown> = {
			timestamp: entry.timestamp,
			level: LOG_LEVEL_NAMES[entry.level],
			message: entry.message,
			logger: entry.logger,
		};

		if (Object.keys(entry.context).length > 0) {
			obj.context = entry.context;
		}
		if (entry.error) obj.error = entry.error;
		if (entry.duration !== undefined) obj.duration = entry.duration;
		return obj;
	}

	write(entry: LogEntry): void {
		const stream = entry.level >= LogLevel.ERROR ? process.stderr : process.stdout;
		stream.write(JSON.stringify(this.serialize(entry)) + "\n");
	}
}

// ─── Logger ──────────────────────────────────────────────────────────────────

/**
 * Resolve the effective log level: environment, then explicit config,
 * then global config, then `defaultLevel`, then the NODE_ENV default.
 */
function resolveLevel(configLevel?: LogLevel, defaultLevel?: LogLevel): LogLevel {
	const envLevel = process.env[LOG_LEVEL_ENV]?.toLowerCase();
	if (envLevel && envLevel in LOG_LEVEL_PARSE) {
		return LOG_LEVEL_PARSE[envLevel];
	}
	if (configLevel !== undefined) {
		return configLevel;
	}
	if (globalConfig.level !== undefined) {
		return globalConfig.level;
	}
	if (defaultLevel !== undefined) {
		return defaultLevel;
	}
	return process.env.NODE_ENV === "production" ? LogLevel.INFO : LogLevel.DEBUG;
}

function serializeError(error: unknown): NonNullable<LogEntry["error"]> {
	if (error instanceof Error) {
		const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
		return { name: error.name, message: error.message, code, stack: error.stack };
	}
	return { name: "Error", message: String(error) };
}

export class Logger {
	private readonly name: string;
	private level: LogLevel;
	private readonly transports: LogTransport[];
	private readonly context: Record<string, unknown>;

	constructor(name: string, config?: LoggerConfig) {
		this.name = name;
		this.level = resolveLevel(config?.level, config?.defaultLevel);
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

	/** Log a WARN message with an optional error. */
	warn(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.WARN, message, error, ctx);
	}

	/** Log an ERROR message with an optional error. */
	error(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.ERROR, message, error, ctx);
	}

	/**
	 * Create a child logger named `parent:child` sharing transports,
	 * level and context.
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
	 * Does not mutate the original logger.
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

	// ─── Internal ────────────────────────────────────────────────────────

	private emit(
		level: LogLevel,
		message: string,
		error?: unknown,
		ctx?: Record<string, unknown>,
	): void {
		if (level < this.level) return;

		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			levelName: LOG_LEVEL_NAMES[level],
			message,
			context: { ...this.context, ...(ctx ?? {}) },
			logger: this.name,
		};

		if (entry.context.duration !== undefined) {
			entry.duration = Number(entry.context.duration);
			delete entry.context.duration;
		}
		if (error !== undefined) {
			entry.error = serializeError(error);
		}

		for (const transport of this.transports) {
			try {
				transport.write(entry);
			} catch {
				// A broken transport must never break the caller
			}
		}
	}
}

// ─── Factory ─────────────────────────────────────────────────────────────────

/**
 * Create a named logger with global defaults.
 *
 * @param name - Module identifier (e.g. "client", "client:frames")
 * @param defaultLevel - Level to fall back on when nothing else sets one.
 * Libraries pass `LogLevel.WARN` so embedding them stays quiet.
 */
export function createLogger(name: string, defaultLevel?: LogLevel): Logger {
	return new Logger(name, { defaultLevel });
}
