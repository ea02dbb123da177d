/**
 * Observability: Drishti logging for Dvara.
 */

export {
	LogLevel,
	LOG_LEVEL_ENV,
	Logger,
	ConsoleTransport,
	JsonTransport,
	createLogger,
	configureLogging,
	getLoggingConfig,
	resetLoggingConfig,
} from "./logger.js";
export type {
	LogEntry,
	LogTransport,
	LoggerConfig,
} from "./logger.js";
