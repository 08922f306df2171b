/**
 * Observability — structured logging for Toroid.
 */

export {
	LogLevel,
	Logger,
	ConsoleTransport,
	JsonTransport,
	createLogger,
	configureLogging,
	getLoggingConfig,
	resetLoggingConfig,
	parseLogLevel,
	formatConsoleLine,
} from "./logger.js";
export type {
	LogEntry,
	LogTransport,
	LoggerConfig,
	LineSink,
} from "./logger.js";
