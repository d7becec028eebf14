/**
 * Textblock Shared Utilities
 *
 * Cross-cutting utilities used by core and CLI packages.
 */

export const VERSION = "0.1.0";

// Logger
export {
	createLogger,
	LOG_LEVELS,
	parseLogLevel,
	silentLogger,
	type LogLevel,
} from "./logger";
