import type { Logger } from "@outfitter/contracts";

export const LOG_LEVELS = [
	"trace",
	"debug",
	"info",
	"warn",
	"error",
	"fatal",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
	trace: 0,
	debug: 1,
	info: 2,
	warn: 3,
	error: 4,
	fatal: 5,
};

interface LoggerOptions {
	/** Minimum log level to output. Default: "warn" */
	level?: LogLevel;
	/** Context to include in all log messages */
	context?: Record<string, unknown>;
	/** Line writer. Default: process.stderr, since stdout carries rendered output */
	write?: (line: string) => void;
	/** Suppress all output (for testing). Default: false */
	silent?: boolean;
}

function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Parse a level name (case-insensitive), falling back when it is unset or
 * not a known level.
 */
export function parseLogLevel(
	value: string | undefined,
	fallback: LogLevel = "warn",
): LogLevel {
	const normalized = value?.trim().toLowerCase() ?? "";
	return isLogLevel(normalized) ? normalized : fallback;
}

function formatMessage(
	level: LogLevel,
	message: string,
	metadata: Record<string, unknown> | undefined,
	context: Record<string, unknown>,
): string {
	const merged = metadata ? { ...context, ...metadata } : context;
	if (Object.keys(merged).length > 0) {
		return `[${level}] ${message} ${JSON.stringify(merged)}`;
	}
	return `[${level}] ${message}`;
}

const writeStderr = (line: string): void => {
	process.stderr.write(`${line}\n`);
};

/**
 * Create a Logger that satisfies the @outfitter/contracts Logger interface.
 *
 * Every level goes to one writer (stderr by default). Child loggers
 * inherit level, writer and context.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
	const minLevel = options.level ?? "warn";
	const context = options.context ?? {};
	const write = options.write ?? writeStderr;
	const silent = options.silent ?? false;

	function log(
		level: LogLevel,
		message: string,
		metadata?: Record<string, unknown>,
	): void {
		if (silent || LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
		write(formatMessage(level, message, metadata, context));
	}

	return {
		trace: (message, metadata) => log("trace", message, metadata),
		debug: (message, metadata) => log("debug", message, metadata),
		info: (message, metadata) => log("info", message, metadata),
		warn: (message, metadata) => log("warn", message, metadata),
		error: (message, metadata) => log("error", message, metadata),
		fatal: (message, metadata) => log("fatal", message, metadata),
		child(childContext) {
			return createLogger({
				level: minLevel,
				context: { ...context, ...childContext },
				write,
				silent,
			});
		},
	};
}

/** A no-op logger that discards all messages. Useful for tests. */
export const silentLogger: Logger = createLogger({ silent: true });
