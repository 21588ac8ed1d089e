/**
 * Console Logger
 *
 * Leveled logger writing through the console, with a scope prefix.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	silent: 4,
};

export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
	/** Derive a logger whose prefix is extended with `scope` */
	child(scope: string): Logger;
}

/**
 * Create a console logger
 *
 * @param minLevel - Minimum level written (default: "warn")
 * @param prefix - Text placed before every message
 *
 * @example
 * ```ts
 * const logger = createLogger("debug", "[failover-link]");
 * logger.info("connected"); // [failover-link] connected
 * ```
 */
export function createLogger(
	minLevel: LogLevel = "warn",
	prefix = "[failover-link]",
): Logger {
	const threshold = LOG_LEVELS[minLevel];
	const enabled = (level: LogLevel) => LOG_LEVELS[level] >= threshold;

	return {
		debug: (message, ...args) => {
			if (enabled("debug")) console.debug(`${prefix} ${message}`, ...args);
		},
		info: (message, ...args) => {
			if (enabled("info")) console.info(`${prefix} ${message}`, ...args);
		},
		warn: (message, ...args) => {
			if (enabled("warn")) console.warn(`${prefix} ${message}`, ...args);
		},
		error: (message, ...args) => {
			if (enabled("error")) console.error(`${prefix} ${message}`, ...args);
		},
		child: (scope) => createLogger(minLevel, `${prefix} [${scope}]`),
	};
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = createLogger("silent");
