/**
 * Utility Exports
 */

export { CountdownBarrier } from "./barrier.js";
export {
	createLogger,
	type Logger,
	type LogLevel,
	silentLogger,
} from "./logger.js";
export {
	calculateReconnectDelay,
	defaultReconnectOptions,
	type ReconnectOptions,
	ReconnectOptionsSchema,
	ReconnectPolicy,
	resolveReconnectOptions,
} from "./reconnect.js";
