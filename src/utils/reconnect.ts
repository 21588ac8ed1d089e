/**
 * Reconnection Utilities
 *
 * Exponential backoff with optional jitter for client-side reconnection.
 */

import * as z from "zod";
import { InvalidOptionsError } from "../errors.js";

/**
 * Options for client-side reconnection
 */
export interface ReconnectOptions {
	/** Delay before the first reconnect attempt (ms) */
	initialDelay?: number;
	/** Maximum delay between reconnect attempts (ms) */
	maxDelay?: number;
	/** Multiplier for exponential backoff, at least 1 */
	delayMultiplier?: number;
	/** Maximum number of reconnect attempts (0 = unlimited) */
	maxAttempts?: number;
	/** Jitter factor (0-1) to randomize delays */
	jitter?: number;
}

/**
 * Default reconnection options
 */
export const defaultReconnectOptions: Required<ReconnectOptions> = {
	initialDelay: 10,
	maxDelay: 60000,
	delayMultiplier: 2,
	maxAttempts: 0,
	jitter: 0,
};

export const ReconnectOptionsSchema = z
	.object({
		initialDelay: z.number().nonnegative().optional(),
		maxDelay: z.number().nonnegative().optional(),
		delayMultiplier: z.number().min(1).optional(),
		maxAttempts: z.number().int().nonnegative().optional(),
		jitter: z.number().min(0).max(1).optional(),
	})
	.strict();

/**
 * Validate reconnect options and fill in defaults
 *
 * @throws InvalidOptionsError if a value is out of range
 */
export function resolveReconnectOptions(
	options: ReconnectOptions = {},
): Required<ReconnectOptions> {
	const parsed = ReconnectOptionsSchema.safeParse(options);
	if (!parsed.success) {
		throw new InvalidOptionsError(
			`Invalid reconnect options: ${parsed.error.message}`,
			parsed.error.issues,
		);
	}
	const { data } = parsed;
	const resolved: Required<ReconnectOptions> = {
		initialDelay: data.initialDelay ?? defaultReconnectOptions.initialDelay,
		maxDelay: data.maxDelay ?? defaultReconnectOptions.maxDelay,
		delayMultiplier:
			data.delayMultiplier ?? defaultReconnectOptions.delayMultiplier,
		maxAttempts: data.maxAttempts ?? defaultReconnectOptions.maxAttempts,
		jitter: data.jitter ?? defaultReconnectOptions.jitter,
	};
	if (resolved.maxDelay < resolved.initialDelay) {
		throw new InvalidOptionsError(
			`Invalid reconnect options: maxDelay ${resolved.maxDelay} ` +
				`is below initialDelay ${resolved.initialDelay}`,
		);
	}
	return resolved;
}

/**
 * Calculate delay for reconnection attempt with exponential backoff
 *
 * @param attempt - Reconnection attempt number (1-indexed)
 * @param options - Reconnection options including backoff multiplier and max delay
 * @returns Delay in milliseconds before the next reconnection attempt
 */
export function calculateReconnectDelay(
	attempt: number,
	options: Required<ReconnectOptions>,
): number {
	const baseDelay = Math.min(
		options.initialDelay *
			Math.pow(options.delayMultiplier, Math.max(0, attempt - 1)),
		options.maxDelay,
	);
	if (options.jitter === 0) return baseDelay;
	const jitter = baseDelay * options.jitter * (Math.random() * 2 - 1);
	return Math.max(0, baseDelay + jitter);
}

/**
 * Decides whether and after how long to retry a failed connection
 */
export class ReconnectPolicy {
	readonly options: Readonly<Required<ReconnectOptions>>;

	constructor(options?: ReconnectOptions) {
		this.options = Object.freeze(resolveReconnectOptions(options));
	}

	/**
	 * Delay before the given reconnect attempt
	 *
	 * @param attempt - Attempt number, 1 for the first retry after a failure
	 * @returns Delay in milliseconds, or null when attempts are exhausted
	 */
	nextDelay(attempt: number): number | null {
		const { maxAttempts } = this.options;
		if (maxAttempts > 0 && attempt > maxAttempts) return null;
		return calculateReconnectDelay(attempt, this.options);
	}
}
