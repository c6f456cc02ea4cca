/**
 * Delay strategies for the retry controller.
 *
 * Each returns a RetryDelayFn taking the 1-based number of the attempt that
 * just failed.
 */

import { assertDuration } from "./config.js";
import type { RetryDelayFn } from "./types.js";

/**
 * The same delay before every retry.
 *
 * @example
 * ```typescript
 * await retry(op, { delay: fixed(200), timeout: 2000 })
 * // Attempts at ~0, 200, 400, ... until the deadline
 * ```
 */
export function fixed(delayMs: number): RetryDelayFn {
	assertDuration("delayMs", delayMs);
	return () => delayMs;
}

/**
 * Linear increasing delay.
 *
 * @param baseDelay - Delay after the first failed attempt
 * @param increment - Amount added for each further attempt
 *
 * @example
 * ```typescript
 * await retry(op, { maxAttempts: 6, delay: linear(100, 50) })
 * // Delays: 100, 150, 200, 250, 300ms
 * ```
 */
export function linear(baseDelay: number, increment: number): RetryDelayFn {
	return (attempt: number): number => {
		return Math.max(0, baseDelay + increment * (attempt - 1));
	};
}

/**
 * Exponential backoff with optional jitter.
 *
 * @param options.initial - Initial delay in ms (default: 100)
 * @param options.max - Maximum delay in ms (default: 30000)
 * @param options.multiplier - Multiplier for each attempt (default: 2)
 * @param options.jitter - Jitter factor 0-1 (default: 0). 0 = no jitter, 1 = full jitter
 *
 * @example
 * ```typescript
 * await retry(op, {
 *   maxAttempts: 6,
 *   delay: exponentialBackoff({ initial: 100, max: 5000, jitter: 0.3 }),
 * })
 * // Delays: ~100ms, ~200ms, ~400ms, ~800ms, ~1600ms (with ±30% jitter)
 * ```
 */
export function exponentialBackoff({
	initial = 100,
	max = 30000,
	multiplier = 2,
	jitter = 0,
}: {
	initial?: number;
	max?: number;
	multiplier?: number;
	jitter?: number;
} = {}): RetryDelayFn {
	return (attempt: number): number => {
		const cappedDelay = Math.min(initial * multiplier ** (attempt - 1), max);
		return jitter > 0 ? spread(cappedDelay, jitter) : cappedDelay;
	};
}

/**
 * Fixed delay with jitter.
 *
 * @param baseDelay - Base delay in ms
 * @param jitterFactor - Jitter factor 0-1 (default: 0.1)
 *
 * @example
 * ```typescript
 * await retry(op, { delay: jitter(1000, 0.2), timeout: 10_000 })
 * // Delays: ~800-1200ms each time
 * ```
 */
export function jitter(baseDelay: number, jitterFactor = 0.1): RetryDelayFn {
	return (): number => {
		if (jitterFactor <= 0) return baseDelay;
		return spread(baseDelay, jitterFactor);
	};
}

function spread(delay: number, factor: number): number {
	const amount = delay * factor;
	const minDelay = Math.max(0, delay - amount);
	const maxDelay = delay + amount;
	return Math.floor(Math.random() * (maxDelay - minDelay) + minDelay);
}
