/**
 * Retry controller for bounded-exec
 */

import createDebug from "debug";
import { CancellationController, sleep } from "./cancellation.js";
import { assertCount, assertDuration } from "./config.js";
import { CancelledError, RetryExhaustedError } from "./errors.js";
import { createLogger } from "./logger.js";
import type {
	Logger,
	LogLevel,
	RetryDelayFn,
	TaskContext,
} from "./types.js";

const debugRetry = createDebug("bounded-exec:retry");

/**
 * Passed to the operation on every attempt.
 */
export interface RetryContext {
	readonly signal: AbortSignal;
	/** 1-based attempt number */
	readonly attempt: number;
}

/**
 * Options for retry
 */
export interface RetryOptions {
	/**
	 * Delay between attempts in milliseconds.
	 * Can be a fixed number, a function, or use built-in strategies:
	 * - `fixed(ms)`
	 * - `exponentialBackoff({ initial, max, jitter })`
	 * - `jitter(baseDelay, jitterFactor)`
	 * - `linear(baseDelay, increment)`
	 * Default: 0 (no delay)
	 */
	delay?: number | RetryDelayFn;
	/**
	 * Give up after this many attempts. Default: no limit; only
	 * cancellation ends the loop.
	 */
	maxAttempts?: number;
	/**
	 * Deadline in milliseconds for the whole retry loop.
	 */
	timeout?: number;
	/**
	 * Parent signal; when it aborts, the loop stops.
	 */
	signal?: AbortSignal;
	/**
	 * Return false to stop retrying on this error. Default: retry all errors.
	 */
	retryCondition?: (error: unknown) => boolean;
	/**
	 * Called before each wait, with the error and the attempt that failed.
	 */
	onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
	/** Name used in log prefixes and debug output. */
	name?: string;
	logger?: Logger;
	logLevel?: LogLevel;
}

interface OutcomeBase {
	/** Attempts made, including the last one */
	attempts: number;
	/** Milliseconds from the start of the loop to its end */
	elapsedMs: number;
}

/**
 * Terminal state of a retry loop.
 * - `done`: an attempt succeeded
 * - `aborted`: the cancellation signal fired (before, between or right
 *   after attempts)
 * - `exhausted`: `maxAttempts` attempts all failed
 * - `failed`: `retryCondition` refused to retry an error
 */
export type RetryOutcome<T> =
	| (OutcomeBase & { status: "done"; value: T })
	| (OutcomeBase & {
			status: "aborted";
			error: CancelledError;
			lastError: unknown;
	  })
	| (OutcomeBase & {
			status: "exhausted";
			error: RetryExhaustedError;
			lastError: unknown;
	  })
	| (OutcomeBase & { status: "failed"; error: unknown; lastError: unknown });

let retryIdCounter = 0;

/**
 * Call `operation` until it succeeds or the cancellation signal fires,
 * waiting `delay` between attempts.
 *
 * After a failed attempt the signal is checked right away, so a deadline
 * that expired during the attempt ends the loop without another wait. The
 * wait itself races the signal and is cut short when it fires.
 *
 * @example
 * ```typescript
 * const outcome = await retry(
 *   ({ signal }) => fetch(url, { signal }).then(assertOk),
 *   { delay: 250, timeout: 5000 },
 * )
 *
 * switch (outcome.status) {
 *   case "done": return outcome.value
 *   case "aborted": throw outcome.error       // CancelledError
 *   default: throw outcome.error
 * }
 * ```
 */
export async function retry<T>(
	operation: (ctx: RetryContext) => Promise<T> | T,
	options: RetryOptions = {},
): Promise<RetryOutcome<T>> {
	const name = options.name ?? `retry-${++retryIdCounter}`;
	const logger = createLogger(name, options.logger, options.logLevel);
	const delay = options.delay ?? 0;
	if (typeof delay === "number") {
		assertDuration("delay", delay);
	}
	const { maxAttempts } = options;
	if (maxAttempts !== undefined) {
		assertCount("maxAttempts", maxAttempts, { min: 1 });
	}
	const retryCondition = options.retryCondition ?? (() => true);

	const cancellation = new CancellationController({
		timeout: options.timeout,
		signal: options.signal,
		name,
	});
	const { signal } = cancellation;
	const startedAt = Date.now();
	let attempts = 0;
	let lastError: unknown;

	const aborted = (): RetryOutcome<T> => {
		const error = cancellation.reason ?? new CancelledError("cancelled");
		if (debugRetry.enabled) {
			debugRetry("[%s] aborted after %d attempt(s): %s", name, attempts, error.message);
		}
		logger.warn(`aborted after ${attempts} attempt(s): ${error.message}`);
		return {
			status: "aborted",
			error,
			lastError,
			attempts,
			elapsedMs: Date.now() - startedAt,
		};
	};

	try {
		while (true) {
			if (cancellation.fired) {
				return aborted();
			}

			attempts++;
			try {
				if (debugRetry.enabled) {
					debugRetry(
						"[%s] attempt %d%s",
						name,
						attempts,
						maxAttempts === undefined ? "" : `/${maxAttempts}`,
					);
				}
				const value = await operation({ signal, attempt: attempts });
				if (attempts > 1) {
					logger.info(`succeeded on attempt ${attempts}`);
				}
				return {
					status: "done",
					value,
					attempts,
					elapsedMs: Date.now() - startedAt,
				};
			} catch (error) {
				lastError = error;
			}

			if (!retryCondition(lastError)) {
				logger.warn(`attempt ${attempts} failed with a non-retryable error`);
				return {
					status: "failed",
					error: lastError,
					lastError,
					attempts,
					elapsedMs: Date.now() - startedAt,
				};
			}

			// The deadline may have expired during the failing attempt
			if (cancellation.fired) {
				return aborted();
			}

			if (maxAttempts !== undefined && attempts >= maxAttempts) {
				const error = new RetryExhaustedError(attempts, lastError);
				logger.warn(error.message);
				return {
					status: "exhausted",
					error,
					lastError,
					attempts,
					elapsedMs: Date.now() - startedAt,
				};
			}

			const delayMs =
				typeof delay === "function" ? delay(attempts, lastError) : delay;
			if (debugRetry.enabled) {
				debugRetry(
					"[%s] attempt %d failed, waiting %dms before retry",
					name,
					attempts,
					delayMs,
				);
			}
			options.onRetry?.(lastError, attempts, delayMs);

			if ((await sleep(delayMs, signal)) === "cancelled") {
				return aborted();
			}
		}
	} finally {
		cancellation[Symbol.dispose]();
	}
}

/**
 * Decorator form of `retry`: binds the operation and options once.
 *
 * @example
 * ```typescript
 * const loadConfig = withRetry(() => readRemoteConfig(), { delay: 100, maxAttempts: 5 })
 * const outcome = await loadConfig()
 * ```
 */
export function withRetry<T>(
	operation: (ctx: RetryContext) => Promise<T> | T,
	options: RetryOptions = {},
): (signal?: AbortSignal) => Promise<RetryOutcome<T>> {
	return (signal) =>
		retry(operation, signal ? { ...options, signal } : options);
}

/**
 * Adapt a retried operation into a task body. The task's signal becomes
 * the retry loop's parent signal; anything but `done` is thrown, so the
 * task's failed result carries a RetryExhaustedError, a CancelledError or
 * the non-retryable error.
 *
 * @example
 * ```typescript
 * const t = task("sync", retrying(({ signal }) => syncOnce(signal), {
 *   delay: exponentialBackoff({ initial: 50 }),
 *   maxAttempts: 4,
 * }))
 * ```
 */
export function retrying<T>(
	operation: (ctx: RetryContext) => Promise<T> | T,
	options: Omit<RetryOptions, "signal"> = {},
): (ctx: TaskContext) => Promise<T> {
	return async ({ id, signal }) => {
		const outcome = await retry(operation, {
			name: String(id),
			...options,
			signal,
		});
		if (outcome.status === "done") {
			return outcome.value;
		}
		throw outcome.error;
	};
}
