/**
 * Built-in error classes for bounded-exec
 */

import type { CancelKind } from "./types.js";

/**
 * UnknownError - wraps values thrown by a task that are not `Error`s,
 * so a failed result always carries an `Error`.
 *
 * @example
 * ```typescript
 * const { result: [err] } = await runTask(task(1, () => { throw "boom" }), signal)
 * err instanceof UnknownError // true, err.cause === "boom"
 * ```
 */
export class UnknownError extends Error {
	readonly _tag = "UnknownError" as const;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "UnknownError";
	}
}

/**
 * CancelledError - the reason carried by every cancellation signal this
 * library fires, and the rejection of every wait that the signal cut short.
 *
 * `kind` tells a deadline expiry apart from an explicit cancel. `reason`
 * keeps whatever the caller passed to `cancel()` or the parent signal's
 * own reason.
 */
export class CancelledError extends Error {
	readonly _tag = "CancelledError" as const;
	readonly kind: CancelKind;
	readonly reason: unknown;

	constructor(kind: CancelKind, reason?: unknown) {
		super(CancelledError.describe(kind, reason), { cause: reason });
		this.name = "CancelledError";
		this.kind = kind;
		this.reason = reason;
	}

	private static describe(kind: CancelKind, reason: unknown): string {
		if (typeof reason === "string") return reason;
		if (reason instanceof Error) return reason.message;
		return kind === "deadline" ? "deadline exceeded" : "cancelled";
	}
}

/**
 * RetryExhaustedError - a retry loop reached its maximum attempt count
 * without a success. The last failure is kept as `cause`.
 */
export class RetryExhaustedError extends Error {
	readonly _tag = "RetryExhaustedError" as const;
	readonly attempts: number;

	constructor(attempts: number, lastError: unknown) {
		super(`gave up after ${attempts} attempt${attempts === 1 ? "" : "s"}`, {
			cause: lastError,
		});
		this.name = "RetryExhaustedError";
		this.attempts = attempts;
	}
}

/**
 * Normalizes an abort reason into a CancelledError. Reasons that already
 * are one pass through unchanged; anything else becomes kind `cancelled`.
 */
export function toCancelledError(reason: unknown): CancelledError {
	if (reason instanceof CancelledError) return reason;
	return new CancelledError("cancelled", reason);
}

/**
 * Wraps a thrown value into an Error, keeping Errors as they are.
 */
export function toError(value: unknown): Error {
	if (value instanceof Error) return value;
	return new UnknownError(
		typeof value === "string" ? value : "task failed with a non-Error value",
		{ cause: value },
	);
}
