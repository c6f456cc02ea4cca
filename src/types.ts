/**
 * Type definitions and interfaces for bounded-exec
 */

import type { Context, Span, Tracer } from "@opentelemetry/api";
import type { CancelledError } from "./errors.js";

// Re-export OpenTelemetry types for users
export type { Context, Span, Tracer };

export type Success<T> = readonly [undefined, T];
export type Failure<E> = readonly [E, undefined];
export type Result<E, T> = Success<T> | Failure<E>;

/**
 * Identifier of a unit of work. Unique within one run.
 */
export type TaskId = string | number;

/**
 * Passed to every task body. The signal is the run's cancellation signal;
 * a task that never looks at it runs to completion regardless.
 */
export interface TaskContext {
	readonly id: TaskId;
	readonly signal: AbortSignal;
}

/**
 * An immutable unit of work.
 */
export interface Task<T> {
	readonly id: TaskId;
	readonly run: (ctx: TaskContext) => Promise<T> | T;
}

/**
 * What a worker publishes once a task has run.
 */
export interface TaskResult<T> {
	readonly id: TaskId;
	readonly result: Result<Error, T>;
}

/**
 * What happens to a publish that would have to wait for buffer space.
 * - `block`: wait for space (guaranteed delivery)
 * - `drop`: discard the item and count it
 */
export type OverflowPolicy = "block" | "drop";

/**
 * Outcome of a non-blocking send.
 */
export type OfferOutcome = "accepted" | "dropped" | "closed";

/**
 * Why a cancellation signal fired.
 */
export type CancelKind = "deadline" | "cancelled";

/**
 * Retry delay function type. `attempt` is the 1-based number of the attempt
 * that just failed.
 */
export type RetryDelayFn = (attempt: number, error: unknown) => number;

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logger interface for structured logging integration.
 * Compatible with pino, winston and console.
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

/**
 * Counters kept by a fan-out execution or a worker pool.
 */
export interface ExecutionMetrics {
	/** Tasks handed to the dispatcher */
	dispatched: number;
	/** Tasks whose body started running */
	started: number;
	/** Tasks that produced a value */
	succeeded: number;
	/** Tasks that produced a failure */
	failed: number;
	/** Results (or, for `offer`, tasks) discarded by the drop policy */
	dropped: number;
	/** Tasks that never ran because the run was cancelled first */
	notStarted: number;
	/** Highest number of task bodies running at the same time */
	peakConcurrency: number;
}

export type RunStatus = "completed" | "cancelled";

/**
 * Everything a collector gathered from one run.
 *
 * `completed` means every dispatched task is accounted for
 * (`results.length + dropped === dispatched`). `cancelled` means the
 * cancellation signal stopped the drain first; `results` then holds
 * whatever arrived before that.
 */
export interface RunReport<T> {
	status: RunStatus;
	results: TaskResult<T>[];
	dropped: number;
	reason?: CancelledError;
	metrics: ExecutionMetrics;
}

/**
 * Options shared by the dispatchers.
 */
export interface RunOptions {
	/** Deadline in milliseconds for the whole run. */
	timeout?: number;
	/** Parent signal; when it aborts, the run is cancelled. */
	signal?: AbortSignal;
	/** Name used in log prefixes, debug output and span names. */
	name?: string;
	/** Logger for lifecycle messages. Defaults to a no-op logger. */
	logger?: Logger;
	/** Builds a ConsoleLogger at this level when no logger is given. */
	logLevel?: LogLevel;
	/** Optional OpenTelemetry tracer; one span per run and per task. */
	tracer?: Tracer;
}
