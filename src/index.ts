/**
 * bounded-exec - Bounded concurrent task execution
 *
 * Runs units of async work under an admission gate, delivers their results
 * through bounded channels (optionally dropping on overload), and stops
 * cooperatively on a deadline or an explicit cancel. A standalone retry
 * controller wraps any single fallible operation.
 */

export { AdmissionGate } from "./admission-gate.js";
export {
	CancellationController,
	type CancellationOptions,
	type LinkedSignal,
	linkSignals,
	onAbort,
	sleep,
	throwIfAborted,
	whenAborted,
} from "./cancellation.js";
export { Channel } from "./channel.js";
export {
	Collector,
	type CollectorSource,
	type DrainOptions,
	drain,
} from "./collector.js";
export { defaultConcurrency } from "./config.js";
export {
	CancelledError,
	RetryExhaustedError,
	toCancelledError,
	UnknownError,
} from "./errors.js";
export { Execution, type FanOutOptions, fanOut } from "./fan-out.js";
export { ConsoleLogger, createLogger, NoOpLogger } from "./logger.js";
export {
	type RetryContext,
	type RetryOptions,
	type RetryOutcome,
	retry,
	retrying,
	withRetry,
} from "./retry.js";
export {
	exponentialBackoff,
	fixed,
	jitter,
	linear,
} from "./retry-strategies.js";
export { runTask, task } from "./task.js";
export type {
	CancelKind,
	Context,
	ExecutionMetrics,
	Failure,
	Logger,
	LogLevel,
	OfferOutcome,
	OverflowPolicy,
	Result,
	RetryDelayFn,
	RunOptions,
	RunReport,
	RunStatus,
	Span,
	Success,
	Task,
	TaskContext,
	TaskId,
	TaskResult,
	Tracer,
} from "./types.js";
export { Valve } from "./valve.js";
export { WorkerPool, type WorkerPoolOptions } from "./worker-pool.js";
