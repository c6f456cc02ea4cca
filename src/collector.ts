/**
 * Result collection for bounded-exec
 */

import createDebug from "debug";
import type { Channel } from "./channel.js";
import { CancelledError } from "./errors.js";
import type { ExecutionMetrics, RunReport, TaskResult } from "./types.js";

const debugCollect = createDebug("bounded-exec:collector");

/**
 * Options for draining a channel.
 */
export interface DrainOptions {
	/**
	 * Stop after this many values. Without it, draining runs until the
	 * channel is closed and empty.
	 */
	expected?: number;
	/**
	 * Stops the drain while it waits for the next value.
	 */
	signal: AbortSignal;
	/**
	 * Called with the CancelledError when the signal stops the drain.
	 */
	onCancel?: (reason: CancelledError) => void;
}

/**
 * Yield values from `channel` until `expected` values have arrived, the
 * channel is closed and empty, or `signal` fires while waiting.
 * Values already buffered are still yielded after the signal fired.
 *
 * @example
 * ```typescript
 * for await (const result of drain(results, { expected: 10, signal })) {
 *   console.log(result.id)
 * }
 * ```
 */
export async function* drain<T>(
	channel: Channel<T>,
	options: DrainOptions,
): AsyncGenerator<T, void, undefined> {
	const { expected, signal, onCancel } = options;
	let received = 0;

	while (expected === undefined || received < expected) {
		let value: T | undefined;
		try {
			value = await channel.receive(signal);
		} catch (error) {
			if (error instanceof CancelledError) {
				if (debugCollect.enabled) {
					debugCollect(
						"drain stopped by cancellation after %d value(s): %s",
						received,
						error.message,
					);
				}
				onCancel?.(error);
				return;
			}
			throw error;
		}
		if (value === undefined) return;
		received++;
		yield value;
	}
}

/**
 * What a collector needs from the dispatcher feeding it.
 */
export interface CollectorSource {
	/** Counters as of now. */
	metrics(): ExecutionMetrics;
	/** The run's cancellation reason, if it fired. */
	cancellationReason(): CancelledError | undefined;
}

/**
 * A single-use, lazy sequence of task results that can also be gathered
 * into a RunReport.
 */
export class Collector<T> implements AsyncIterable<TaskResult<T>> {
	private consumed = false;
	private stopReason: CancelledError | undefined;
	private readonly received: TaskResult<T>[] = [];

	constructor(
		private readonly channel: Channel<TaskResult<T>>,
		private readonly signal: AbortSignal,
		private readonly source: CollectorSource,
		private readonly expected?: number,
	) {}

	/**
	 * Yields results as they arrive. Can only be iterated once.
	 */
	async *[Symbol.asyncIterator](): AsyncIterator<TaskResult<T>> {
		if (this.consumed) {
			throw new Error("results can only be consumed once");
		}
		this.consumed = true;

		for await (const result of drain(this.channel, {
			expected: this.expected,
			signal: this.signal,
			onCancel: (reason) => {
				this.stopReason = reason;
			},
		})) {
			this.received.push(result);
			yield result;
		}
	}

	/**
	 * Drain everything and summarize the run.
	 */
	async collect(): Promise<RunReport<T>> {
		for await (const _ of this) {
			// results are recorded by the iterator
		}
		return this.report();
	}

	/**
	 * Summary of what has been received so far.
	 */
	report(): RunReport<T> {
		const metrics = this.source.metrics();
		const results = [...this.received];
		const accounted = results.length + metrics.dropped === metrics.dispatched;

		if (accounted && this.stopReason === undefined) {
			return { status: "completed", results, dropped: metrics.dropped, metrics };
		}

		const reason =
			this.stopReason ??
			this.source.cancellationReason() ??
			new CancelledError("cancelled", "run stopped before every task settled");
		return {
			status: "cancelled",
			results,
			dropped: metrics.dropped,
			reason,
			metrics,
		};
	}
}
