/**
 * Exact-count dispatch for bounded-exec
 */

import createDebug from "debug";
import { AdmissionGate } from "./admission-gate.js";
import { CancellationController } from "./cancellation.js";
import { Channel } from "./channel.js";
import { Collector } from "./collector.js";
import { assertCount } from "./config.js";
import type { CancelledError } from "./errors.js";
import { createLogger } from "./logger.js";
import { TaskRunner } from "./runner.js";
import { assertUniqueIds } from "./task.js";
import { endRunSpan, type RunSpan, startRunSpan } from "./tracing.js";
import type {
	ExecutionMetrics,
	Logger,
	OverflowPolicy,
	RunOptions,
	RunReport,
	Task,
	TaskResult,
} from "./types.js";

const debugFanOut = createDebug("bounded-exec:fan-out");

let executionIdCounter = 0;

/**
 * Options for fanOut
 */
export interface FanOutOptions extends RunOptions {
	/**
	 * Maximum number of tasks running at once. Creates a private
	 * AdmissionGate. Without it (and without `gate`) every task starts
	 * immediately.
	 */
	concurrency?: number;
	/**
	 * Share an existing gate, e.g. to cap several runs together.
	 */
	gate?: AdmissionGate;
	/**
	 * Result channel configuration.
	 * Defaults to a capacity equal to the task count with overflow `block`,
	 * so no worker ever waits to publish.
	 */
	results?: {
		capacity?: number;
		overflow?: OverflowPolicy;
	};
}

/**
 * A running fan-out. Iterate it (once) for results as they arrive, or call
 * `collect()` for a RunReport.
 */
export class Execution<T>
	implements AsyncIterable<TaskResult<T>>, AsyncDisposable
{
	readonly name: string;
	private readonly cancellation: CancellationController;
	private readonly gate: AdmissionGate | undefined;
	private readonly channel: Channel<TaskResult<T>>;
	private readonly collector: Collector<T>;
	private readonly runner: TaskRunner<T>;
	private readonly logger: Logger;
	private readonly runSpan: RunSpan | undefined;
	private readonly settled: Promise<void>;

	constructor(tasks: readonly Task<T>[], options: FanOutOptions = {}) {
		assertUniqueIds(tasks);
		this.name = options.name ?? `fan-out-${++executionIdCounter}`;
		this.logger = createLogger(this.name, options.logger, options.logLevel);
		const overflow = options.results?.overflow ?? "block";
		const capacity = assertCount(
			"results.capacity",
			options.results?.capacity ?? tasks.length,
			{ allowInfinity: true },
		);
		if (overflow === "block" && capacity < tasks.length) {
			throw new RangeError(
				`results.capacity (${capacity}) must be at least the task count (${tasks.length}) with overflow "block"`,
			);
		}

		this.cancellation = new CancellationController({
			timeout: options.timeout,
			signal: options.signal,
			name: this.name,
		});
		const signal = this.cancellation.signal;

		if (options.gate) {
			this.gate = options.gate;
		} else if (options.concurrency !== undefined) {
			this.gate = new AdmissionGate(options.concurrency, signal);
		}

		this.channel = new Channel<TaskResult<T>>(capacity);
		this.collector = new Collector(this.channel, signal, this, tasks.length);

		this.runSpan = startRunSpan(options.tracer, this.name, {
			"run.mode": "fan-out",
			"run.tasks": tasks.length,
			"run.concurrency": this.gate?.capacity ?? tasks.length,
			"run.results_capacity": capacity,
			"run.overflow": overflow,
		});
		this.runner = new TaskRunner({
			name: this.name,
			logger: this.logger,
			output: this.channel,
			overflow,
			gate: this.gate,
			runSpan: this.runSpan,
		});
		this.runner.counters.dispatched = tasks.length;

		if (debugFanOut.enabled) {
			debugFanOut(
				"[%s] dispatching %d task(s) (gate: %s, results: %d/%s)",
				this.name,
				tasks.length,
				this.gate ? this.gate.capacity : "none",
				capacity,
				overflow,
			);
		}
		this.logger.info(`dispatching ${tasks.length} task(s)`);

		this.settled = Promise.all(tasks.map((t) => this.runner.process(t, signal)))
			.then(() => {
				if (debugFanOut.enabled) {
					debugFanOut("[%s] every execution settled", this.name);
				}
			})
			.finally(() => {
				this.channel.close();
			});
	}

	/**
	 * The run's cancellation signal.
	 */
	get signal(): AbortSignal {
		return this.cancellation.signal;
	}

	/**
	 * Counters as of now.
	 */
	metrics(): ExecutionMetrics {
		return { ...this.runner.counters };
	}

	cancellationReason(): CancelledError | undefined {
		return this.cancellation.reason;
	}

	/**
	 * Fire the run's cancellation signal.
	 */
	cancel(reason?: unknown): boolean {
		return this.cancellation.cancel(reason);
	}

	/**
	 * Resolves once every execution has settled (published, dropped or
	 * given up on its permit).
	 */
	done(): Promise<void> {
		return this.settled;
	}

	[Symbol.asyncIterator](): AsyncIterator<TaskResult<T>> {
		return this.collector[Symbol.asyncIterator]();
	}

	/**
	 * Drain every result (or stop at cancellation) and summarize the run.
	 */
	async collect(): Promise<RunReport<T>> {
		const report = await this.collector.collect();
		this.finish(report);
		return report;
	}

	/**
	 * Cancel whatever is still running and wait for it to settle.
	 */
	async [Symbol.asyncDispose](): Promise<void> {
		this.cancellation.cancel("execution disposed");
		await this.settled;
		this.cancellation[Symbol.dispose]();
	}

	private finish(report: RunReport<T>): void {
		if (report.status === "cancelled") {
			// Tell tasks still in flight to stop
			this.cancellation.cancel(report.reason);
		}
		this.cancellation[Symbol.dispose]();
		endRunSpan(this.runSpan, report);
		if (report.status === "completed") {
			this.logger.info(
				`completed: ${report.results.length} result(s), ${report.dropped} dropped`,
			);
		} else {
			this.logger.warn(
				`cancelled (${report.reason?.kind}): ${report.results.length} of ${report.metrics.dispatched} result(s) collected`,
			);
		}
	}
}

/**
 * Run every task concurrently, one execution per task, and collect exactly
 * one result per task.
 *
 * @example
 * ```typescript
 * const report = await fanOut(
 *   urls.map((url) => task(url, ({ signal }) => fetch(url, { signal }))),
 *   { concurrency: 4, timeout: 10_000 },
 * ).collect()
 *
 * if (report.status === "cancelled") {
 *   console.log(`partial: ${report.results.length}/${urls.length}`)
 * }
 * ```
 */
export function fanOut<T>(
	tasks: readonly Task<T>[],
	options?: FanOutOptions,
): Execution<T> {
	return new Execution(tasks, options);
}
