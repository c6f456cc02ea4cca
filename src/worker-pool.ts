/**
 * Fixed-worker-pool dispatch for bounded-exec
 */

import createDebug from "debug";
import type { AdmissionGate } from "./admission-gate.js";
import { CancellationController, linkSignals } from "./cancellation.js";
import { Channel } from "./channel.js";
import { Collector } from "./collector.js";
import { assertCount, defaultConcurrency } from "./config.js";
import { CancelledError, toCancelledError } from "./errors.js";
import { createLogger } from "./logger.js";
import { TaskRunner } from "./runner.js";
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
import { Valve } from "./valve.js";

const debugPool = createDebug("bounded-exec:pool");

let poolIdCounter = 0;

/**
 * Options for creating a WorkerPool
 */
export interface WorkerPoolOptions extends RunOptions {
	/**
	 * Number of long-lived workers. Default: available parallelism.
	 */
	workers?: number;
	/**
	 * Input buffer size. `0` makes every submit a rendezvous with a worker.
	 * Default: the worker count.
	 */
	queueCapacity?: number;
	/**
	 * Result buffer size. Default: unbounded, so workers never wait on a
	 * slow consumer.
	 */
	resultCapacity?: number;
	/**
	 * What a worker does when the result buffer is full. Default: `block`.
	 */
	resultOverflow?: OverflowPolicy;
	/**
	 * Optional gate every task must pass, e.g. to cap several pools together.
	 */
	gate?: AdmissionGate;
}

/**
 * A fixed number of workers pulling tasks from a shared bounded input
 * until it is closed and drained.
 *
 * `close()` is the only shutdown signal. Call it once, after the last
 * submission; tasks buffered before it are still run.
 *
 * @example
 * ```typescript
 * const pool = new WorkerPool<Thumbnail>({ workers: 4, queueCapacity: 8 })
 *
 * for (const image of images) {
 *   await pool.submit(task(image.id, ({ signal }) => resize(image, signal)))
 * }
 * pool.close()
 *
 * for await (const { id, result: [err, thumb] } of pool) {
 *   if (err) console.error(id, err)
 *   else save(thumb)
 * }
 * ```
 */
export class WorkerPool<T>
	implements AsyncIterable<TaskResult<T>>, AsyncDisposable
{
	readonly name: string;
	private readonly cancellation: CancellationController;
	private readonly input: Channel<Task<T>>;
	private readonly output: Channel<TaskResult<T>>;
	private readonly valve = new Valve();
	private readonly runner: TaskRunner<T>;
	private readonly collector: Collector<T>;
	private readonly logger: Logger;
	private readonly runSpan: RunSpan | undefined;
	private readonly finished: Promise<void>;
	private inputClosed = false;

	constructor(options: WorkerPoolOptions = {}) {
		this.name = options.name ?? `pool-${++poolIdCounter}`;
		this.logger = createLogger(this.name, options.logger, options.logLevel);
		const workers = assertCount("workers", options.workers ?? defaultConcurrency(), {
			min: 1,
		});
		const queueCapacity = options.queueCapacity ?? workers;
		const resultCapacity = options.resultCapacity ?? Number.POSITIVE_INFINITY;
		const overflow = options.resultOverflow ?? "block";

		this.cancellation = new CancellationController({
			timeout: options.timeout,
			signal: options.signal,
			name: this.name,
		});
		this.input = new Channel<Task<T>>(queueCapacity);
		this.output = new Channel<TaskResult<T>>(resultCapacity);
		this.collector = new Collector(this.output, this.cancellation.signal, this);

		this.runSpan = startRunSpan(options.tracer, this.name, {
			"run.mode": "worker-pool",
			"run.workers": workers,
			"run.queue_capacity": queueCapacity,
			"run.results_capacity": resultCapacity,
			"run.overflow": overflow,
		});
		this.runner = new TaskRunner({
			name: this.name,
			logger: this.logger,
			output: this.output,
			overflow,
			gate: options.gate,
			runSpan: this.runSpan,
		});

		if (debugPool.enabled) {
			debugPool(
				"[%s] starting %d worker(s) (queue: %d, results: %d/%s)",
				this.name,
				workers,
				queueCapacity,
				resultCapacity,
				overflow,
			);
		}
		this.logger.info(`starting ${workers} worker(s)`);

		this.finished = Promise.all(
			Array.from({ length: workers }, (_, index) => this.work(index)),
		)
			.then(() => {
				// Tasks still buffered when cancellation stopped the workers
				this.runner.counters.notStarted += this.input.size;
				if (debugPool.enabled) {
					debugPool("[%s] every worker exited", this.name);
				}
			})
			.finally(() => {
				this.output.close();
			});
	}

	/**
	 * Hand a task to the workers, waiting while the input buffer is full.
	 * Throws if the pool is closed; rejects with a CancelledError if the pool
	 * or `signal` is cancelled before a slot frees up.
	 */
	async submit(t: Task<T>, signal?: AbortSignal): Promise<void> {
		this.assertOpen();
		if (this.cancellation.fired) {
			throw toCancelledError(this.cancellation.signal.reason);
		}
		let accepted: boolean;
		if (signal) {
			const linked = linkSignals([this.cancellation.signal, signal]);
			try {
				accepted = await this.input.send(t, linked.signal);
			} finally {
				linked[Symbol.dispose]();
			}
		} else {
			accepted = await this.input.send(t, this.cancellation.signal);
		}
		if (!accepted) {
			throw new Error(
				`pool ${this.name} was closed before task ${String(t.id)} was accepted`,
			);
		}
		this.runner.counters.dispatched++;
	}

	/**
	 * Hand a task to the workers without waiting.
	 * A full input buffer drops the task and counts it.
	 */
	offer(t: Task<T>): "accepted" | "dropped" {
		this.assertOpen();
		if (this.cancellation.fired) {
			throw toCancelledError(this.cancellation.signal.reason);
		}
		const outcome = this.input.trySend(t);
		if (outcome === "closed") {
			throw new Error(`cannot submit to closed pool ${this.name}`);
		}
		this.runner.counters.dispatched++;
		if (outcome === "dropped") {
			this.runner.counters.dropped++;
			this.logger.debug(`task ${String(t.id)} dropped: input buffer full`);
		}
		return outcome;
	}

	/**
	 * Signal that no more tasks will be submitted.
	 * Workers drain what is buffered, then exit. May only be called once.
	 */
	close(): void {
		if (this.inputClosed) {
			throw new Error(`pool ${this.name} is already closed`);
		}
		this.inputClosed = true;
		if (debugPool.enabled) {
			debugPool("[%s] input closed with %d task(s) buffered", this.name, this.input.size);
		}
		this.input.close();
	}

	/**
	 * Whether `close()` has been called.
	 */
	get closed(): boolean {
		return this.inputClosed;
	}

	/**
	 * Stop workers from pulling new tasks. Tasks already running finish.
	 */
	pause(): void {
		this.valve.shut();
		this.logger.debug("paused");
	}

	/**
	 * Let workers pull tasks again.
	 */
	resume(): void {
		this.valve.open();
		this.logger.debug("resumed");
	}

	get paused(): boolean {
		return !this.valve.opened;
	}

	/**
	 * Tasks buffered and not yet taken by a worker.
	 */
	get pending(): number {
		return this.input.size;
	}

	/**
	 * The pool's cancellation signal.
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
	 * Fire the pool's cancellation signal. Workers stop pulling tasks and
	 * the result drain stops waiting.
	 */
	cancel(reason?: unknown): boolean {
		return this.cancellation.cancel(reason);
	}

	/**
	 * Resolves once every worker has exited.
	 */
	done(): Promise<void> {
		return this.finished;
	}

	[Symbol.asyncIterator](): AsyncIterator<TaskResult<T>> {
		return this.collector[Symbol.asyncIterator]();
	}

	/**
	 * Drain every result until the workers exit (or the pool is cancelled)
	 * and summarize the run.
	 */
	async collect(): Promise<RunReport<T>> {
		const collected = await this.collector.collect();
		let report = collected;
		if (collected.status === "completed") {
			await this.finished;
			report = this.collector.report();
		} else {
			// Tell workers and tasks still in flight to stop
			this.cancellation.cancel(collected.reason);
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
		return report;
	}

	/**
	 * Cancel the pool and wait for every worker to exit.
	 */
	async [Symbol.asyncDispose](): Promise<void> {
		this.cancellation.cancel("pool disposed");
		if (!this.inputClosed) {
			this.inputClosed = true;
			this.input.close();
		}
		await this.finished;
		this.cancellation[Symbol.dispose]();
	}

	private assertOpen(): void {
		if (this.inputClosed) {
			throw new Error(`cannot submit to closed pool ${this.name}`);
		}
	}

	private async work(index: number): Promise<void> {
		const signal = this.cancellation.signal;
		if (debugPool.enabled) {
			debugPool("[%s] worker %d started", this.name, index);
		}

		while (!signal.aborted) {
			let next: Task<T> | undefined;
			try {
				await this.valve.wait(signal);
				next = await this.input.receive(signal);
			} catch (error) {
				if (error instanceof CancelledError) break;
				throw error;
			}
			if (next === undefined) break;
			if (signal.aborted) {
				this.runner.counters.notStarted++;
				break;
			}
			const admitted = await this.runner.process(next, signal);
			if (!admitted) break;
		}

		if (debugPool.enabled) {
			debugPool(
				"[%s] worker %d exiting (%s)",
				this.name,
				index,
				signal.aborted ? toCancelledError(signal.reason).kind : "input drained",
			);
		}
	}
}
