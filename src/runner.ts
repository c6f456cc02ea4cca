/**
 * Per-task execution shared by the dispatchers: admission, running,
 * bookkeeping and publishing of the result.
 */

import createDebug from "debug";
import type { AdmissionGate } from "./admission-gate.js";
import type { Channel } from "./channel.js";
import { CancelledError } from "./errors.js";
import { runTask } from "./task.js";
import { endTaskSpan, type RunSpan, startTaskSpan } from "./tracing.js";
import type {
	ExecutionMetrics,
	Logger,
	OverflowPolicy,
	Task,
	TaskResult,
} from "./types.js";

const debugRunner = createDebug("bounded-exec:runner");

export interface TaskRunnerOptions<T> {
	name: string;
	logger: Logger;
	output: Channel<TaskResult<T>>;
	overflow: OverflowPolicy;
	gate: AdmissionGate | undefined;
	runSpan: RunSpan | undefined;
}

export class TaskRunner<T> {
	readonly counters: ExecutionMetrics = {
		dispatched: 0,
		started: 0,
		succeeded: 0,
		failed: 0,
		dropped: 0,
		notStarted: 0,
		peakConcurrency: 0,
	};
	private running = 0;

	constructor(private readonly options: TaskRunnerOptions<T>) {}

	/**
	 * Admit, run and publish one task.
	 * Returns false when the task was never admitted because the run was
	 * cancelled first.
	 */
	async process(t: Task<T>, signal: AbortSignal): Promise<boolean> {
		const { gate } = this.options;
		if (gate) {
			try {
				await gate.acquire(signal);
			} catch (error) {
				if (!(error instanceof CancelledError)) throw error;
				this.counters.notStarted++;
				if (debugRunner.enabled) {
					debugRunner(
						"[%s] task %s never admitted: %s",
						this.options.name,
						t.id,
						error.message,
					);
				}
				return false;
			}
		}

		try {
			const outcome = await this.execute(t, signal);
			await this.publish(outcome, signal);
			return true;
		} finally {
			gate?.release();
		}
	}

	private async execute(
		t: Task<T>,
		signal: AbortSignal,
	): Promise<TaskResult<T>> {
		this.counters.started++;
		this.running++;
		if (this.running > this.counters.peakConcurrency) {
			this.counters.peakConcurrency = this.running;
		}
		const span = startTaskSpan(this.options.runSpan, t.id);
		const startTime = performance.now();
		try {
			const outcome = await runTask(t, signal);
			const [err] = outcome.result;
			if (err) {
				this.counters.failed++;
				this.options.logger.debug(
					`task ${String(t.id)} failed: ${err.message}`,
				);
			} else {
				this.counters.succeeded++;
			}
			endTaskSpan(span, outcome, performance.now() - startTime);
			return outcome;
		} finally {
			this.running--;
		}
	}

	private async publish(
		outcome: TaskResult<T>,
		signal: AbortSignal,
	): Promise<void> {
		const { output, overflow, logger } = this.options;
		if (overflow === "drop") {
			if (output.trySend(outcome) === "dropped") {
				this.counters.dropped++;
				logger.debug(`result of task ${String(outcome.id)} dropped`);
			}
			return;
		}
		try {
			await output.send(outcome, signal);
		} catch (error) {
			if (!(error instanceof CancelledError)) throw error;
			if (debugRunner.enabled) {
				debugRunner(
					"[%s] result of task %s not delivered: %s",
					this.options.name,
					outcome.id,
					error.message,
				);
			}
		}
	}
}
