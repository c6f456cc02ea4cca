/**
 * AdmissionGate class for bounded-exec - counting permit pool
 */

import createDebug from "debug";
import { onAbort } from "./cancellation.js";
import { assertCount, defaultConcurrency } from "./config.js";
import { CancelledError, toCancelledError } from "./errors.js";

const debugGate = createDebug("bounded-exec:gate");

interface Waiter {
	resolve: () => void;
	reject: (reason: unknown) => void;
	settled: boolean;
	subscription: Disposable | undefined;
}

/**
 * A counting permit pool limiting how many units of work run at once,
 * independent of how many have been dispatched.
 *
 * Waiters are served in arrival order. A waiter whose signal fires leaves
 * the queue and never receives a permit. At no point are more than
 * `capacity` permits held.
 *
 * @example
 * ```typescript
 * const gate = new AdmissionGate(3)
 *
 * await Promise.all(
 *   files.map((file) => gate.execute(() => upload(file), signal)),
 * )
 * ```
 */
export class AdmissionGate implements AsyncDisposable {
	private held = 0;
	private peak = 0;
	private readonly permits: number;
	private queue: Waiter[] = [];
	private queueHead = 0; // Index of first live waiter (avoids O(n) shift)
	private aborted = false;
	private abortReason: CancelledError | undefined;

	constructor(capacity: number = defaultConcurrency(), parentSignal?: AbortSignal) {
		this.permits = assertCount("capacity", capacity, { min: 1 });

		if (parentSignal) {
			if (parentSignal.aborted) {
				this.abort(toCancelledError(parentSignal.reason));
			} else {
				parentSignal.addEventListener(
					"abort",
					() => {
						this.abort(toCancelledError(parentSignal.reason));
					},
					{ once: true },
				);
			}
		}
	}

	/**
	 * Wait for a permit.
	 * Rejects with a CancelledError if the gate's parent signal or `signal`
	 * fires before a permit is granted, and immediately if either already has.
	 */
	acquire(signal?: AbortSignal): Promise<void> {
		if (this.aborted) {
			return Promise.reject(this.abortReason);
		}
		if (signal?.aborted) {
			return Promise.reject(toCancelledError(signal.reason));
		}

		if (this.held < this.permits) {
			this.grant();
			return Promise.resolve();
		}

		if (debugGate.enabled) {
			debugGate(
				"no permit free (%d/%d held), queueing waiter #%d",
				this.held,
				this.permits,
				this.waiting + 1,
			);
		}

		return new Promise<void>((resolve, reject) => {
			const waiter: Waiter = {
				resolve,
				reject,
				settled: false,
				subscription: undefined,
			};
			if (signal) {
				waiter.subscription = onAbort(signal, (reason) => {
					if (waiter.settled) return;
					waiter.settled = true;
					if (debugGate.enabled) {
						debugGate("waiter cancelled before a permit was free");
					}
					reject(toCancelledError(reason));
				});
			}
			this.queue.push(waiter);
		});
	}

	/**
	 * Take a permit if one is free right now.
	 */
	tryAcquire(): boolean {
		if (this.aborted || this.held >= this.permits) return false;
		this.grant();
		return true;
	}

	/**
	 * Return a permit. Never blocks.
	 * The permit passes straight to the oldest live waiter, if any.
	 */
	release(): void {
		if (this.held === 0) {
			throw new Error("AdmissionGate.release() called without a held permit");
		}

		const next = this.nextWaiter();
		if (next) {
			// Permit changes hands; the held count stays the same.
			next.settled = true;
			next.subscription?.[Symbol.dispose]();
			next.resolve();
			return;
		}

		this.held--;
	}

	/**
	 * Acquire a permit, run `fn`, and release the permit on every exit path.
	 */
	async execute<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
		await this.acquire(signal);
		try {
			return await fn();
		} finally {
			this.release();
		}
	}

	/**
	 * Total number of permits.
	 */
	get capacity(): number {
		return this.permits;
	}

	/**
	 * Permits free right now.
	 */
	get available(): number {
		return this.permits - this.held;
	}

	/**
	 * Permits held right now.
	 */
	get inUse(): number {
		return this.held;
	}

	/**
	 * Highest number of permits held at the same time so far.
	 */
	get peakInUse(): number {
		return this.peak;
	}

	/**
	 * Acquirers still waiting for a permit.
	 */
	get waiting(): number {
		let count = 0;
		for (let i = this.queueHead; i < this.queue.length; i++) {
			if (!this.queue[i]?.settled) count++;
		}
		return count;
	}

	/**
	 * Dispose the gate, rejecting all pending and future acquires.
	 */
	async [Symbol.asyncDispose](): Promise<void> {
		this.abort(new CancelledError("cancelled", "admission gate disposed"));
	}

	private grant(): void {
		this.held++;
		if (this.held > this.peak) {
			this.peak = this.held;
		}
	}

	private nextWaiter(): Waiter | undefined {
		while (this.queueHead < this.queue.length) {
			const waiter = this.queue[this.queueHead++];
			if (waiter && !waiter.settled) {
				this.compact();
				return waiter;
			}
		}
		this.queue = [];
		this.queueHead = 0;
		return undefined;
	}

	private compact(): void {
		if (this.queueHead > 100 && this.queueHead > this.queue.length / 2) {
			this.queue = this.queue.slice(this.queueHead);
			this.queueHead = 0;
		}
	}

	private abort(reason: CancelledError): void {
		if (this.aborted) return;
		this.aborted = true;
		this.abortReason = reason;
		if (debugGate.enabled) {
			debugGate("aborting gate, rejecting %d waiter(s)", this.waiting);
		}
		for (let i = this.queueHead; i < this.queue.length; i++) {
			const waiter = this.queue[i];
			if (waiter && !waiter.settled) {
				waiter.settled = true;
				waiter.subscription?.[Symbol.dispose]();
				waiter.reject(reason);
			}
		}
		this.queue = [];
		this.queueHead = 0;
	}
}
