/**
 * Valve - a wait source that can be switched off
 */

import { onAbort } from "./cancellation.js";
import { toCancelledError } from "./errors.js";

interface Waiter {
	resolve: () => void;
	subscription: Disposable | undefined;
}

/**
 * An open/shut capability. `wait()` passes straight through while the
 * valve is open and suspends while it is shut, until `open()` or the
 * caller's signal fires.
 *
 * @example
 * ```typescript
 * const valve = new Valve()
 * valve.shut()
 * setTimeout(() => valve.open(), 1000)
 * await valve.wait(signal) // resumes after ~1s
 * ```
 */
export class Valve {
	private isOpen = true;
	private waiters = new Set<Waiter>();

	/**
	 * Whether `wait()` currently passes straight through.
	 */
	get opened(): boolean {
		return this.isOpen;
	}

	/**
	 * Make subsequent waits suspend.
	 */
	shut(): void {
		this.isOpen = false;
	}

	/**
	 * Let every suspended waiter through.
	 */
	open(): void {
		this.isOpen = true;
		const waiters = [...this.waiters];
		this.waiters.clear();
		for (const waiter of waiters) {
			waiter.subscription?.[Symbol.dispose]();
			waiter.resolve();
		}
	}

	/**
	 * Resolves once the valve is open.
	 * Rejects with a CancelledError if `signal` fires first.
	 */
	wait(signal?: AbortSignal): Promise<void> {
		if (signal?.aborted) {
			return Promise.reject(toCancelledError(signal.reason));
		}
		if (this.isOpen) {
			return Promise.resolve();
		}

		return new Promise<void>((resolve, reject) => {
			const waiter: Waiter = { resolve, subscription: undefined };
			if (signal) {
				waiter.subscription = onAbort(signal, (reason) => {
					this.waiters.delete(waiter);
					reject(toCancelledError(reason));
				});
			}
			this.waiters.add(waiter);
		});
	}

	/**
	 * Number of callers suspended in `wait()`.
	 */
	get waiting(): number {
		return this.waiters.size;
	}
}
