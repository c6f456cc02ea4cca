/**
 * Cancellation controller and AbortSignal helpers
 *
 * Every suspending operation in bounded-exec takes an AbortSignal
 * explicitly. A CancellationController owns one such signal and fires it
 * at most once, on a deadline, on a manual cancel, or when a parent
 * signal aborts.
 */

import createDebug from "debug";
import { assertDuration } from "./config.js";
import { CancelledError, toCancelledError } from "./errors.js";

const debugCancel = createDebug("bounded-exec:cancellation");

let controllerIdCounter = 0;

/**
 * Options for creating a CancellationController
 */
export interface CancellationOptions {
	/**
	 * Deadline in milliseconds from construction.
	 * When it expires the signal fires with kind `deadline`.
	 */
	timeout?: number;
	/**
	 * Optional parent AbortSignal to link cancellation.
	 */
	signal?: AbortSignal;
	/**
	 * Name used in debug output.
	 */
	name?: string;
}

/**
 * A write-once cancellation signal with an optional deadline.
 *
 * @example
 * ```typescript
 * using cancellation = new CancellationController({ timeout: 5000 })
 *
 * const report = await fanOut(tasks, { signal: cancellation.signal }).collect()
 * if (report.status === "cancelled") {
 *   console.log(report.reason?.kind) // "deadline"
 * }
 * ```
 */
export class CancellationController implements Disposable {
	private readonly abortController = new AbortController();
	private timeoutId: ReturnType<typeof setTimeout> | undefined;
	private readonly parentSignal: AbortSignal | undefined;
	private readonly parentHandler: (() => void) | undefined;
	private readonly name: string;

	constructor(options: CancellationOptions = {}) {
		this.name = options.name ?? `cancellation-${++controllerIdCounter}`;
		const { timeout, signal } = options;
		if (timeout !== undefined) {
			assertDuration("timeout", timeout);
		}

		if (debugCancel.enabled) {
			debugCancel(
				"[%s] creating controller (timeout: %s, parent signal: %s)",
				this.name,
				timeout ?? "none",
				signal ? "yes" : "no",
			);
		}

		if (signal) {
			this.parentSignal = signal;
			if (signal.aborted) {
				this.fire(toCancelledError(signal.reason));
				return;
			}
			this.parentHandler = () => {
				if (debugCancel.enabled) {
					debugCancel("[%s] parent signal aborted", this.name);
				}
				this.fire(toCancelledError(signal.reason));
			};
			signal.addEventListener("abort", this.parentHandler, { once: true });
		}

		if (timeout !== undefined) {
			this.timeoutId = setTimeout(() => {
				this.timeoutId = undefined;
				if (debugCancel.enabled) {
					debugCancel("[%s] deadline of %dms expired", this.name, timeout);
				}
				this.fire(
					new CancelledError("deadline", `deadline of ${timeout}ms exceeded`),
				);
			}, timeout);
		}
	}

	/**
	 * The signal to hand to tasks and to every wait.
	 */
	get signal(): AbortSignal {
		return this.abortController.signal;
	}

	/**
	 * Whether the signal has fired. Never blocks.
	 */
	get fired(): boolean {
		return this.abortController.signal.aborted;
	}

	/**
	 * The reason the signal fired, fixed from the first firing on.
	 */
	get reason(): CancelledError | undefined {
		if (!this.fired) return undefined;
		return toCancelledError(this.abortController.signal.reason);
	}

	/**
	 * Fire the signal with kind `cancelled`.
	 * Returns true only for the call that actually fired it.
	 */
	cancel(reason?: unknown): boolean {
		return this.fire(toCancelledError(reason));
	}

	/**
	 * Resolves with the reason once the signal fires.
	 * Usable as one arm of a `Promise.race`.
	 */
	whenFired(): Promise<CancelledError> {
		return whenAborted(this.abortController.signal).then(toCancelledError);
	}

	/**
	 * Clears the deadline timer and detaches from the parent signal.
	 * Does not fire the signal.
	 */
	[Symbol.dispose](): void {
		this.clearTimer();
		this.detachParent();
	}

	private fire(error: CancelledError): boolean {
		if (this.abortController.signal.aborted) {
			if (debugCancel.enabled) {
				debugCancel("[%s] already fired, ignoring %s", this.name, error.kind);
			}
			return false;
		}
		this.clearTimer();
		this.detachParent();
		if (debugCancel.enabled) {
			debugCancel("[%s] firing (%s): %s", this.name, error.kind, error.message);
		}
		this.abortController.abort(error);
		return true;
	}

	private clearTimer(): void {
		if (this.timeoutId !== undefined) {
			clearTimeout(this.timeoutId);
			this.timeoutId = undefined;
		}
	}

	private detachParent(): void {
		if (this.parentSignal && this.parentHandler) {
			this.parentSignal.removeEventListener("abort", this.parentHandler);
		}
	}
}

/**
 * Throws a CancelledError if the signal is aborted.
 *
 * @example
 * ```typescript
 * const t = task("resize", async ({ signal }) => {
 *   throwIfAborted(signal)
 *   return await resize(image)
 * })
 * ```
 */
export function throwIfAborted(signal: AbortSignal): void {
	if (signal.aborted) {
		throw toCancelledError(signal.reason);
	}
}

/**
 * Registers a callback to be invoked when the signal is aborted.
 * Returns a disposable that can be used to unregister the callback.
 *
 * The callback is automatically unregistered after it's invoked (once).
 *
 * @param signal - The AbortSignal to listen to
 * @param callback - Function to call when aborted
 * @returns A Disposable that can be used to unregister
 */
export function onAbort(
	signal: AbortSignal,
	callback: (reason: unknown) => void,
): Disposable {
	// If already aborted, call immediately
	if (signal.aborted) {
		if (debugCancel.enabled) {
			debugCancel("signal already aborted, calling callback immediately");
		}
		callback(signal.reason);
		return {
			[Symbol.dispose]: () => {},
		};
	}

	let disposed = false;

	const handler = () => {
		if (disposed) return;
		disposed = true;
		callback(signal.reason);
	};

	signal.addEventListener("abort", handler, { once: true });

	return {
		[Symbol.dispose]: () => {
			if (!disposed) {
				disposed = true;
				signal.removeEventListener("abort", handler);
			}
		},
	};
}

/**
 * A signal that aborts when any of its inputs abort, together with a way
 * to detach from the inputs once it is no longer needed.
 */
export interface LinkedSignal extends Disposable {
	readonly signal: AbortSignal;
}

/**
 * Races multiple abort signals: the returned signal aborts with the
 * reason of whichever input aborts first. Dispose it when done so that
 * long-lived inputs do not keep the listeners.
 *
 * @example
 * ```typescript
 * const linked = linkSignals([pool.signal, request.signal])
 * try {
 *   await channel.send(job, linked.signal)
 * } finally {
 *   linked[Symbol.dispose]()
 * }
 * ```
 */
export function linkSignals(signals: readonly AbortSignal[]): LinkedSignal {
	const alreadyAborted = signals.find((s) => s.aborted);
	if (alreadyAborted) {
		return { signal: alreadyAborted, [Symbol.dispose]: () => {} };
	}
	const [only] = signals;
	if (signals.length === 1 && only) {
		return { signal: only, [Symbol.dispose]: () => {} };
	}

	const controller = new AbortController();
	const subscriptions = signals.map((signal) =>
		onAbort(signal, (reason) => {
			if (debugCancel.enabled) {
				debugCancel("linked signal aborted, propagating reason:", reason);
			}
			controller.abort(reason);
			dispose();
		}),
	);
	const dispose = () => {
		for (const subscription of subscriptions) {
			subscription[Symbol.dispose]();
		}
	};

	return { signal: controller.signal, [Symbol.dispose]: dispose };
}

/**
 * Waits for a signal to be aborted.
 * Returns immediately if already aborted.
 *
 * @returns Promise that resolves with the abort reason
 */
export function whenAborted(signal: AbortSignal): Promise<unknown> {
	if (signal.aborted) {
		return Promise.resolve(signal.reason);
	}

	return new Promise((resolve) => {
		signal.addEventListener(
			"abort",
			() => {
				resolve(signal.reason);
			},
			{ once: true },
		);
	});
}

/**
 * A delay that races the signal. Resolves `"elapsed"` when the time is up
 * or `"cancelled"` as soon as the signal aborts; it never rejects.
 *
 * @example
 * ```typescript
 * if ((await sleep(250, signal)) === "cancelled") return
 * ```
 */
export function sleep(
	ms: number,
	signal?: AbortSignal,
): Promise<"elapsed" | "cancelled"> {
	if (signal?.aborted) {
		return Promise.resolve("cancelled");
	}
	if (ms <= 0) {
		return Promise.resolve("elapsed");
	}

	return new Promise((resolve) => {
		let subscription: Disposable | undefined;
		const timeoutId = setTimeout(() => {
			subscription?.[Symbol.dispose]();
			resolve("elapsed");
		}, ms);
		if (signal) {
			subscription = onAbort(signal, () => {
				clearTimeout(timeoutId);
				resolve("cancelled");
			});
		}
	});
}
