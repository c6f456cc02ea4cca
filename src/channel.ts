/**
 * Channel class for bounded-exec - bounded conduit between producers and consumers
 */

import createDebug from "debug";
import { onAbort } from "./cancellation.js";
import { assertCount } from "./config.js";
import { CancelledError, toCancelledError } from "./errors.js";
import type { OfferOutcome } from "./types.js";

const debugChannel = createDebug("bounded-exec:channel");

interface PendingSend<T> {
	value: T;
	resolve: (delivered: boolean) => void;
	reject: (reason: unknown) => void;
	settled: boolean;
	subscription: Disposable | undefined;
}

interface PendingReceive<T> {
	resolve: (value: T | undefined) => void;
	reject: (reason: unknown) => void;
	settled: boolean;
	subscription: Disposable | undefined;
}

/**
 * A bounded channel between producers and consumers.
 *
 * - `capacity` 0 is a rendezvous: a send completes only when a receiver
 *   takes the value.
 * - `send()` waits for buffer space; `trySend()` never waits and reports
 *   `"dropped"` instead.
 * - `close()` stops further sends; values already buffered are still
 *   received, after which `receive()` yields `undefined`.
 *
 * @example
 * ```typescript
 * const ch = new Channel<string>(10)
 *
 * // Producer
 * void (async () => {
 *   for (const item of items) {
 *     await ch.send(item, signal)  // Waits while the buffer is full
 *   }
 *   ch.close()
 * })()
 *
 * // Consumer
 * for await (const item of ch) {
 *   await process(item)
 * }
 * ```
 */
export class Channel<T> implements AsyncIterable<T>, AsyncDisposable {
	private buffer: T[] = [];
	private bufferHead = 0; // Index of first valid element (avoids O(n) shift)
	private sendQueue: PendingSend<T>[] = [];
	private sendQueueHead = 0;
	private receiveQueue: PendingReceive<T>[] = [];
	private receiveQueueHead = 0;
	private closed = false;
	private aborted = false;
	private abortReason: CancelledError | undefined;
	private dropCount = 0;
	private readonly capacity: number;

	constructor(capacity: number, parentSignal?: AbortSignal) {
		this.capacity = assertCount("capacity", capacity, { allowInfinity: true });
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
	 * Get effective buffer size (accounting for head offset).
	 */
	private get bufferSize(): number {
		return this.buffer.length - this.bufferHead;
	}

	/**
	 * Send a value to the channel.
	 * Waits while the buffer is full.
	 * Resolves to true once the value is delivered or buffered, to false if
	 * the channel is (or gets) closed first.
	 * Rejects with a CancelledError if the channel or `signal` is cancelled.
	 */
	send(value: T, signal?: AbortSignal): Promise<boolean> {
		if (this.closed) {
			return Promise.resolve(false);
		}
		if (this.aborted) {
			return Promise.reject(this.abortReason);
		}
		if (this.deliver(value)) {
			return Promise.resolve(true);
		}
		if (signal?.aborted) {
			return Promise.reject(toCancelledError(signal.reason));
		}

		return new Promise<boolean>((resolve, reject) => {
			const pending: PendingSend<T> = {
				value,
				resolve,
				reject,
				settled: false,
				subscription: undefined,
			};
			if (signal) {
				pending.subscription = onAbort(signal, (reason) => {
					if (pending.settled) return;
					pending.settled = true;
					reject(toCancelledError(reason));
				});
			}
			this.sendQueue.push(pending);
		});
	}

	/**
	 * Try to send without waiting.
	 * Returns `"dropped"` when the value would have had to wait for space,
	 * and `"closed"` when the channel no longer accepts values.
	 */
	trySend(value: T): OfferOutcome {
		if (this.closed || this.aborted) {
			return "closed";
		}
		if (this.deliver(value)) {
			return "accepted";
		}
		this.dropCount++;
		if (debugChannel.enabled) {
			debugChannel(
				"buffer full (%d/%d), dropped value (total dropped: %d)",
				this.bufferSize,
				this.capacity,
				this.dropCount,
			);
		}
		return "dropped";
	}

	/**
	 * Receive a value from the channel.
	 * Buffered values and blocked senders are served first; the call only
	 * waits (and only then observes `signal`) when there is nothing to take.
	 * Returns undefined if the channel is closed and empty.
	 */
	receive(signal?: AbortSignal): Promise<T | undefined> {
		if (this.aborted) {
			return Promise.reject(this.abortReason);
		}

		// If buffer has items, return from buffer
		if (this.bufferSize > 0) {
			const value = this.buffer[this.bufferHead++];

			// Compact buffer occasionally to prevent unbounded growth
			if (this.bufferHead > 100 && this.bufferHead > this.buffer.length / 2) {
				this.buffer = this.buffer.slice(this.bufferHead);
				this.bufferHead = 0;
			}

			// Move one blocked sender's value into the freed slot
			const sender = this.nextSender();
			if (sender) {
				this.buffer.push(sender.value);
				this.settleSender(sender, true);
			}

			return Promise.resolve(value);
		}

		// Rendezvous: take straight from a blocked sender
		const sender = this.nextSender();
		if (sender) {
			this.settleSender(sender, true);
			return Promise.resolve(sender.value);
		}

		// If closed and empty, return undefined
		if (this.closed) {
			return Promise.resolve(undefined);
		}

		if (signal?.aborted) {
			return Promise.reject(toCancelledError(signal.reason));
		}

		return new Promise<T | undefined>((resolve, reject) => {
			const pending: PendingReceive<T> = {
				resolve,
				reject,
				settled: false,
				subscription: undefined,
			};
			if (signal) {
				pending.subscription = onAbort(signal, (reason) => {
					if (pending.settled) return;
					pending.settled = true;
					reject(toCancelledError(reason));
				});
			}
			this.receiveQueue.push(pending);
		});
	}

	/**
	 * Close the channel. No more sends allowed.
	 * Consumers will drain the buffer then receive undefined; senders still
	 * blocked resolve to false.
	 */
	close(): void {
		if (this.closed) return;
		this.closed = true;
		if (debugChannel.enabled) {
			debugChannel("closing with %d buffered value(s)", this.bufferSize);
		}

		for (let sender = this.nextSender(); sender; sender = this.nextSender()) {
			this.settleSender(sender, false);
		}
		for (
			let receiver = this.nextReceiver();
			receiver;
			receiver = this.nextReceiver()
		) {
			receiver.settled = true;
			receiver.subscription?.[Symbol.dispose]();
			receiver.resolve(undefined);
		}
	}

	/**
	 * Check if the channel is closed.
	 */
	get isClosed(): boolean {
		return this.closed;
	}

	/**
	 * Get the current buffer size.
	 */
	get size(): number {
		return this.bufferSize;
	}

	/**
	 * Get the buffer capacity.
	 */
	get cap(): number {
		return this.capacity;
	}

	/**
	 * Number of values `trySend()` has dropped so far.
	 */
	get dropped(): number {
		return this.dropCount;
	}

	/**
	 * Async iterator for the channel.
	 * Yields values until channel is closed and empty.
	 */
	async *[Symbol.asyncIterator](): AsyncIterator<T> {
		while (true) {
			const value = await this.receive();
			if (value === undefined) break;
			yield value;
		}
	}

	/**
	 * Dispose the channel, aborting all pending operations.
	 */
	async [Symbol.asyncDispose](): Promise<void> {
		// Prevent double disposal
		if (this.aborted) return;
		this.close();
		this.abort(new CancelledError("cancelled", "channel disposed"));
	}

	/**
	 * Hand the value to a waiting receiver or put it in the buffer.
	 * Returns false when neither is possible.
	 */
	private deliver(value: T): boolean {
		const receiver = this.nextReceiver();
		if (receiver) {
			receiver.settled = true;
			receiver.subscription?.[Symbol.dispose]();
			receiver.resolve(value);
			return true;
		}
		if (this.bufferSize < this.capacity) {
			this.buffer.push(value);
			return true;
		}
		return false;
	}

	private nextSender(): PendingSend<T> | undefined {
		while (this.sendQueueHead < this.sendQueue.length) {
			const sender = this.sendQueue[this.sendQueueHead++];
			if (sender && !sender.settled) return sender;
		}
		this.sendQueue = [];
		this.sendQueueHead = 0;
		return undefined;
	}

	private nextReceiver(): PendingReceive<T> | undefined {
		while (this.receiveQueueHead < this.receiveQueue.length) {
			const receiver = this.receiveQueue[this.receiveQueueHead++];
			if (receiver && !receiver.settled) return receiver;
		}
		this.receiveQueue = [];
		this.receiveQueueHead = 0;
		return undefined;
	}

	private settleSender(sender: PendingSend<T>, delivered: boolean): void {
		sender.settled = true;
		sender.subscription?.[Symbol.dispose]();
		sender.resolve(delivered);
	}

	private abort(reason: CancelledError): void {
		if (this.aborted) return;
		this.aborted = true;
		this.abortReason = reason;

		// Reject all waiting senders
		for (let sender = this.nextSender(); sender; sender = this.nextSender()) {
			sender.settled = true;
			sender.subscription?.[Symbol.dispose]();
			sender.reject(reason);
		}

		// Resolve all waiting receivers with undefined
		for (
			let receiver = this.nextReceiver();
			receiver;
			receiver = this.nextReceiver()
		) {
			receiver.settled = true;
			receiver.subscription?.[Symbol.dispose]();
			receiver.resolve(undefined);
		}
	}
}
