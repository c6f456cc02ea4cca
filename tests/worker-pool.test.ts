/**
 * Tests for fixed-worker-pool dispatch
 */

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { AdmissionGate } from "../src/admission-gate.js";
import { CancelledError } from "../src/errors.js";
import { task } from "../src/task.js";
import { WorkerPool } from "../src/worker-pool.js";

const delay = (ms: number) =>
	new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("WorkerPool", () => {
	test("runs every submitted task once and drains after close", async () => {
		const pool = new WorkerPool<number>({ workers: 3 });

		for (let i = 0; i < 10; i++) {
			await pool.submit(
				task(i, async () => {
					await delay(1);
					return i;
				}),
			);
		}
		pool.close();
		const report = await pool.collect();

		expect(report.status).toBe("completed");
		expect(report.results).toHaveLength(10);
		expect(new Set(report.results.map((r) => r.id)).size).toBe(10);
		expect(report.metrics.dispatched).toBe(10);
		expect(report.metrics.succeeded).toBe(10);
	});

	test("tasks buffered before close still run", async () => {
		const pool = new WorkerPool<number>({ workers: 1, queueCapacity: 5 });

		for (let i = 1; i <= 5; i++) {
			await pool.submit(
				task(i, async () => {
					await delay(5);
					return i;
				}),
			);
		}
		pool.close();
		expect(pool.pending).toBe(4);

		const report = await pool.collect();

		expect(report.results.map((r) => r.id)).toEqual([1, 2, 3, 4, 5]);
	});

	test("the worker count bounds concurrency", async () => {
		let current = 0;
		let max = 0;
		const pool = new WorkerPool<void>({ workers: 2 });

		for (let i = 0; i < 8; i++) {
			await pool.submit(
				task(i, async () => {
					current++;
					max = Math.max(max, current);
					await delay(5);
					current--;
				}),
			);
		}
		pool.close();
		const report = await pool.collect();

		expect(max).toBe(2);
		expect(report.metrics.peakConcurrency).toBe(2);
	});

	test("a shared gate narrows concurrency below the worker count", async () => {
		const gate = new AdmissionGate(1);
		const pool = new WorkerPool<void>({ workers: 3, gate });

		for (let i = 0; i < 6; i++) {
			await pool.submit(task(i, () => delay(2)));
		}
		pool.close();
		const report = await pool.collect();

		expect(report.results).toHaveLength(6);
		expect(report.metrics.peakConcurrency).toBe(1);
	});

	test("close may only be called once", () => {
		const pool = new WorkerPool<number>({ name: "jobs", workers: 1 });

		pool.close();

		expect(pool.closed).toBe(true);
		expect(() => pool.close()).toThrow("pool jobs is already closed");
	});

	test("submit after close throws", async () => {
		const pool = new WorkerPool<number>({ name: "jobs", workers: 1 });
		pool.close();

		await expect(pool.submit(task(1, () => 1))).rejects.toThrow(
			"cannot submit to closed pool jobs",
		);
		expect(() => pool.offer(task(2, () => 2))).toThrow(
			"cannot submit to closed pool jobs",
		);
	});

	test("offer drops tasks when the input buffer is full", async () => {
		const pool = new WorkerPool<number>({ workers: 1, queueCapacity: 2 });
		await delay(0);

		const outcomes = Array.from({ length: 10 }, (_, i) =>
			pool.offer(
				task(i, async () => {
					await delay(5);
					return i;
				}),
			),
		);
		pool.close();
		const report = await pool.collect();

		// One task goes straight to the idle worker, two are buffered
		expect(outcomes.filter((o) => o === "accepted")).toHaveLength(3);
		expect(outcomes.filter((o) => o === "dropped")).toHaveLength(7);
		expect(report.status).toBe("completed");
		expect(report.results.map((r) => r.id)).toEqual([0, 1, 2]);
		expect(report.dropped).toBe(7);
		expect(report.metrics.dispatched).toBe(10);
	});

	test("pause stops workers from pulling new tasks", async () => {
		const started: number[] = [];
		const pool = new WorkerPool<number>({ workers: 1, queueCapacity: 5 });
		const make = (id: number) =>
			task(id, () => {
				started.push(id);
				return id;
			});

		pool.pause();
		expect(pool.paused).toBe(true);
		// The worker passed the valve before pause() and takes the first task
		await pool.submit(make(1));
		await pool.submit(make(2));
		await pool.submit(make(3));
		await delay(20);

		expect(started).toEqual([1]);
		expect(pool.pending).toBe(2);

		pool.resume();
		pool.close();
		const report = await pool.collect();

		expect(started).toEqual([1, 2, 3]);
		expect(report.results).toHaveLength(3);
	});

	test("a submit blocked on a full input can be cancelled", async () => {
		let release = () => {};
		const gateOpen = new Promise<void>((resolve) => {
			release = resolve;
		});
		const pool = new WorkerPool<string>({ workers: 1, queueCapacity: 0 });

		await pool.submit(
			task("first", async () => {
				await gateOpen;
				return "first";
			}),
		);
		const controller = new AbortController();
		const blocked = pool.submit(
			task("second", () => "second"),
			controller.signal,
		);
		controller.abort("give up");

		await expect(blocked).rejects.toThrow("give up");
		expect(pool.metrics().dispatched).toBe(1);

		release();
		pool.close();
		const report = await pool.collect();
		expect(report.results.map((r) => r.id)).toEqual(["first"]);
	});

	test("results can be iterated lazily", async () => {
		const pool = new WorkerPool<number>({ workers: 2 });
		await pool.submit(task("a", () => 1));
		await pool.submit(task("b", () => 2));
		pool.close();

		const values: number[] = [];
		for await (const { result } of pool) {
			const [err, value] = result;
			if (!err) values.push(value);
		}

		expect(values.sort()).toEqual([1, 2]);
	});
});

describe("WorkerPool cancellation", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	test("a deadline stops the pool with partial results", async () => {
		const pool = new WorkerPool<number>({
			workers: 1,
			queueCapacity: 5,
			timeout: 150,
		});
		for (const id of [1, 2, 3]) {
			await pool.submit(
				task(id, async () => {
					await delay(100);
					return id;
				}),
			);
		}
		pool.close();

		const reportPromise = pool.collect();
		await vi.advanceTimersByTimeAsync(150);
		const report = await reportPromise;

		expect(report.status).toBe("cancelled");
		expect(report.reason?.kind).toBe("deadline");
		expect(report.results.map((r) => r.id)).toEqual([1]);

		await vi.advanceTimersByTimeAsync(100);
		await pool.done();
		const metrics = pool.metrics();
		expect(metrics.started).toBe(2);
		expect(metrics.succeeded).toBe(2);
		expect(metrics.notStarted).toBe(1);
	});

	test("submit after cancel rejects with the cancel reason", async () => {
		const pool = new WorkerPool<number>({ workers: 1 });

		pool.cancel("stopping");

		await expect(pool.submit(task(1, () => 1))).rejects.toBeInstanceOf(
			CancelledError,
		);
		expect(() => pool.offer(task(2, () => 2))).toThrow("stopping");
		await pool.done();
	});

	test("dispose cancels and waits for the workers", async () => {
		const pool = new WorkerPool<number>({ workers: 2 });
		await pool.submit(
			task(1, async () => {
				await delay(50);
				return 1;
			}),
		);

		const disposed = pool[Symbol.asyncDispose]();
		await vi.advanceTimersByTimeAsync(50);
		await disposed;

		expect(pool.signal.aborted).toBe(true);
		expect(pool.closed).toBe(true);
		expect(pool.metrics().succeeded).toBe(1);
	});
});
