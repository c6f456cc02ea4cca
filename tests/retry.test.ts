/**
 * Tests for the retry controller and delay strategies
 */

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { CancelledError, RetryExhaustedError } from "../src/errors.js";
import { fanOut } from "../src/fan-out.js";
import { retry, retrying, withRetry } from "../src/retry.js";
import {
	exponentialBackoff,
	fixed,
	jitter,
	linear,
} from "../src/retry-strategies.js";
import { task } from "../src/task.js";

const delay = (ms: number) =>
	new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("retry", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	test("returns the value of the first successful attempt", async () => {
		let calls = 0;
		const onRetry = vi.fn();

		const pending = retry(
			() => {
				calls++;
				if (calls < 3) throw new Error(`fail ${calls}`);
				return "ok";
			},
			{ delay: 100, onRetry },
		);
		await vi.advanceTimersByTimeAsync(200);
		const outcome = await pending;

		expect(outcome).toEqual({
			status: "done",
			value: "ok",
			attempts: 3,
			elapsedMs: 200,
		});
		expect(onRetry).toHaveBeenCalledTimes(2);
		expect(onRetry).toHaveBeenNthCalledWith(2, new Error("fail 2"), 2, 100);
	});

	test("retries until the deadline and reports the last error", async () => {
		const operation = vi.fn(() => {
			throw new Error("nope");
		});

		const pending = retry(operation, { delay: 10, timeout: 105 });
		await vi.advanceTimersByTimeAsync(200);
		const outcome = await pending;

		// Attempts at 0, 10, ..., 100; the wait after the last one is cut at 105
		expect(outcome.status).toBe("aborted");
		expect(outcome.attempts).toBe(11);
		expect(operation).toHaveBeenCalledTimes(11);
		expect(outcome.elapsedMs).toBe(105);
		if (outcome.status !== "aborted") return;
		expect(outcome.error).toBeInstanceOf(CancelledError);
		expect(outcome.error.kind).toBe("deadline");
		expect(outcome.lastError).toEqual(new Error("nope"));
		expect(vi.getTimerCount()).toBe(0);
	});

	test("a deadline that expires during an attempt ends the loop right after it", async () => {
		const onRetry = vi.fn();

		const pending = retry(
			async () => {
				await delay(50);
				throw new Error("slow failure");
			},
			{ delay: 10, timeout: 30, onRetry },
		);
		await vi.advanceTimersByTimeAsync(50);
		const outcome = await pending;

		expect(outcome.status).toBe("aborted");
		expect(outcome.attempts).toBe(1);
		expect(outcome.elapsedMs).toBe(50);
		expect(onRetry).not.toHaveBeenCalled();
	});

	test("gives up after maxAttempts", async () => {
		const failure = new Error("still broken");

		const pending = retry(
			() => {
				throw failure;
			},
			{ delay: 10, maxAttempts: 3 },
		);
		await vi.advanceTimersByTimeAsync(20);
		const outcome = await pending;

		expect(outcome.status).toBe("exhausted");
		expect(outcome.attempts).toBe(3);
		expect(outcome.elapsedMs).toBe(20);
		if (outcome.status !== "exhausted") return;
		expect(outcome.error).toBeInstanceOf(RetryExhaustedError);
		expect(outcome.error.message).toBe("gave up after 3 attempts");
		expect(outcome.error.cause).toBe(failure);
		expect(outcome.lastError).toBe(failure);
	});

	test("an explicit cancel cuts the wait short", async () => {
		const controller = new AbortController();

		const pending = retry(
			() => {
				throw new Error("down");
			},
			{ delay: 1000, signal: controller.signal },
		);
		await vi.advanceTimersByTimeAsync(100);
		controller.abort("stop");
		const outcome = await pending;

		expect(outcome.status).toBe("aborted");
		expect(outcome.attempts).toBe(1);
		expect(outcome.elapsedMs).toBe(100);
		if (outcome.status !== "aborted") return;
		expect(outcome.error.kind).toBe("cancelled");
		expect(outcome.error.message).toBe("stop");
		expect(vi.getTimerCount()).toBe(0);
	});

	test("makes no attempt once already cancelled", async () => {
		const controller = new AbortController();
		controller.abort();
		const operation = vi.fn(() => "never");

		const outcome = await retry(operation, { signal: controller.signal });

		expect(outcome.status).toBe("aborted");
		expect(outcome.attempts).toBe(0);
		expect(operation).not.toHaveBeenCalled();
	});

	test("stops on an error retryCondition refuses", async () => {
		const fatal = new TypeError("bad config");

		const outcome = await retry(
			() => {
				throw fatal;
			},
			{ retryCondition: (error) => !(error instanceof TypeError) },
		);

		expect(outcome.status).toBe("failed");
		expect(outcome.attempts).toBe(1);
		if (outcome.status !== "failed") return;
		expect(outcome.error).toBe(fatal);
	});

	test("passes the attempt number and signal to the operation", async () => {
		const seen: number[] = [];

		const outcome = await retry(
			({ attempt, signal }) => {
				seen.push(attempt);
				expect(signal.aborted).toBe(false);
				if (attempt < 2) throw new Error("again");
				return attempt;
			},
			{ maxAttempts: 5 },
		);

		expect(seen).toEqual([1, 2]);
		expect(outcome.status).toBe("done");
	});

	test("a delay function receives the failed attempt and its error", async () => {
		const delayFn = vi.fn((attempt: number) => attempt * 10);

		const pending = retry(
			() => {
				throw new Error("x");
			},
			{ delay: delayFn, maxAttempts: 3 },
		);
		await vi.advanceTimersByTimeAsync(30);
		const outcome = await pending;

		expect(outcome.elapsedMs).toBe(30);
		expect(delayFn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2]);
	});

	test("rejects invalid options", async () => {
		await expect(retry(() => 1, { delay: -1 })).rejects.toThrow(RangeError);
		await expect(retry(() => 1, { maxAttempts: 0 })).rejects.toThrow(
			RangeError,
		);
	});

	test("withRetry binds the operation and options", async () => {
		let calls = 0;
		const load = withRetry(
			() => {
				calls++;
				if (calls === 1) throw new Error("first");
				return "loaded";
			},
			{ maxAttempts: 2 },
		);

		const outcome = await load();

		expect(outcome.status === "done" && outcome.value).toBe("loaded");
	});
});

describe("retrying", () => {
	test("a task body that eventually succeeds", async () => {
		let calls = 0;
		const report = await fanOut([
			task(
				"flaky",
				retrying(() => {
					calls++;
					if (calls < 2) throw new Error("flake");
					return "ok";
				}),
			),
		]).collect();

		expect(report.results[0]?.result).toEqual([undefined, "ok"]);
	});

	test("an exhausted retry fails the task", async () => {
		const report = await fanOut([
			task(
				"broken",
				retrying(
					() => {
						throw new Error("down");
					},
					{ maxAttempts: 2 },
				),
			),
		]).collect();

		const [err] = report.results[0]?.result ?? [];
		expect(err).toBeInstanceOf(RetryExhaustedError);
		expect(report.metrics.failed).toBe(1);
	});
});

describe("delay strategies", () => {
	test("fixed", () => {
		const d = fixed(200);
		expect(d(1, undefined)).toBe(200);
		expect(d(7, undefined)).toBe(200);
	});

	test("linear", () => {
		const d = linear(100, 50);
		expect(d(1, undefined)).toBe(100);
		expect(d(3, undefined)).toBe(200);
		expect(linear(100, -80)(3, undefined)).toBe(0);
	});

	test("exponentialBackoff caps at max", () => {
		const d = exponentialBackoff({ initial: 100, max: 500 });
		expect(d(1, undefined)).toBe(100);
		expect(d(3, undefined)).toBe(400);
		expect(d(5, undefined)).toBe(500);
	});

	test("jitter stays within its band", () => {
		const d = jitter(1000, 0.2);
		for (let i = 0; i < 20; i++) {
			const value = d(1, undefined);
			expect(value).toBeGreaterThanOrEqual(800);
			expect(value).toBeLessThanOrEqual(1200);
		}
		expect(jitter(300, 0)(1, undefined)).toBe(300);
	});
});
