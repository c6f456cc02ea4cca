/**
 * Task helpers for bounded-exec
 */

import { toError } from "./errors.js";
import type { Task, TaskContext, TaskId, TaskResult } from "./types.js";

/**
 * Create an immutable task.
 *
 * @example
 * ```typescript
 * const t = task("user:1", ({ signal }) => fetchUser(1, { signal }))
 * ```
 */
export function task<T>(
	id: TaskId,
	run: (ctx: TaskContext) => Promise<T> | T,
): Task<T> {
	return Object.freeze({ id, run });
}

/**
 * Run a task body and settle it into a TaskResult.
 * Never rejects: a throw (or rejection) becomes a failed result.
 */
export async function runTask<T>(
	t: Task<T>,
	signal: AbortSignal,
): Promise<TaskResult<T>> {
	try {
		const value = await t.run({ id: t.id, signal });
		return { id: t.id, result: [undefined, value] };
	} catch (error) {
		return { id: t.id, result: [toError(error), undefined] };
	}
}

/**
 * Throws if two tasks share an id.
 */
export function assertUniqueIds(tasks: readonly Task<unknown>[]): void {
	const seen = new Set<TaskId>();
	for (const t of tasks) {
		if (seen.has(t.id)) {
			throw new Error(`duplicate task id: ${String(t.id)}`);
		}
		seen.add(t.id);
	}
}
