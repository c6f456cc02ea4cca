/**
 * Defaults and option validation shared by the components.
 */

import { availableParallelism } from "node:os";

/**
 * Default permit count and worker count: the number of logical CPUs
 * Node reports, never less than one.
 */
export function defaultConcurrency(): number {
	return Math.max(1, availableParallelism());
}

/**
 * Throws a RangeError unless `value` is an integer >= `min`.
 * `Infinity` passes only when `allowInfinity` is set.
 */
export function assertCount(
	name: string,
	value: number,
	{ min = 0, allowInfinity = false }: { min?: number; allowInfinity?: boolean } = {},
): number {
	if (allowInfinity && value === Number.POSITIVE_INFINITY) return value;
	if (!Number.isInteger(value) || value < min) {
		throw new RangeError(
			`${name} must be an integer >= ${min}${allowInfinity ? " or Infinity" : ""}, got ${value}`,
		);
	}
	return value;
}

/**
 * Throws a RangeError unless `value` is a finite, non-negative duration.
 */
export function assertDuration(name: string, value: number): number {
	if (!Number.isFinite(value) || value < 0) {
		throw new RangeError(
			`${name} must be a finite, non-negative number of milliseconds, got ${value}`,
		);
	}
	return value;
}
