/**
 * Lifecycle logging for bounded-exec
 *
 * Components log through the `Logger` interface, so any structured logger
 * (pino, winston, console) can be passed in. Without one they stay silent.
 */

import type { Logger, LogLevel } from "./types.js";

const SEVERITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/**
 * Writes to the console with a `[name]` prefix, skipping messages below
 * its level.
 *
 * @example
 * ```typescript
 * const report = await fanOut(tasks, {
 *   name: "thumbnails",
 *   logger: new ConsoleLogger("thumbnails", "warn"),
 * }).collect()
 * // [thumbnails] cancelled (deadline): 7 of 10 result(s) collected
 * ```
 */
export class ConsoleLogger implements Logger {
	private readonly prefix: string;
	private readonly threshold: number;

	constructor(
		readonly name: string,
		readonly level: LogLevel = "info",
	) {
		this.prefix = `[${name}]`;
		this.threshold = SEVERITY[level];
	}

	/**
	 * A logger for a sub-component, e.g. `[pool/worker-2]`, at the same level.
	 */
	child(name: string): ConsoleLogger {
		return new ConsoleLogger(`${this.name}/${name}`, this.level);
	}

	debug(message: string, ...args: unknown[]): void {
		this.write("debug", message, args);
	}

	info(message: string, ...args: unknown[]): void {
		this.write("info", message, args);
	}

	warn(message: string, ...args: unknown[]): void {
		this.write("warn", message, args);
	}

	error(message: string, ...args: unknown[]): void {
		this.write("error", message, args);
	}

	private write(level: LogLevel, message: string, args: unknown[]): void {
		if (SEVERITY[level] < this.threshold) return;
		console[level](`${this.prefix} ${message}`, ...args);
	}
}

/**
 * Discards everything. The default when neither a logger nor a level is
 * configured.
 */
export class NoOpLogger implements Logger {
	debug(): void {}
	info(): void {}
	warn(): void {}
	error(): void {}
}

/**
 * An explicit logger wins; a level alone builds a ConsoleLogger.
 */
export function createLogger(
	name: string,
	logger?: Logger,
	level?: LogLevel,
): Logger {
	if (logger) return logger;
	return level ? new ConsoleLogger(name, level) : new NoOpLogger();
}
