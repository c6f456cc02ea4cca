import { afterEach, describe, expect, test, vi } from "vitest";
import { ConsoleLogger, createLogger, NoOpLogger } from "../src/logger.js";

describe("ConsoleLogger", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	test("prefixes messages with the name", () => {
		const info = vi.spyOn(console, "info").mockImplementation(() => {});

		new ConsoleLogger("ingest").info("dispatching 3 task(s)", { batch: 1 });

		expect(info).toHaveBeenCalledWith("[ingest] dispatching 3 task(s)", {
			batch: 1,
		});
	});

	test("drops messages below its level", () => {
		const info = vi.spyOn(console, "info").mockImplementation(() => {});
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		const logger = new ConsoleLogger("ingest", "warn");

		logger.info("hidden");
		logger.warn("shown");

		expect(info).not.toHaveBeenCalled();
		expect(warn).toHaveBeenCalledWith("[ingest] shown");
	});

	test("child loggers extend the prefix and keep the level", () => {
		const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		const child = new ConsoleLogger("pool", "error").child("worker-2");

		child.debug("quiet");
		child.error("task 7 crashed");

		expect(child.level).toBe("error");
		expect(debug).not.toHaveBeenCalled();
		expect(error).toHaveBeenCalledWith("[pool/worker-2] task 7 crashed");
	});
});

describe("createLogger", () => {
	test("prefers an explicit logger", () => {
		const custom = new NoOpLogger();

		expect(createLogger("x", custom, "debug")).toBe(custom);
	});

	test("builds a console logger from a level", () => {
		expect(createLogger("x", undefined, "info")).toBeInstanceOf(ConsoleLogger);
	});

	test("is silent by default", () => {
		expect(createLogger("x")).toBeInstanceOf(NoOpLogger);
	});
});
