import { afterEach, describe, expect, test, vi } from "vitest";
import { Logger } from "@core/logging";
import { captureLogger } from "../helpers";

describe("Logger", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	test("should format printed arguments like console.log", () => {
		const { logger, stdout } = captureLogger();

		logger.print("Sum:", 8);
		logger.print("User is valid:", { data: "mock", processed: true });

		expect(stdout).toEqual(["Sum: 8", "User is valid: { data: 'mock', processed: true }"]);
	});

	test("should print regardless of level", () => {
		const { logger, stdout } = captureLogger({ level: "silent" });

		logger.print("still here");
		logger.error("hidden");

		expect(stdout).toEqual(["still here"]);
	});

	test("should filter messages below the level", () => {
		const { logger, stdout, stderr } = captureLogger({ level: "warn" });

		logger.debug("d");
		logger.info("i");
		logger.warn("w");
		logger.error("e");

		expect(stdout).toEqual([]);
		expect(stderr).toEqual(["[WARN] w", "[ERROR] e"]);
	});

	test("should write structured data after the message", () => {
		const { logger, stdout } = captureLogger();

		logger.info("Loaded", { count: 2 });

		expect(stdout).toEqual(["[INFO] Loaded", '{\n  "count": 2\n}']);
	});

	test("should print an error's stack only at debug level", () => {
		const quiet = captureLogger();
		quiet.logger.error("Division by zero", new Error("Division by zero"));
		expect(quiet.stderr).toEqual(["[ERROR] Division by zero"]);

		const verbose = captureLogger({ level: "debug" });
		const error = new Error("Division by zero");
		verbose.logger.error("Division by zero", error);
		expect(verbose.stderr).toEqual(["[ERROR] Division by zero", error.stack]);
	});

	test("should prefix child loggers", () => {
		const { logger, stdout } = captureLogger({ prefix: "cli" });

		logger.child("pipeline").info("started");

		expect(stdout).toEqual(["[INFO] [cli:pipeline] started"]);
	});

	test("should change level at run time", () => {
		const { logger, stdout } = captureLogger();

		logger.debug("before");
		logger.setLevel("debug");
		logger.debug("after");

		expect(logger.getLevel()).toBe("debug");
		expect(stdout).toEqual(["[DEBUG] after"]);
	});

	test("should colour output at the given colour level", () => {
		const stdout: string[] = [];
		const logger = new Logger({ color: true, colorLevel: 1, stdout: (line) => stdout.push(line) });

		logger.info("hi");
		logger.child("sub").info("there");

		expect(stdout).toEqual(["\u001b[34m[INFO] hi\u001b[39m", "\u001b[34m[INFO] [sub] there\u001b[39m"]);
	});

	test("should colour stderr lines at the given colour level", () => {
		const stderr: string[] = [];
		const logger = new Logger({ colorLevel: 1, stderr: (line) => stderr.push(line) });

		logger.warn("w");
		logger.error("e");

		expect(stderr).toEqual(["\u001b[33m[WARN] w\u001b[39m", "\u001b[31m[ERROR] e\u001b[39m"]);
	});

	test("should leave output plain when the terminal has no colour support", () => {
		const stderr: string[] = [];
		const logger = new Logger({ color: true, colorLevel: 0, stderr: (line) => stderr.push(line) });

		logger.error("x");

		expect(stderr).toEqual(["[ERROR] x"]);
	});

	test("should never colour when color is off, whatever the level", () => {
		const stderr: string[] = [];
		const logger = new Logger({ color: false, colorLevel: 3, stderr: (line) => stderr.push(line) });

		logger.error("x");

		expect(stderr).toEqual(["[ERROR] x"]);
	});

	test("should default to the console", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		const logger = new Logger({ color: false });

		logger.print("out");
		logger.error("bad");

		expect(log).toHaveBeenCalledWith("out");
		expect(error).toHaveBeenCalledWith("[ERROR] bad");
	});
});
