import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { Calculator, DomainError, runCalculatorDemo } from "@core/arithmetic";
import { captureLogger, type CapturedLogger } from "../helpers";

describe("Calculator", () => {
	let output: CapturedLogger;
	let calc: Calculator;

	beforeEach(() => {
		output = captureLogger();
		calc = new Calculator({ logger: output.logger });
	});

	test("should start with an empty history", () => {
		expect(calc.getHistory()).toEqual([]);
	});

	test("should record operations in call order", () => {
		expect(calc.add(5, 3)).toBe(8);
		expect(calc.getHistory()).toEqual(["5 + 3 = 8"]);

		expect(calc.multiply(4, 5)).toBe(20);
		expect(calc.getHistory()).toEqual(["5 + 3 = 8", "4 * 5 = 20"]);
	});

	test("should print each operation as it is logged", () => {
		calc.subtract(10, 4);
		calc.divide(9, 2);
		calc.power(2, 5);

		expect(output.stdout).toEqual(["10 - 4 = 6", "9 / 2 = 4.5", "2 ^ 5 = 32"]);
	});

	test("should keep the repeated-addition result for negative multipliers", () => {
		expect(calc.multiply(3, -2)).toBe(0);
		expect(calc.getHistory()).toEqual(["3 * -2 = 0"]);
	});

	test("should not log a failed division", () => {
		calc.add(1, 1);

		expect(() => calc.divide(1, 0)).toThrow(DomainError);
		expect(calc.getHistory()).toEqual(["1 + 1 = 2"]);
		expect(output.stdout).toEqual(["1 + 1 = 2"]);
	});

	test("should hand out a snapshot of the history", () => {
		calc.add(2, 2);
		const history = calc.getHistory();
		history.push("tampered");
		history[0] = "changed";

		expect(calc.getHistory()).toEqual(["2 + 2 = 4"]);
	});

	test("should clear the history", () => {
		calc.add(2, 2);
		calc.clearHistory();

		expect(calc.getHistory()).toEqual([]);
	});

	test("should log without printing when echo is off", () => {
		const quiet = new Calculator({ logger: output.logger, echo: false });
		quiet.add(1, 2);

		expect(quiet.getHistory()).toEqual(["1 + 2 = 3"]);
		expect(output.stdout).toEqual([]);
	});

	describe("default logger", () => {
		afterEach(() => {
			vi.restoreAllMocks();
		});

		test("should print to the console", () => {
			const log = vi.spyOn(console, "log").mockImplementation(() => {});

			new Calculator().add(5, 3);

			expect(log).toHaveBeenCalledWith("5 + 3 = 8");
		});
	});
});

describe("runCalculatorDemo", () => {
	test("should print two operations and a summary", () => {
		const { logger, stdout } = captureLogger();

		const result = runCalculatorDemo(logger);

		expect(result).toEqual({ sum: 8, product: 20, history: ["5 + 3 = 8", "4 * 5 = 20"] });
		expect(stdout).toEqual(["5 + 3 = 8", "4 * 5 = 20", "Sum: 8, Product: 20"]);
	});
});
