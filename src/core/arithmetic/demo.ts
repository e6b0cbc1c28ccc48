import type { Logger } from "@core/logging";
import { Calculator } from "./calculator";

export interface CalculatorDemoResult {
	readonly sum: number;
	readonly product: number;
	readonly history: readonly string[];
}

export function runCalculatorDemo(logger: Logger): CalculatorDemoResult {
	const calc = new Calculator({ logger });
	const sum = calc.add(5, 3);
	const product = calc.multiply(4, 5);
	logger.print(`Sum: ${sum}, Product: ${product}`);

	return { sum, product, history: calc.getHistory() };
}
