import { logger as defaultLogger, type Logger } from "@core/logging";
import { DEFAULT_CALCULATOR_OPTIONS } from "./config";
import { add, divide, multiply, power, subtract } from "./operations";
import type { CalculatorOptions, OperatorSymbol } from "./types/core";

/**
 * Calculator that records every operation as `"{a} {op} {b} = {result}"`.
 */
export class Calculator {
	private history: string[] = [];
	private readonly echo: boolean;
	private readonly logger: Logger;

	constructor(options: CalculatorOptions = {}) {
		this.echo = options.echo ?? DEFAULT_CALCULATOR_OPTIONS.echo;
		this.logger = options.logger ?? defaultLogger;
	}

	add(a: number, b: number): number {
		const result = add(a, b);
		this.logOperation(a, "+", b, result);
		return result;
	}

	subtract(a: number, b: number): number {
		const result = subtract(a, b);
		this.logOperation(a, "-", b, result);
		return result;
	}

	multiply(a: number, b: number): number {
		const result = multiply(a, b);
		this.logOperation(a, "*", b, result);
		return result;
	}

	divide(a: number, b: number): number {
		const result = divide(a, b);
		this.logOperation(a, "/", b, result);
		return result;
	}

	power(base: number, exponent: number): number {
		const result = power(base, exponent);
		this.logOperation(base, "^", exponent, result);
		return result;
	}

	/**
	 * Get operation history
	 * @returns A copy of the log, oldest entry first
	 */
	getHistory(): string[] {
		return [...this.history];
	}

	clearHistory(): void {
		this.history = [];
	}

	private logOperation(a: number, op: OperatorSymbol, b: number, result: number): void {
		const operation = `${a} ${op} ${b} = ${result}`;
		this.history.push(operation);
		if (this.echo) {
			this.logger.print(operation);
		}
	}
}
