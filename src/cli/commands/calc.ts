/**
 * Calc command, runs a single operation and prints its result
 */

import { Calculator, CalculatorError } from "@core/arithmetic";
import { Command } from "commander";
import { fail, type CliContext } from "../context";
import { parseOperand, parseOperation } from "../utils";

export function createCalcCommand(context: CliContext): Command {
	return new Command("calc")
		.description("Run one operation: add, subtract, multiply, divide or power")
		.argument("<operation>", "operation to run")
		.argument("<a>", "left operand")
		.argument("<b>", "right operand")
		// operands such as -2 are numbers, not flags
		.allowUnknownOption()
		.action((operation: string, a: string, b: string) => {
			const op = parseOperation(operation);
			if (!op.ok) return fail(context, op.error);

			const left = parseOperand(a);
			if (!left.ok) return fail(context, left.error);

			const right = parseOperand(b);
			if (!right.ok) return fail(context, right.error);

			const calculator = new Calculator({ logger: context.logger, echo: false });
			try {
				const result = calculator[op.value](left.value, right.value);
				context.logger.print(String(result));
			} catch (error) {
				if (error instanceof CalculatorError) return fail(context, error);
				throw error;
			}
		});
}
