/**
 * Session command, evaluates expressions one after the other on a single
 * calculator so they share one history
 */

import { Calculator, CalculatorError, evaluateExpression, parseExpression } from "@core/arithmetic";
import { Command } from "commander";
import type { Result } from "../../types/misc";
import { fail, type CliContext } from "../context";

export function evaluateInput(
	calculator: Calculator,
	input: string,
): Result<number, CalculatorError> {
	const expression = parseExpression(input);
	if (!expression.ok) {
		return expression;
	}

	try {
		return { ok: true, value: evaluateExpression(calculator, expression.value) };
	} catch (error) {
		if (error instanceof CalculatorError) {
			return { ok: false, error };
		}
		throw error;
	}
}

export function createSessionCommand(context: CliContext): Command {
	return new Command("session")
		.description("Evaluate expressions such as '5 + 3' on one calculator")
		.argument("<expressions...>", "expressions to evaluate, in order")
		.allowUnknownOption()
		.action((expressions: string[]) => {
			const calculator = new Calculator({
				logger: context.logger,
				echo: context.config.calculator?.echo,
			});

			for (const input of expressions) {
				const result = evaluateInput(calculator, input);
				if (!result.ok) return fail(context, result.error);
			}

			context.logger.print(`History: ${calculator.getHistory().length} operation(s)`);
		});
}
