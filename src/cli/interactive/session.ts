import { input } from "@inquirer/prompts";
import { Calculator } from "@core/arithmetic";
import { Command } from "commander";
import type { CliContext } from "../context";
import { evaluateInput } from "../commands/session";

/**
 * Prompts for expressions until an empty line, then prints the history.
 */
export async function interactiveSession(context: CliContext): Promise<readonly string[]> {
	const calculator = new Calculator({
		logger: context.logger,
		echo: context.config.calculator?.echo,
	});

	for (;;) {
		const line = await input({ message: "Expression (empty to finish):" });
		if (line.trim() === "") break;
		const result = evaluateInput(calculator, line);
		// a recovered prompt leaves the exit code alone
		if (!result.ok) context.logger.error(result.error.message, result.error);
	}

	const history = calculator.getHistory();
	context.logger.print(`History: ${history.length} operation(s)`);
	for (const [index, entry] of history.entries()) {
		context.logger.print(`${index + 1}. ${entry}`);
	}
	return history;
}

export function createInteractiveSessionCommand(context: CliContext): Command {
	return new Command("interactive")
		.alias("i")
		.description("Interactively evaluate expressions on one calculator")
		.action(async () => {
			await interactiveSession(context);
		});
}
