/**
 * Demo command, runs the calculator or pipeline demonstration
 */

import { runCalculatorDemo } from "@core/arithmetic";
import { main } from "@core/pipeline";
import { Command } from "commander";
import type { CliContext } from "../context";
import { parseInteger } from "../utils";

interface PipelineDemoOptions {
	latency?: number;
	name?: string;
	user?: number;
}

function createCalculatorDemoCommand(context: CliContext): Command {
	return new Command("calculator")
		.description("Add 5 and 3, multiply 4 by 5 and print a summary")
		.action(() => {
			runCalculatorDemo(context.logger);
		});
}

function createPipelineDemoCommand(context: CliContext): Command {
	return new Command("pipeline")
		.description("Fetch a mock user, validate it and greet")
		.option("-l, --latency <ms>", "simulated fetch latency", parseInteger)
		.option("-n, --name <name>", "name to greet")
		.option("-u, --user <id>", "user id to fetch", parseInteger)
		.action(async (options: PipelineDemoOptions) => {
			const pipeline = context.config.pipeline;
			context.logger.debug("Starting pipeline demo", { ...options });

			await main({
				logger: context.logger,
				latencyMs: options.latency ?? pipeline?.latencyMs,
				greetingName: options.name ?? pipeline?.greetingName,
				userId: options.user ?? pipeline?.userId,
			});
		});
}

export function createDemoCommand(context: CliContext): Command {
	return new Command("demo")
		.description("Run one of the bundled demonstrations")
		.addCommand(createCalculatorDemoCommand(context))
		.addCommand(createPipelineDemoCommand(context));
}
