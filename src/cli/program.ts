import { Logger } from "@core/logging";
import { Command } from "commander";
import { createCalcCommand } from "./commands/calc";
import { createDemoCommand } from "./commands/demo";
import { createSessionCommand } from "./commands/session";
import { defaultConfig, type CliContext } from "./context";
import { createInteractiveSessionCommand } from "./interactive/session";

type GlobalOptions = {
	config: string;
	verbose?: boolean;
	color: boolean;
};

/**
 * Loads the config file named by `--config` and rebuilds the logger from it
 * and the `--verbose`/`--no-color` flags.
 */
async function applyGlobalOptions(context: CliContext, options: GlobalOptions): Promise<void> {
	const loaded = await defaultConfig(options.config).load();
	if (!loaded.ok) {
		throw loaded.error;
	}

	const logging = loaded.value.logging;
	context.config = loaded.value;
	context.logger = new Logger({
		level: options.verbose ? "debug" : logging?.level,
		color: options.color && (logging?.color ?? true),
		stdout: context.io.stdout,
		stderr: context.io.stderr,
	});
	context.logger.debug("Loaded configuration", { configDir: options.config });
}

export function createProgram(version: string, context: CliContext): Command {
	const program = new Command();

	program
		.name("calcflow")
		.description("Repeated-addition calculator and greeting pipeline demo")
		.version(version)
		.option("-c, --config <dir>", "directory holding calcflow.config.json", context.io.cwd ?? process.cwd())
		.option("--verbose", "log debug output")
		.option("--no-color", "disable coloured log output")
		.hook("preAction", async (thisCommand) => {
			await applyGlobalOptions(context, thisCommand.opts<GlobalOptions>());
		});

	// Register commands
	program.addCommand(createCalcCommand(context));
	program.addCommand(createSessionCommand(context));
	program.addCommand(createDemoCommand(context));

	// Register interactive commands
	program.addCommand(createInteractiveSessionCommand(context));

	return program;
}
