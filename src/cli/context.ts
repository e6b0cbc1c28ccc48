import { Config, type ConfigOptions } from "@core/config";
import { Logger, type LogWriter } from "@core/logging";

export interface CliIO {
	readonly stdout?: LogWriter;
	readonly stderr?: LogWriter;
	readonly cwd?: string;
}

/**
 * State shared by every command of one CLI run. The logger and config are
 * replaced once the global options are known, so commands read them when
 * their action runs, never when they are created.
 */
export interface CliContext {
	logger: Logger;
	config: ConfigOptions;
	exitCode: number;
	readonly io: CliIO;
}

export function defaultConfig(configDir: string): Config {
	return new Config({ configDir }).withLogging().withCalculator().withPipeline();
}

export function createCliContext(io: CliIO = {}): CliContext {
	return {
		logger: new Logger({ stdout: io.stdout, stderr: io.stderr }),
		config: defaultConfig(io.cwd ?? process.cwd()).get(),
		exitCode: 0,
		io,
	};
}

export function fail(context: CliContext, error: Error): void {
	context.logger.error(error.message, error);
	context.exitCode = 1;
}
