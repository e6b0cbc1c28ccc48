import type { LoggingOptions } from "@core/logging";
import type { PipelineOptions } from "@core/pipeline";

export interface ConfigRootOptions {
	readonly configDir: string;
	readonly fileName?: string;
}

export interface CalculatorConfig {
	readonly echo: boolean;
}

export interface ConfigOptions {
	logging?: Required<LoggingOptions>;
	calculator?: CalculatorConfig;
	pipeline?: Required<PipelineOptions>;

	config: ConfigRootOptions;
}
