import { logger as defaultLogger, type Logger } from "@core/logging";
import { GreetingFlow } from "./flow";
import type { PipelineOptions, PipelineResult } from "./types/core";

export interface MainOptions extends PipelineOptions {
	readonly logger?: Logger;
}

/**
 * Main function
 *
 * Prints the validated user, the logged `greet` call and the greeting.
 */
export async function main(options: MainOptions = {}): Promise<PipelineResult> {
	const { logger = defaultLogger, ...pipeline } = options;
	const result = await new GreetingFlow(pipeline, logger).run();
	if (!result.ok) {
		throw result.error;
	}
	return result.value;
}
