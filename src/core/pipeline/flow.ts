import { logger as defaultLogger, type Logger } from "@core/logging";
import { toError, type Result } from "../../types/misc";
import { DEFAULT_PIPELINE_OPTIONS } from "./config";
import { createGreeter, type Greeter } from "./greeting";
import type { PipelineOptions, PipelineResult, ProcessedUserRecord } from "./types/core";
import { fetchUser, validateUser } from "./user";

interface FlowInputState {
	readonly userId: number;
	readonly greetingName: string;
	readonly startTime: number;
}

interface FetchedState extends FlowInputState {
	readonly user: ProcessedUserRecord;
}

interface ValidatedState extends FetchedState {
	readonly isValid: boolean;
}

interface GreetedState extends ValidatedState {
	readonly greeting: string;
}

/**
 * fetch -> validate -> greet, each step awaited before the next starts.
 */
export class GreetingFlow {
	private readonly config: Required<PipelineOptions>;
	private readonly logger: Logger;
	private readonly greet: Greeter;

	constructor(config: PipelineOptions = {}, logger: Logger = defaultLogger) {
		this.config = {
			latencyMs: config.latencyMs ?? DEFAULT_PIPELINE_OPTIONS.latencyMs,
			userId: config.userId ?? DEFAULT_PIPELINE_OPTIONS.userId,
			greetingName: config.greetingName ?? DEFAULT_PIPELINE_OPTIONS.greetingName,
		};
		this.logger = logger;
		this.greet = createGreeter(logger);
	}

	async run(): Promise<Result<PipelineResult>> {
		const initial: FlowInputState = {
			userId: this.config.userId,
			greetingName: this.config.greetingName,
			startTime: Date.now(),
		};

		try {
			const fetched = await this.runFetchStep(initial);
			const validated = await this.runValidationStep(fetched);
			const greeted = this.runGreetingStep(validated);

			return {
				ok: true,
				value: {
					user: greeted.user,
					isValid: greeted.isValid,
					greeting: greeted.greeting,
					elapsedMs: Date.now() - greeted.startTime,
				},
			};
		} catch (error) {
			return { ok: false, error: toError(error) };
		}
	}

	private async runFetchStep(state: FlowInputState): Promise<FetchedState> {
		const user = await fetchUser(state.userId, {
			latencyMs: this.config.latencyMs,
			logger: this.logger,
		});
		this.logger.debug("Fetched user", { userId: state.userId });

		return { ...state, user };
	}

	private async runValidationStep(state: FetchedState): Promise<ValidatedState> {
		const isValid = await validateUser(state.user);
		if (isValid) {
			this.logger.print("User is valid:", state.user);
		} else {
			this.logger.warn("User failed validation", { userId: state.userId });
		}

		return { ...state, isValid };
	}

	private runGreetingStep(state: ValidatedState): GreetedState {
		const greeting = this.greet(state.greetingName);
		this.logger.print(greeting);

		return { ...state, greeting };
	}
}
