export { withCallLogging } from "./call-logging";
export { DEFAULT_PIPELINE_OPTIONS } from "./config";
export { main } from "./demo";
export type { MainOptions } from "./demo";
export { fetchData } from "./fetch";
export { GreetingFlow } from "./flow";
export { createGreeter, formatGreeting, greet } from "./greeting";
export type { Greeter } from "./greeting";
export { checkValidation, fetchUser, processUserData, validateUser } from "./user";

export type {
	FetchOptions,
	PipelineOptions,
	PipelineResult,
	ProcessedUserRecord,
	UserRecord,
	UserValue,
} from "./types/core";
