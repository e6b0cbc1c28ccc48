import { logger as defaultLogger, type Logger } from "@core/logging";
import { withCallLogging } from "./call-logging";

export type Greeter = (name: string) => string;

export function formatGreeting(name: string): string {
	return `Hello, ${name}!`;
}

export function createGreeter(logger: Logger = defaultLogger): Greeter {
	return withCallLogging("greet", formatGreeting, logger);
}

export const greet: Greeter = createGreeter();
