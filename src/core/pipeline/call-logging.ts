import { logger as defaultLogger, type Logger } from "@core/logging";

/**
 * Wraps `fn` so each call prints `Calling {name}` before it runs and
 * `Result: {value}` once it returns. The result is passed through as is;
 * a thrown error propagates without a `Result:` line.
 */
export function withCallLogging<TArgs extends unknown[], TResult>(
	name: string,
	fn: (...args: TArgs) => TResult,
	logger: Logger = defaultLogger,
): (...args: TArgs) => TResult {
	return (...args: TArgs): TResult => {
		logger.print(`Calling ${name}`);
		const result = fn(...args);
		logger.print("Result:", result);
		return result;
	};
}
