import { Logger, type LoggerOptions } from "@core/logging";

export interface CapturedLogger {
	logger: Logger;
	stdout: string[];
	stderr: string[];
}

export function captureLogger(options: LoggerOptions = {}): CapturedLogger {
	const stdout: string[] = [];
	const stderr: string[] = [];
	const logger = new Logger({
		color: false,
		...options,
		stdout: (line) => stdout.push(line),
		stderr: (line) => stderr.push(line),
	});
	return { logger, stdout, stderr };
}
