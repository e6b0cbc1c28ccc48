import type { ColorSupportLevel } from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogWriter = (line: string) => void;

export interface LoggingOptions {
	readonly level?: LogLevel;
	readonly color?: boolean;
}

export interface LoggerOptions extends LoggingOptions {
	/** Overrides chalk's terminal detection when `color` is on. */
	readonly colorLevel?: ColorSupportLevel;
	readonly prefix?: string;
	readonly stdout?: LogWriter;
	readonly stderr?: LogWriter;
}
