import { format } from "node:util";
import {
	Chalk,
	type ChalkInstance,
	type ColorSupportLevel,
	supportsColor,
	supportsColorStderr,
} from "chalk";
import { DEFAULT_LOGGING_OPTIONS } from "./config";
import type { LoggerOptions, LogLevel, LogWriter } from "./types/core";

const LOG_LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	silent: 4,
};

const writeStdout: LogWriter = (line) => {
	console.log(line);
};

const writeStderr: LogWriter = (line) => {
	console.error(line);
};

function createPaint(
	color: boolean,
	level: ColorSupportLevel | undefined,
	detected: typeof supportsColor,
): ChalkInstance {
	if (!color) return new Chalk({ level: 0 });
	return new Chalk({ level: level ?? (detected ? detected.level : 0) });
}

/**
 * Leveled logger used by the CLI and both components.
 *
 * `print` is program output and ignores the level; `debug`/`info` go to
 * stdout and `warn`/`error` to stderr, each tagged with `[LEVEL]`.
 */
export class Logger {
	private level: LogLevel;
	private readonly prefix: string;
	private readonly color: boolean;
	private readonly colorLevel: ColorSupportLevel | undefined;
	private readonly paint: ChalkInstance;
	private readonly paintStderr: ChalkInstance;
	private readonly stdout: LogWriter;
	private readonly stderr: LogWriter;

	constructor(options: LoggerOptions = {}) {
		this.level = options.level ?? DEFAULT_LOGGING_OPTIONS.level;
		this.color = options.color ?? DEFAULT_LOGGING_OPTIONS.color;
		this.prefix = options.prefix ?? "";
		this.stdout = options.stdout ?? writeStdout;
		this.stderr = options.stderr ?? writeStderr;
		this.colorLevel = options.colorLevel;
		// unless a level is given, each stream gets what its terminal supports
		this.paint = createPaint(this.color, this.colorLevel, supportsColor);
		this.paintStderr = createPaint(this.color, this.colorLevel, supportsColorStderr);
	}

	getLevel(): LogLevel {
		return this.level;
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	/**
	 * Writes a line of program output, formatted the way `console.log`
	 * formats its arguments.
	 */
	print(...args: unknown[]): void {
		this.stdout(format(...args));
	}

	debug(message: string, data?: Record<string, unknown>): void {
		if (!this.shouldLog("debug")) return;
		this.emit(this.stdout, this.paint.gray, "DEBUG", message, data);
	}

	info(message: string, data?: Record<string, unknown>): void {
		if (!this.shouldLog("info")) return;
		this.emit(this.stdout, this.paint.blue, "INFO", message, data);
	}

	warn(message: string, data?: Record<string, unknown>): void {
		if (!this.shouldLog("warn")) return;
		this.emit(this.stderr, this.paintStderr.yellow, "WARN", message, data);
	}

	error(message: string, error?: Error | Record<string, unknown>): void {
		if (!this.shouldLog("error")) return;
		const paint = this.paintStderr.red;
		this.stderr(paint(`[ERROR] ${this.formatMessage(message)}`));
		if (error === undefined) return;
		if (error instanceof Error) {
			// the message line already carries it; only the trace adds anything
			if (this.shouldLog("debug") && error.stack) {
				this.stderr(paint(error.stack));
			}
		} else {
			this.stderr(paint(JSON.stringify(error, null, 2)));
		}
	}

	/**
	 * Create a child logger with a prefix.
	 */
	child(prefix: string): Logger {
		return new Logger({
			level: this.level,
			color: this.color,
			colorLevel: this.colorLevel,
			prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
			stdout: this.stdout,
			stderr: this.stderr,
		});
	}

	private shouldLog(level: LogLevel): boolean {
		return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
	}

	private formatMessage(message: string): string {
		return this.prefix ? `[${this.prefix}] ${message}` : message;
	}

	private emit(
		write: LogWriter,
		paint: (text: string) => string,
		tag: string,
		message: string,
		data: Record<string, unknown> | undefined,
	): void {
		write(paint(`[${tag}] ${this.formatMessage(message)}`));
		if (data) {
			write(paint(JSON.stringify(data, null, 2)));
		}
	}
}

export const logger = new Logger();
