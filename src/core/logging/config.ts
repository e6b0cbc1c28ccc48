import type { LoggingOptions } from "./types/core";

export const DEFAULT_LOGGING_OPTIONS: Required<LoggingOptions> = {
	level: "info",
	color: true,
} as const;

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error", "silent"] as const;
