export { Logger, logger } from "./logger";
export { DEFAULT_LOGGING_OPTIONS, LOG_LEVEL_NAMES } from "./config";

export type {
	LoggerOptions,
	LoggingOptions,
	LogLevel,
	LogWriter,
} from "./types/core";
