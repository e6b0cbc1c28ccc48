export { Config } from "./config";
export { ConfigError } from "./errors";
export { CONFIG_FILE_NAME, configFileSchema } from "./schema";
export type { ConfigFile } from "./schema";

export type { CalculatorConfig, ConfigOptions, ConfigRootOptions } from "./types/core";
