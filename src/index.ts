export * from "./core/arithmetic/index";
export * from "./core/pipeline/index";
export * from "./core/config/index";
export * from "./core/logging/index";
export type { Result } from "./types/misc";

import packageJson from "../package.json" with { type: "json" };

// Version info
export const VERSION = packageJson.version;
