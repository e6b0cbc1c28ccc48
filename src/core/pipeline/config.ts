import type { PipelineOptions } from "./types/core";

export const DEFAULT_PIPELINE_OPTIONS: Required<PipelineOptions> = {
	latencyMs: 100,
	userId: 1,
	greetingName: "World",
} as const;
