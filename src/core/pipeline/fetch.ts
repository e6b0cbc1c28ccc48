import { logger as defaultLogger } from "@core/logging";
import { DEFAULT_PIPELINE_OPTIONS } from "./config";
import type { FetchOptions, UserRecord } from "./types/core";

/**
 * Fetches data from API
 *
 * Stands in for a network call: waits for the simulated latency and
 * resolves a fresh mock record whatever the url.
 */
export async function fetchData(url: string, options: FetchOptions = {}): Promise<UserRecord> {
	const latencyMs = options.latencyMs ?? DEFAULT_PIPELINE_OPTIONS.latencyMs;
	const logger = options.logger ?? defaultLogger;

	logger.debug("Fetching", { url, latencyMs });
	return new Promise<UserRecord>((resolve) => {
		setTimeout(() => resolve({ data: "mock" }), latencyMs);
	});
}
