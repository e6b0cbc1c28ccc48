import type { Logger } from "@core/logging";

export type UserValue = string | number | boolean | null;

export type UserRecord = Readonly<Record<string, UserValue>>;

export type ProcessedUserRecord = UserRecord & { readonly processed: true };

export interface FetchOptions {
	readonly latencyMs?: number;
	readonly logger?: Logger;
}

export interface PipelineOptions {
	readonly latencyMs?: number;
	readonly userId?: number;
	readonly greetingName?: string;
}

export interface PipelineResult {
	readonly user: ProcessedUserRecord;
	readonly isValid: boolean;
	readonly greeting: string;
	readonly elapsedMs: number;
}
