import { z } from "zod";
import { LOG_LEVEL_NAMES } from "@core/logging";

export const CONFIG_FILE_NAME = "calcflow.config.json";

export const configFileSchema = z
	.object({
		logging: z
			.object({
				level: z.enum(LOG_LEVEL_NAMES).optional(),
				color: z.boolean().optional(),
			})
			.strict()
			.optional(),
		calculator: z
			.object({
				echo: z.boolean().optional(),
			})
			.strict()
			.optional(),
		pipeline: z
			.object({
				latencyMs: z.number().int().nonnegative().optional(),
				userId: z.number().int().optional(),
				greetingName: z.string().min(1).optional(),
			})
			.strict()
			.optional(),
	})
	.strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
		.join("; ");
}
