/**
 * Creates an adjustable configuration that can be loaded from
 * `calcflow.config.json` on command.
 */

import fs from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { DEFAULT_CALCULATOR_OPTIONS } from "@core/arithmetic";
import { DEFAULT_LOGGING_OPTIONS } from "@core/logging";
import { DEFAULT_PIPELINE_OPTIONS } from "@core/pipeline";
import { toError, type Result } from "../../types/misc";
import { ConfigError } from "./errors";
import { CONFIG_FILE_NAME, configFileSchema, formatIssues, type ConfigFile } from "./schema";
import type { ConfigOptions, ConfigRootOptions } from "./types/core";

export class Config {
	private config: ConfigOptions;

	constructor(configInit: ConfigRootOptions) {
		this.config = {
			config: configInit,
		};
	}

	withLogging(): this {
		this.config.logging = { ...DEFAULT_LOGGING_OPTIONS };

		return this;
	}

	withCalculator(): this {
		this.config.calculator = { ...DEFAULT_CALCULATOR_OPTIONS };

		return this;
	}

	withPipeline(): this {
		this.config.pipeline = { ...DEFAULT_PIPELINE_OPTIONS };

		return this;
	}

	getFilePath(): string {
		const { configDir, fileName = CONFIG_FILE_NAME } = this.config.config;
		return path.join(configDir, fileName);
	}

	/**
	 * Reads the config file, if there is one, over the defaults.
	 * A missing file keeps the defaults; a missing folder is an error.
	 */
	async load(): Promise<Result<ConfigOptions, ConfigError>> {
		const filePath = this.getFilePath();

		if (!fs.existsSync(this.config.config.configDir)) {
			return { ok: false, error: new ConfigError("Config folder not found", filePath) };
		}

		if (!fs.existsSync(filePath)) {
			return { ok: true, value: this.get() };
		}

		const parsed = await this.readFile(filePath);
		if (!parsed.ok) {
			return parsed;
		}

		this.apply(parsed.value);

		return { ok: true, value: this.get() };
	}

	public get(): ConfigOptions {
		return this.config;
	}

	private async readFile(filePath: string): Promise<Result<ConfigFile, ConfigError>> {
		let contents: string;
		try {
			contents = await readFile(filePath, "utf-8");
		} catch (error) {
			return {
				ok: false,
				error: new ConfigError("Config file could not be read", filePath, toError(error)),
			};
		}

		let raw: unknown;
		try {
			raw = JSON.parse(contents);
		} catch (error) {
			return {
				ok: false,
				error: new ConfigError("Config file is not valid JSON", filePath, toError(error)),
			};
		}

		const result = configFileSchema.safeParse(raw);
		if (!result.success) {
			return {
				ok: false,
				error: new ConfigError(`Invalid config: ${formatIssues(result.error)}`, filePath),
			};
		}

		return { ok: true, value: result.data };
	}

	private apply(file: ConfigFile): void {
		if (file.logging) {
			const base = this.config.logging ?? DEFAULT_LOGGING_OPTIONS;
			this.config.logging = {
				level: file.logging.level ?? base.level,
				color: file.logging.color ?? base.color,
			};
		}

		if (file.calculator) {
			const base = this.config.calculator ?? DEFAULT_CALCULATOR_OPTIONS;
			this.config.calculator = {
				echo: file.calculator.echo ?? base.echo,
			};
		}

		if (file.pipeline) {
			const base = this.config.pipeline ?? DEFAULT_PIPELINE_OPTIONS;
			this.config.pipeline = {
				latencyMs: file.pipeline.latencyMs ?? base.latencyMs,
				userId: file.pipeline.userId ?? base.userId,
				greetingName: file.pipeline.greetingName ?? base.greetingName,
			};
		}
	}
}
