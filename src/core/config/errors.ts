export class ConfigError extends Error {
	constructor(
		message: string,
		public readonly filePath: string,
		public readonly cause?: Error,
	) {
		super(`${message} (${filePath})`);
		this.name = "ConfigError";
	}
}
