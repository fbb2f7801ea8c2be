export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

/** A required variable is unset while loading in strict mode */
export class MissingEnvVarError extends ConfigError {
	constructor(
		public readonly variableName: string,
		public readonly description?: string,
	) {
		super(
			`Missing required environment variable: ${variableName}${
				description ? ` (${description})` : ""
			}`,
		);
		this.name = "MissingEnvVarError";
	}
}

export interface ConfigIssue {
	/** Field path inside the section, e.g. `adminAddress` */
	path: string;
	message: string;
}

/** One settings section failed its schema; the message lists every field */
export class ValidationError extends ConfigError {
	constructor(
		public readonly section: string,
		public readonly errors: ConfigIssue[],
	) {
		super(
			`Invalid ${section} configuration: ${errors
				.map((issue) => `${issue.path || "(root)"} ${issue.message}`)
				.join("; ")}`,
		);
		this.name = "ValidationError";
	}
}
