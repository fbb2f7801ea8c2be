/**
 * Error classification for routing and log decisions.
 *
 * - `input`: the submitted data is at fault; retrying the same file cannot help
 * - `infrastructure`: a collaborator (disk, mailbox, SMTP) failed
 * - `configuration`: the job is missing settings it needs
 */
export type ErrorClassification = "input" | "infrastructure" | "configuration";

export class JobError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		public readonly classification: ErrorClassification,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "JobError";
	}
}

export class InputError extends JobError {
	constructor(message: string, code: string, options?: { cause?: unknown }) {
		super(message, code, "input", options);
		this.name = "InputError";
	}
}

export class InfrastructureError extends JobError {
	constructor(message: string, code: string, options?: { cause?: unknown }) {
		super(message, code, "infrastructure", options);
		this.name = "InfrastructureError";
	}
}

export class ConfigurationError extends JobError {
	constructor(
		message: string,
		public readonly settings: string[] = [],
	) {
		super(message, "configuration_missing", "configuration");
		this.name = "ConfigurationError";
	}
}

/**
 * Patterns that indicate collaborator failures
 */
const INFRASTRUCTURE_PATTERNS = [
	/ECONNREFUSED/i,
	/ETIMEDOUT/i,
	/ENOTFOUND/i,
	/ECONNRESET/i,
	/EACCES/i,
	/EPERM/i,
	/ENOSPC/i,
	/EXDEV/i,
	/connection.*(closed|terminated|reset)/i,
	/timeout/i,
	/temporarily unavailable/i,
	/authentication failed/i,
];

/**
 * Patterns that indicate malformed input data
 */
const INPUT_PATTERNS = [
	/corrupted/i,
	/end of data/i,
	/invalid.*(signature|format|zip)/i,
	/can't find end of central directory/i,
	/unexpected token/i,
];

/**
 * Classify an error for log routing
 */
export function classifyError(error: Error): ErrorClassification {
	// If already classified, use that
	if (error instanceof JobError) {
		return error.classification;
	}

	const message = error.message;

	for (const pattern of INPUT_PATTERNS) {
		if (pattern.test(message)) {
			return "input";
		}
	}

	for (const pattern of INFRASTRUCTURE_PATTERNS) {
		if (pattern.test(message)) {
			return "infrastructure";
		}
	}

	// Unrecognised failures while reading a file are most often its content
	return "input";
}

/**
 * Stable error code for logs and metric tags
 */
export function errorCode(error: unknown): string {
	if (error instanceof JobError) {
		return error.code;
	}
	if (error instanceof Error) {
		return classifyError(error) === "input" ? "input_invalid" : "unexpected_error";
	}
	return "unexpected_error";
}
