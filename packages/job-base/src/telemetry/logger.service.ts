import {
	Injectable,
	type LoggerService as NestLoggerService,
} from "@nestjs/common";
import { type LoggerOptions, type Logger as PinoLogger, pino } from "pino";
import type { JobConfig } from "../config/config.module.js";
import { EventLogger } from "./events.js";

export const LOGGER = "LOGGER";

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

const SENSITIVE_KEYS = [
	/password/i,
	/secret/i,
	/token/i,
	/api_?key/i,
	/auth/i,
	/credential/i,
	/private/i,
	/^body$/i, // Never log report bodies
];

export interface RedactionOptions {
	/** Replace e-mail addresses found in string values */
	emails: boolean;
}

function redactValue(value: unknown, options: RedactionOptions): unknown {
	if (typeof value === "string") {
		return options.emails ? value.replace(EMAIL_PATTERN, "[PII_REDACTED]") : value;
	}

	if (Array.isArray(value)) {
		return value.map((item) => redactValue(item, options));
	}

	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}

	if (isPlainRecord(value)) {
		return redactObject(value, options);
	}

	return value;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !(value instanceof Date);
}

export function redactObject(
	obj: Record<string, unknown>,
	options: RedactionOptions,
): Record<string, unknown> {
	const result: Record<string, unknown> = {};

	for (const [key, value] of Object.entries(obj)) {
		if (SENSITIVE_KEYS.some((p) => p.test(key))) {
			result[key] = "[REDACTED]";
			continue;
		}

		result[key] = redactValue(value, options);
	}

	return result;
}

export interface LogContext {
	run_id?: string;
	sender?: string;
	file?: string;
	stage?: string;
	error_code?: string;
	duration_ms?: number;
	[key: string]: unknown;
}

function createPino(config: JobConfig): PinoLogger {
	const options: LoggerOptions = {
		level: config.base.logLevel,
		base: {
			env: config.base.env,
			service: config.base.service.name,
			version: config.base.service.version,
		},
		formatters: {
			level: (label: string) => ({ level: label }),
		},
		timestamp: pino.stdTimeFunctions.isoTime,
	};

	// JSON by default, pretty only if explicitly requested
	if (config.base.logFormat === "pretty") {
		options.transport = {
			target: "pino-pretty",
			options: {
				colorize: true,
				translateTime: "SYS:standard",
				ignore: "pid,hostname",
			},
		};
	}

	return pino(options);
}

@Injectable()
export class LoggerService implements NestLoggerService {
	private readonly pino: PinoLogger;
	private readonly baseTags: Record<string, string>;
	private readonly redaction: RedactionOptions;

	constructor(
		private readonly config: JobConfig,
		instance?: PinoLogger,
	) {
		this.baseTags = {
			team: config.base.service.team,
			domain: config.base.service.domain,
			pipeline: config.base.service.pipeline,
		};
		this.redaction = { emails: config.base.redactEmails };
		this.pino = instance ?? createPino(config);
	}

	private formatContext(context?: LogContext): Record<string, unknown> {
		if (!context) {
			return { ...this.baseTags };
		}

		return {
			...this.baseTags,
			...redactObject(context, this.redaction),
		};
	}

	log(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.info({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.info(this.formatContext(context), message);
		}
	}

	/**
	 * Accepts Nest's `(message, stack, context)` form as well as a context
	 * object.
	 */
	error(message: string, trace?: string | LogContext, context?: string): void {
		if (typeof trace === "object") {
			this.pino.error(this.formatContext(trace), message);
			return;
		}
		this.pino.error(
			{ ...this.baseTags, nestContext: context, stack: trace },
			message,
		);
	}

	warn(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.warn({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.warn(this.formatContext(context), message);
		}
	}

	debug(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.debug({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.debug(this.formatContext(context), message);
		}
	}

	verbose(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.trace({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.trace(this.formatContext(context), message);
		}
	}

	/**
	 * Log with explicit context (preferred method for business logic)
	 */
	info(message: string, context?: LogContext): void {
		this.pino.info(this.formatContext(context), message);
	}

	/**
	 * Failures that need an operator: a run aborted, the registry could not
	 * be written.
	 */
	critical(message: string, context?: LogContext): void {
		this.pino.error({ ...this.formatContext(context), critical: true }, message);
	}

	/**
	 * Create a child logger with additional context
	 */
	child(bindings: Record<string, unknown>): LoggerService {
		return new LoggerService(
			this.config,
			this.pino.child(redactObject(bindings, this.redaction)),
		);
	}

	createEventLogger(): EventLogger {
		return new EventLogger(this, this.config);
	}
}
