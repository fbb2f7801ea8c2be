import type { z } from "zod";
import { MissingEnvVarError, ValidationError } from "./errors.js";
import {
	type BaseConfig,
	type DatadogConfig,
	type DirectoriesConfig,
	type MailboxConfig,
	type RegistryConfig,
	type ReportsConfig,
	type SmtpConfig,
	baseConfigSchema,
	datadogConfigSchema,
	directoriesConfigSchema,
	mailboxConfigSchema,
	registryConfigSchema,
	reportsConfigSchema,
	smtpConfigSchema,
} from "./schemas.js";

export interface ConfigLoaderOptions {
	/** Throw on missing required vars instead of leaving them unset */
	strict?: boolean;
	/** Custom environment object (defaults to process.env) */
	env?: Record<string, string | undefined>;
}

interface EnvVarDef {
	key: string;
	required?: boolean;
	/** Appended to the missing-variable message */
	description?: string;
	default?: string | number | boolean;
	transform?: (value: string) => string | number | boolean;
}

function getEnvVar(
	env: Record<string, string | undefined>,
	def: EnvVarDef,
	strict: boolean,
): string | number | boolean | undefined {
	const value = env[def.key];

	if (value === undefined || value === "") {
		if (def.required && strict) {
			throw new MissingEnvVarError(def.key, def.description);
		}
		return def.default;
	}

	if (def.transform) {
		return def.transform(value);
	}

	return value;
}

const toBool = (v: string): boolean => v.toLowerCase() === "true" || v === "1";
const toInt = (v: string): number => Number.parseInt(v, 10);

export interface FullConfig {
	base: BaseConfig;
	mailbox: MailboxConfig;
	smtp: SmtpConfig;
	reports: ReportsConfig;
	directories: DirectoriesConfig;
	registry: RegistryConfig;
	datadog: DatadogConfig;
}

const validateSchema = <S extends z.ZodTypeAny>(
	schema: S,
	data: unknown,
	name: string,
): z.output<S> => {
	const result = schema.safeParse(data);
	if (!result.success) {
		const errors = result.error.errors.map((e) => ({
			path: e.path.join("."),
			message: e.message,
		}));
		throw new ValidationError(name, errors);
	}
	return result.data;
};

export function loadConfig(options: ConfigLoaderOptions = {}): FullConfig {
	const env = options.env ?? process.env;
	const strict = options.strict ?? false;

	// Mailbox values double as SMTP defaults
	const mailboxHost = getEnvVar(
		env,
		{
			key: "MAILBOX_HOST",
			required: true,
			description: "IMAP host of the intake mailbox",
		},
		strict,
	);
	const mailboxUser = getEnvVar(
		env,
		{
			key: "MAILBOX_USER",
			required: true,
			description: "intake mailbox login",
		},
		strict,
	);
	const mailboxPassword = getEnvVar(
		env,
		{
			key: "MAILBOX_PASSWORD",
			required: true,
			description: "intake mailbox password",
		},
		strict,
	);

	const baseRaw = {
		env: getEnvVar(env, { key: "ENV", default: "dev" }, strict),
		nodeEnv: getEnvVar(
			env,
			{ key: "NODE_ENV", default: "development" },
			strict,
		),
		service: {
			name: getEnvVar(
				env,
				{ key: "SERVICE_NAME", default: "sheet-ingest" },
				strict,
			),
			version: getEnvVar(
				env,
				{ key: "SERVICE_VERSION", default: "0.1.0" },
				strict,
			),
			team: getEnvVar(env, { key: "TEAM", default: "records" }, strict),
			domain: getEnvVar(env, { key: "DOMAIN", default: "intake" }, strict),
			pipeline: getEnvVar(
				env,
				{ key: "PIPELINE", default: "sheet-intake" },
				strict,
			),
		},
		logLevel: getEnvVar(env, { key: "LOG_LEVEL", default: "info" }, strict),
		logFormat: getEnvVar(env, { key: "LOG_FORMAT", default: "json" }, strict),
		redactEmails: getEnvVar(
			env,
			{ key: "LOG_REDACT_EMAILS", default: false, transform: toBool },
			strict,
		),
	};

	const mailboxRaw = {
		host: mailboxHost,
		port: getEnvVar(
			env,
			{ key: "MAILBOX_PORT", default: 993, transform: toInt },
			strict,
		),
		secure: getEnvVar(
			env,
			{ key: "MAILBOX_SECURE", default: true, transform: toBool },
			strict,
		),
		user: mailboxUser,
		password: mailboxPassword,
		mailbox: getEnvVar(env, { key: "MAILBOX_NAME", default: "INBOX" }, strict),
	};

	const smtpUser = getEnvVar(env, { key: "SMTP_USER" }, strict) ?? mailboxUser;
	const smtpRaw = {
		host: getEnvVar(env, { key: "SMTP_HOST" }, strict) ?? mailboxHost,
		port: getEnvVar(
			env,
			{ key: "SMTP_PORT", default: 587, transform: toInt },
			strict,
		),
		user: smtpUser,
		password: getEnvVar(env, { key: "SMTP_PASSWORD" }, strict) ?? mailboxPassword,
		from: getEnvVar(env, { key: "MAIL_FROM" }, strict) ?? smtpUser,
	};

	const reportsRaw = {
		adminAddress: getEnvVar(env, { key: "REPORT_EMAIL" }, strict),
		templateDir: getEnvVar(
			env,
			{ key: "REPORT_TEMPLATE_DIR", default: "reports" },
			strict,
		),
		defaultLanguage: getEnvVar(
			env,
			{ key: "DEFAULT_LANGUAGE", default: "en" },
			strict,
		),
	};

	const directoriesRaw = {
		staging: getEnvVar(
			env,
			{ key: "STAGING_DIR", default: "data/sandbox" },
			strict,
		),
		success: getEnvVar(
			env,
			{ key: "SUCCESS_DIR", default: "data/success" },
			strict,
		),
		error: getEnvVar(env, { key: "ERROR_DIR", default: "data/error" }, strict),
		output: getEnvVar(
			env,
			{ key: "OUTPUT_DIR", default: "data/output" },
			strict,
		),
	};

	const registryRaw = {
		path: getEnvVar(
			env,
			{ key: "SENDER_REGISTRY_PATH", default: "senders.json" },
			strict,
		),
	};

	const datadogRaw = {
		traceEnabled: getEnvVar(
			env,
			{ key: "DD_TRACE_ENABLED", default: false, transform: toBool },
			strict,
		),
		runtimeMetricsEnabled: getEnvVar(
			env,
			{ key: "DD_RUNTIME_METRICS_ENABLED", default: false, transform: toBool },
			strict,
		),
		metricPrefix: getEnvVar(
			env,
			{ key: "METRIC_PREFIX", default: "sheet_intake" },
			strict,
		),
	};

	return {
		base: validateSchema(baseConfigSchema, baseRaw, "base"),
		mailbox: validateSchema(mailboxConfigSchema, mailboxRaw, "mailbox"),
		smtp: validateSchema(smtpConfigSchema, smtpRaw, "smtp"),
		reports: validateSchema(reportsConfigSchema, reportsRaw, "reports"),
		directories: validateSchema(
			directoriesConfigSchema,
			directoriesRaw,
			"directories",
		),
		registry: validateSchema(registryConfigSchema, registryRaw, "registry"),
		datadog: validateSchema(datadogConfigSchema, datadogRaw, "datadog"),
	};
}
