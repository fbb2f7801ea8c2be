import { z } from "zod";

export const serviceIdentitySchema = z.object({
	name: z.string().min(1),
	version: z.string().min(1),
	team: z.string().min(1).default("records"),
	domain: z.string().default("intake"),
	pipeline: z.string().default("sheet-intake"),
});

export type ServiceIdentity = z.infer<typeof serviceIdentitySchema>;

export const baseConfigSchema = z.object({
	env: z.enum(["dev", "staging", "prod"]).default("dev"),
	nodeEnv: z.enum(["development", "production", "test"]).default("development"),
	service: serviceIdentitySchema,
	logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
	logFormat: z.enum(["json", "pretty"]).default("json"),
	redactEmails: z.boolean().default(false),
});

export type BaseConfig = z.infer<typeof baseConfigSchema>;

/**
 * IMAP settings. Host and credentials stay optional here: a missing value is
 * reported when the mailbox is polled, not at startup.
 */
export const mailboxConfigSchema = z.object({
	host: z.string().min(1).optional(),
	port: z.number().int().positive().default(993),
	secure: z.boolean().default(true),
	user: z.string().min(1).optional(),
	password: z.string().min(1).optional(),
	mailbox: z.string().min(1).default("INBOX"),
});

export type MailboxConfig = z.infer<typeof mailboxConfigSchema>;

export const smtpConfigSchema = z.object({
	host: z.string().min(1).optional(),
	port: z.number().int().positive().default(587),
	user: z.string().min(1).optional(),
	password: z.string().min(1).optional(),
	from: z.string().min(1).optional(),
});

export type SmtpConfig = z.infer<typeof smtpConfigSchema>;

export const reportsConfigSchema = z.object({
	adminAddress: z.string().email().optional(),
	templateDir: z.string().min(1).default("reports"),
	defaultLanguage: z
		.string()
		.regex(/^[a-z]{2,3}$/)
		.default("en"),
});

export type ReportsConfig = z.infer<typeof reportsConfigSchema>;

export const directoriesConfigSchema = z.object({
	staging: z.string().min(1).default("data/sandbox"),
	success: z.string().min(1).default("data/success"),
	error: z.string().min(1).default("data/error"),
	output: z.string().min(1).default("data/output"),
});

export type DirectoriesConfig = z.infer<typeof directoriesConfigSchema>;

export const registryConfigSchema = z.object({
	path: z.string().min(1).default("senders.json"),
});

export type RegistryConfig = z.infer<typeof registryConfigSchema>;

export const datadogConfigSchema = z.object({
	traceEnabled: z.boolean().default(false),
	runtimeMetricsEnabled: z.boolean().default(false),
	metricPrefix: z.string().min(1).default("sheet_intake"),
});

export type DatadogConfig = z.infer<typeof datadogConfigSchema>;
