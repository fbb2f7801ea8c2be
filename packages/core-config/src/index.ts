export {
	loadConfig,
	type ConfigLoaderOptions,
	type FullConfig,
} from "./loader.js";
export {
	baseConfigSchema,
	mailboxConfigSchema,
	smtpConfigSchema,
	reportsConfigSchema,
	directoriesConfigSchema,
	registryConfigSchema,
	datadogConfigSchema,
	serviceIdentitySchema,
} from "./schemas.js";
export type {
	BaseConfig,
	MailboxConfig,
	SmtpConfig,
	ReportsConfig,
	DirectoriesConfig,
	RegistryConfig,
	DatadogConfig,
	ServiceIdentity,
} from "./schemas.js";
export { ConfigError, MissingEnvVarError, ValidationError } from "./errors.js";
export type { ConfigIssue } from "./errors.js";
