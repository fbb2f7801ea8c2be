// Config module
export { JobConfigModule, JOB_CONFIG } from "./config/config.module.js";
export type { JobConfig, JobConfigOptions } from "./config/config.module.js";

// Telemetry module
export { TelemetryModule } from "./telemetry/telemetry.module.js";
export { TelemetryService } from "./telemetry/telemetry.service.js";
export {
	LoggerService,
	LOGGER,
	redactObject,
} from "./telemetry/logger.service.js";
export type {
	LogContext,
	RedactionOptions,
} from "./telemetry/logger.service.js";
export { EventLogger, EVENT_LOGGER } from "./telemetry/events.js";
export type {
	JobEvent,
	RunEvent,
	IntakeEvent,
	ServiceTags,
	BaseEvent,
	RunStartedEvent,
	RunCompletedEvent,
	RunAbortedEvent,
	AttachmentStagedEvent,
	AttachmentRejectedEvent,
	FileRoutedEvent,
	FileRoute,
	EventName,
} from "./telemetry/events.types.js";

// Lifecycle module
export { LifecycleModule } from "./lifecycle/lifecycle.module.js";
export { LifecycleService } from "./lifecycle/lifecycle.service.js";
export type { ShutdownSignal } from "./lifecycle/lifecycle.service.js";

// Errors
export {
	JobError,
	InputError,
	InfrastructureError,
	ConfigurationError,
	classifyError,
	errorCode,
} from "./errors/error-classifier.js";
export type { ErrorClassification } from "./errors/error-classifier.js";
