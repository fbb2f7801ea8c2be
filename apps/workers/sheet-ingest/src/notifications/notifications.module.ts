import {
	JOB_CONFIG,
	type JobConfig,
	LOGGER,
	LifecycleService,
	type LoggerService,
} from "@sheet-intake/job-base";
import { Module } from "@nestjs/common";
import { RegistryModule } from "../registry/registry.module.js";
import {
	SENDER_REGISTRY,
	type SenderRegistry,
} from "../registry/sender-registry.js";
import {
	MAIL_TRANSPORT,
	type MailTransport,
	NodemailerTransport,
} from "./mail-transport.js";
import {
	NOTIFICATION_SERVICE,
	NotificationService,
} from "./notification.service.js";
import { TemplateStore } from "./template.store.js";

@Module({
	imports: [RegistryModule],
	providers: [
		{
			provide: MAIL_TRANSPORT,
			useFactory: (
				config: JobConfig,
				logger: LoggerService,
				lifecycle: LifecycleService,
			): MailTransport => {
				const transport = new NodemailerTransport(config.smtp, logger);
				lifecycle.onShutdown(async () => transport.close());
				return transport;
			},
			inject: [JOB_CONFIG, LOGGER, LifecycleService],
		},
		{
			provide: TemplateStore,
			useFactory: (config: JobConfig, logger: LoggerService) =>
				new TemplateStore(
					config.reports.templateDir,
					config.reports.defaultLanguage,
					logger,
				),
			inject: [JOB_CONFIG, LOGGER],
		},
		{
			provide: NOTIFICATION_SERVICE,
			useFactory: (
				transport: MailTransport,
				templates: TemplateStore,
				registry: SenderRegistry,
				config: JobConfig,
				logger: LoggerService,
			) =>
				new NotificationService(
					transport,
					templates,
					registry,
					config.reports,
					logger,
				),
			inject: [MAIL_TRANSPORT, TemplateStore, SENDER_REGISTRY, JOB_CONFIG, LOGGER],
		},
	],
	exports: [NOTIFICATION_SERVICE, MAIL_TRANSPORT],
})
export class NotificationsModule {}
