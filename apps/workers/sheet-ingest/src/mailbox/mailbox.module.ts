import {
	EVENT_LOGGER,
	type EventLogger,
	JOB_CONFIG,
	type JobConfig,
	LOGGER,
	type LoggerService,
} from "@sheet-intake/job-base";
import { Module } from "@nestjs/common";
import { IntakeModule } from "../intake/intake.module.js";
import { INTAKE_SERVICE, type IntakeService } from "../intake/intake.service.js";
import {
	SENDER_REGISTRY,
	type SenderRegistry,
} from "../registry/sender-registry.js";
import {
	ImapMailboxClient,
	MAILBOX_CLIENT_FACTORY,
	type MailboxClientFactory,
} from "./mailbox.client.js";
import { MAILBOX_SERVICE, MailboxService } from "./mailbox.service.js";

@Module({
	imports: [IntakeModule],
	providers: [
		{
			provide: MAILBOX_CLIENT_FACTORY,
			useFactory:
				(config: JobConfig, logger: LoggerService): MailboxClientFactory =>
				() =>
					new ImapMailboxClient(config.mailbox, logger),
			inject: [JOB_CONFIG, LOGGER],
		},
		{
			provide: MAILBOX_SERVICE,
			useFactory: (
				createClient: MailboxClientFactory,
				registry: SenderRegistry,
				intake: IntakeService,
				logger: LoggerService,
				events: EventLogger,
			) => new MailboxService(createClient, registry, intake, logger, events),
			inject: [
				MAILBOX_CLIENT_FACTORY,
				SENDER_REGISTRY,
				INTAKE_SERVICE,
				LOGGER,
				EVENT_LOGGER,
			],
		},
	],
	exports: [MAILBOX_SERVICE],
})
export class MailboxModule {}
