import {
	EVENT_LOGGER,
	type EventLogger,
	JOB_CONFIG,
	type JobConfig,
	LOGGER,
	LifecycleService,
	type LoggerService,
	TelemetryService,
} from "@sheet-intake/job-base";
import { Module } from "@nestjs/common";
import { MailboxModule } from "../mailbox/mailbox.module.js";
import {
	MAILBOX_SERVICE,
	type MailboxService,
} from "../mailbox/mailbox.service.js";
import { PipelineModule } from "../pipeline/pipeline.module.js";
import {
	PIPELINE_SERVICE,
	type PipelineService,
} from "../pipeline/pipeline.service.js";
import {
	STORAGE_SERVICE,
	type StorageService,
} from "../storage/storage.service.js";
import { JOB_RUNNER, JobRunner } from "./job.runner.js";

@Module({
	imports: [MailboxModule, PipelineModule],
	providers: [
		{
			provide: JOB_RUNNER,
			useFactory: (
				config: JobConfig,
				storage: StorageService,
				mailbox: MailboxService,
				pipeline: PipelineService,
				lifecycle: LifecycleService,
				logger: LoggerService,
				events: EventLogger,
				telemetry: TelemetryService,
			) =>
				new JobRunner({
					directories: config.directories,
					storage,
					mailbox,
					pipeline,
					lifecycle,
					logger,
					events,
					telemetry,
				}),
			inject: [
				JOB_CONFIG,
				STORAGE_SERVICE,
				MAILBOX_SERVICE,
				PIPELINE_SERVICE,
				LifecycleService,
				LOGGER,
				EVENT_LOGGER,
				TelemetryService,
			],
		},
	],
	exports: [JOB_RUNNER],
})
export class JobModule {}
