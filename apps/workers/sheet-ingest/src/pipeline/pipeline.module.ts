import {
	EVENT_LOGGER,
	type EventLogger,
	JOB_CONFIG,
	type JobConfig,
	LOGGER,
	type LoggerService,
	TelemetryService,
} from "@sheet-intake/job-base";
import { Module } from "@nestjs/common";
import { DocumentBuilder } from "../documents/document-builder.js";
import {
	DOCUMENT_WRITER,
	type DocumentWriter,
} from "../documents/document-writer.js";
import { DocumentsModule } from "../documents/documents.module.js";
import { ExtractionModule } from "../extraction/extraction.module.js";
import {
	RECORD_EXTRACTOR,
	type RecordExtractor,
} from "../extraction/record-extractor.js";
import {
	NOTIFICATION_SERVICE,
	type NotificationService,
} from "../notifications/notification.service.js";
import { NotificationsModule } from "../notifications/notifications.module.js";
import {
	STORAGE_SERVICE,
	type StorageService,
} from "../storage/storage.service.js";
import { PIPELINE_SERVICE, PipelineService } from "./pipeline.service.js";

@Module({
	imports: [ExtractionModule, DocumentsModule, NotificationsModule],
	providers: [
		{
			provide: PIPELINE_SERVICE,
			useFactory: (
				config: JobConfig,
				extractor: RecordExtractor,
				builder: DocumentBuilder,
				writer: DocumentWriter,
				notifications: NotificationService,
				storage: StorageService,
				logger: LoggerService,
				events: EventLogger,
				telemetry: TelemetryService,
			) =>
				new PipelineService({
					directories: config.directories,
					extractor,
					builder,
					writer,
					notifications,
					storage,
					logger,
					events,
					telemetry,
				}),
			inject: [
				JOB_CONFIG,
				RECORD_EXTRACTOR,
				DocumentBuilder,
				DOCUMENT_WRITER,
				NOTIFICATION_SERVICE,
				STORAGE_SERVICE,
				LOGGER,
				EVENT_LOGGER,
				TelemetryService,
			],
		},
	],
	exports: [PIPELINE_SERVICE],
})
export class PipelineModule {}
