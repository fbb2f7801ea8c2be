import {
	EVENT_LOGGER,
	type EventLogger,
	JOB_CONFIG,
	type JobConfig,
	LOGGER,
	type LoggerService,
} from "@sheet-intake/job-base";
import { Module } from "@nestjs/common";
import { RegistryModule } from "../registry/registry.module.js";
import {
	SENDER_REGISTRY,
	type SenderRegistry,
} from "../registry/sender-registry.js";
import {
	SEQUENCE_STORE,
	type SequenceStore,
} from "../registry/sequence.store.js";
import {
	STORAGE_SERVICE,
	type StorageService,
} from "../storage/storage.service.js";
import { INTAKE_SERVICE, IntakeService } from "./intake.service.js";

@Module({
	imports: [RegistryModule],
	providers: [
		{
			provide: INTAKE_SERVICE,
			useFactory: (
				config: JobConfig,
				registry: SenderRegistry,
				sequences: SequenceStore,
				storage: StorageService,
				logger: LoggerService,
				events: EventLogger,
			) =>
				new IntakeService(
					config.directories.staging,
					registry,
					sequences,
					storage,
					logger,
					events,
				),
			inject: [
				JOB_CONFIG,
				SENDER_REGISTRY,
				SEQUENCE_STORE,
				STORAGE_SERVICE,
				LOGGER,
				EVENT_LOGGER,
			],
		},
	],
	exports: [INTAKE_SERVICE, RegistryModule],
})
export class IntakeModule {}
