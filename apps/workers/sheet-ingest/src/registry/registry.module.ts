import {
	JOB_CONFIG,
	type JobConfig,
	LOGGER,
	type LoggerService,
} from "@sheet-intake/job-base";
import { Module } from "@nestjs/common";
import {
	STORAGE_SERVICE,
	type StorageService,
} from "../storage/storage.service.js";
import { SENDER_REGISTRY, SenderRegistry } from "./sender-registry.js";
import { SEQUENCE_STORE, SequenceStore } from "./sequence.store.js";

@Module({
	providers: [
		{
			provide: SENDER_REGISTRY,
			useFactory: (
				config: JobConfig,
				storage: StorageService,
				logger: LoggerService,
			) => SenderRegistry.load(config.registry.path, storage, logger),
			inject: [JOB_CONFIG, STORAGE_SERVICE, LOGGER],
		},
		{
			provide: SEQUENCE_STORE,
			useFactory: (registry: SenderRegistry, logger: LoggerService) =>
				new SequenceStore(registry, logger),
			inject: [SENDER_REGISTRY, LOGGER],
		},
	],
	exports: [SENDER_REGISTRY, SEQUENCE_STORE],
})
export class RegistryModule {}
