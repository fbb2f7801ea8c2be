import { LOGGER, type LoggerService } from "@sheet-intake/job-base";
import { Global, Module } from "@nestjs/common";
import { STORAGE_SERVICE, StorageService } from "./storage.service.js";

@Global()
@Module({
	providers: [
		{
			provide: STORAGE_SERVICE,
			useFactory: (logger: LoggerService) => new StorageService(logger),
			inject: [LOGGER],
		},
	],
	exports: [STORAGE_SERVICE],
})
export class StorageModule {}
