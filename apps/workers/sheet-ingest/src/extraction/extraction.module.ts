import { LOGGER, type LoggerService } from "@sheet-intake/job-base";
import { Module } from "@nestjs/common";
import { RECORD_EXTRACTOR, RecordExtractor } from "./record-extractor.js";

@Module({
	providers: [
		{
			provide: RECORD_EXTRACTOR,
			useFactory: (logger: LoggerService) => new RecordExtractor(logger),
			inject: [LOGGER],
		},
	],
	exports: [RECORD_EXTRACTOR],
})
export class ExtractionModule {}
