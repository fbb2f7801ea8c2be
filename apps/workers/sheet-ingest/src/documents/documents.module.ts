import { LOGGER, type LoggerService } from "@sheet-intake/job-base";
import { Module } from "@nestjs/common";
import {
	STORAGE_SERVICE,
	type StorageService,
} from "../storage/storage.service.js";
import { DocumentBuilder } from "./document-builder.js";
import { DOCUMENT_WRITER, DocumentWriter } from "./document-writer.js";

@Module({
	providers: [
		DocumentBuilder,
		{
			provide: DOCUMENT_WRITER,
			useFactory: (storage: StorageService, logger: LoggerService) =>
				new DocumentWriter(storage, logger),
			inject: [STORAGE_SERVICE, LOGGER],
		},
	],
	exports: [DocumentBuilder, DOCUMENT_WRITER],
})
export class DocumentsModule {}
