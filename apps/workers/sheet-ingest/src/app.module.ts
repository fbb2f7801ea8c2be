import {
	JobConfigModule,
	LifecycleModule,
	TelemetryModule,
} from "@sheet-intake/job-base";
import { Module } from "@nestjs/common";
import { JobModule } from "./job/job.module.js";
import { StorageModule } from "./storage/storage.module.js";

@Module({
	imports: [
		// Core infrastructure
		JobConfigModule.forRoot({
			envFilePath: ".env",
		}),
		TelemetryModule,
		LifecycleModule,

		// Local disk
		StorageModule,

		// Mailbox intake and staging pipeline
		JobModule,
	],
})
export class AppModule {}
