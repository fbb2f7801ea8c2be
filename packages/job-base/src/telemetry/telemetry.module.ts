import { Global, Module } from "@nestjs/common";
import { JOB_CONFIG, type JobConfig } from "../config/config.module.js";
import { EVENT_LOGGER, type EventLogger } from "./events.js";
import { LOGGER, LoggerService } from "./logger.service.js";
import { TelemetryService } from "./telemetry.service.js";

@Global()
@Module({
	providers: [
		{
			provide: TelemetryService,
			useFactory: (config: JobConfig) => {
				const service = new TelemetryService();
				service.initialize(config);
				return service;
			},
			inject: [JOB_CONFIG],
		},
		{
			provide: LOGGER,
			useFactory: (config: JobConfig) => {
				return new LoggerService(config);
			},
			inject: [JOB_CONFIG],
		},
		{
			provide: EVENT_LOGGER,
			useFactory: (logger: LoggerService): EventLogger =>
				logger.createEventLogger(),
			inject: [LOGGER],
		},
	],
	exports: [TelemetryService, LOGGER, EVENT_LOGGER],
})
export class TelemetryModule {}
