import { Global, Module } from "@nestjs/common";
import { LOGGER, type LoggerService } from "../telemetry/logger.service.js";
import { TelemetryService } from "../telemetry/telemetry.service.js";
import { LifecycleService } from "./lifecycle.service.js";

@Global()
@Module({
	providers: [
		{
			provide: LifecycleService,
			useFactory: (logger: LoggerService, telemetry: TelemetryService) => {
				return new LifecycleService(logger, telemetry);
			},
			inject: [LOGGER, TelemetryService],
		},
	],
	exports: [LifecycleService],
})
export class LifecycleModule {}
