import "reflect-metadata";
import { LOGGER, type LoggerService } from "@sheet-intake/job-base";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module.js";
import { JOB_RUNNER, type JobRunner } from "./job/job.runner.js";

async function bootstrap() {
	const app = await NestFactory.createApplicationContext(AppModule, {
		bufferLogs: true,
	});

	// Use our custom logger
	const logger = app.get<LoggerService>(LOGGER);
	app.useLogger(logger);

	try {
		const summary = await app.get<JobRunner>(JOB_RUNNER).run();
		if (summary.mailboxError) {
			process.exitCode = 1;
		}
	} catch (error) {
		logger.critical("Run aborted", { error });
		process.exitCode = 1;
	} finally {
		await app.close();
	}
}

bootstrap().catch((error) => {
	console.error("Failed to start job:", error);
	process.exit(1);
});
