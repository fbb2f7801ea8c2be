import {
	type EventLogger,
	type LifecycleService,
	type LoggerService,
	type TelemetryService,
	errorCode,
} from "@sheet-intake/job-base";
import { v4 as uuidv4 } from "uuid";
import type { MailboxResult, MailboxService } from "../mailbox/mailbox.service.js";
import type { PipelineService } from "../pipeline/pipeline.service.js";
import type { OutcomeKind, PipelineDirectories } from "../pipeline/pipeline.types.js";
import type { StorageService } from "../storage/storage.service.js";

export const JOB_RUNNER = "JOB_RUNNER";

export interface RunSummary {
	runId: string;
	durationMs: number;
	/** Attachments staged from the mailbox this run */
	staged: number;
	counts: Record<OutcomeKind, number>;
	/** Set when the mailbox could not be read */
	mailboxError?: string;
}

export interface JobRunnerDependencies {
	directories: PipelineDirectories;
	storage: StorageService;
	mailbox: MailboxService;
	pipeline: PipelineService;
	lifecycle: LifecycleService;
	logger: LoggerService;
	events: EventLogger;
	telemetry: TelemetryService;
}

/**
 * One run: prepare directories, collect the mailbox, process staging. Every
 * file in staging leaves it during the run.
 */
export class JobRunner {
	constructor(private readonly deps: JobRunnerDependencies) {}

	async run(): Promise<RunSummary> {
		const { directories, storage, logger, events, telemetry } = this.deps;
		const runId = uuidv4();
		const startTime = Date.now();
		const runLogger = logger.child({ run_id: runId });

		events.runStarted(runId);

		try {
			await storage.ensureDirectories([
				directories.staging,
				directories.success,
				directories.error,
				directories.output,
			]);
		} catch (error) {
			const failure = error instanceof Error ? error : new Error(String(error));
			events.runAborted(runId, failure, errorCode(error));
			throw error;
		}

		const mailbox = await this.collect(runLogger);
		if (mailbox.staged === 0) {
			runLogger.info("No attachments found");
		}
		if (this.deps.lifecycle.isShutdownInProgress()) {
			runLogger.warn("Shutdown requested, emptying staging before exit", {
				signal: this.deps.lifecycle.getSignal(),
			});
		}

		// Staging is always walked; leftovers without an owner go to error
		const pipeline = await this.deps.pipeline.process(mailbox.ownership);

		const summary: RunSummary = {
			runId,
			durationMs: Date.now() - startTime,
			staged: mailbox.staged,
			counts: pipeline.counts,
		};
		if (mailbox.error) {
			summary.mailboxError = mailbox.error;
		}

		events.runCompleted({
			run_id: runId,
			duration_ms: summary.durationMs,
			staged: summary.staged,
			succeeded: summary.counts.success,
			invalid: summary.counts.invalid,
			failed: summary.counts.failed,
			orphaned: summary.counts.orphaned,
		});
		telemetry.timing("run.duration_ms", summary.durationMs);
		telemetry.gauge("run.staged", summary.staged);

		return summary;
	}

	/**
	 * A mailbox failure is logged and leaves the run with nothing staged.
	 */
	private async collect(
		logger: LoggerService,
	): Promise<Pick<MailboxResult, "ownership" | "staged"> & { error?: string }> {
		try {
			return await this.deps.mailbox.collect();
		} catch (error) {
			logger.error("Mailbox collection failed", {
				error_code: errorCode(error),
				error,
			});
			return {
				ownership: new Map(),
				staged: 0,
				error: error instanceof Error ? error.message : String(error),
			};
		}
	}
}
