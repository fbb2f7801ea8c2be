import { basename, extname } from "node:path";
import {
	ConfigurationError,
	type EventLogger,
	type LoggerService,
	type TelemetryService,
	classifyError,
	errorCode,
} from "@sheet-intake/job-base";
import type { DocumentBuilder } from "../documents/document-builder.js";
import type { DocumentWriter } from "../documents/document-writer.js";
import type { RecordExtractor } from "../extraction/record-extractor.js";
import type { Ownership } from "../intake/intake.types.js";
import type { NotificationService } from "../notifications/notification.service.js";
import type { StorageService } from "../storage/storage.service.js";
import { findMissingFields } from "../validation/validator.js";
import type {
	FileOutcome,
	OutcomeKind,
	PipelineDirectories,
	PipelineSummary,
} from "./pipeline.types.js";

export const PIPELINE_SERVICE = "PIPELINE_SERVICE";

export const STAGED_EXTENSION = ".xlsx";

export interface PipelineDependencies {
	directories: PipelineDirectories;
	extractor: RecordExtractor;
	builder: DocumentBuilder;
	writer: DocumentWriter;
	notifications: NotificationService;
	storage: StorageService;
	logger: LoggerService;
	events: EventLogger;
	telemetry: TelemetryService;
}

/**
 * Walks staging once: extract, validate, build, route and notify for every
 * file present.
 */
export class PipelineService {
	private readonly directories: PipelineDirectories;
	private readonly extractor: RecordExtractor;
	private readonly builder: DocumentBuilder;
	private readonly writer: DocumentWriter;
	private readonly notifications: NotificationService;
	private readonly storage: StorageService;
	private readonly logger: LoggerService;
	private readonly events: EventLogger;
	private readonly telemetry: TelemetryService;

	constructor(deps: PipelineDependencies) {
		this.directories = deps.directories;
		this.extractor = deps.extractor;
		this.builder = deps.builder;
		this.writer = deps.writer;
		this.notifications = deps.notifications;
		this.storage = deps.storage;
		this.logger = deps.logger;
		this.events = deps.events;
		this.telemetry = deps.telemetry;
	}

	async process(ownership: Ownership): Promise<PipelineSummary> {
		const files = await this.storage.listFiles(this.directories.staging);
		const outcomes: FileOutcome[] = [];
		const counts: Record<OutcomeKind, number> = {
			success: 0,
			invalid: 0,
			failed: 0,
			orphaned: 0,
		};

		for (const file of files) {
			const startTime = Date.now();
			const outcome = await this.telemetry.withSpan(
				"sheet_intake.process_file",
				{ file: basename(file) },
				() => this.processFile(file, ownership.get(file)),
			);
			outcomes.push(outcome);
			counts[outcome.kind]++;

			this.telemetry.increment("files.processed", 1, { outcome: outcome.kind });
			this.telemetry.timing("files.duration_ms", Date.now() - startTime, {
				outcome: outcome.kind,
			});
		}

		this.logger.log("Staging processed", { files: files.length, ...counts });
		return { outcomes, counts };
	}

	private async processFile(
		file: string,
		sender: string | undefined,
	): Promise<FileOutcome> {
		if (extname(file) !== STAGED_EXTENSION) {
			this.logger.warn("Unsupported file in staging", { file });
			return this.orphan(file, "unsupported_extension");
		}
		if (sender === undefined) {
			this.logger.warn("Staged file has no sender for this run", { file });
			return this.orphan(file, "unknown_owner");
		}

		this.logger.info("Processing attachment", { file, sender });
		let written: string[] = [];

		try {
			const record = await this.extractor.extract(file);

			const missingFields = findMissingFields(record);
			if (missingFields.length > 0) {
				this.logger.warn("Attachment has missing fields", {
					file,
					sender,
					missing_fields: missingFields,
				});
				await this.route(file, "error");
				this.events.fileRouted({
					file,
					route: "error",
					outcome: "invalid",
					sender,
					missing_fields: missingFields,
				});
				await this.notify("failure_report", file, () =>
					this.notifications.sendFailureReport(sender, missingFields),
				);
				return { kind: "invalid", file, sender, missingFields };
			}

			const documents = this.builder.buildAll(record);
			written = await this.writer.writeAll(documents, this.directories.output);
			await this.route(file, "success");
		} catch (error) {
			return this.fail(file, sender, written, error);
		}

		this.events.fileRouted({
			file,
			route: "success",
			outcome: "success",
			sender,
			documents: written,
		});
		const primary = written[0] ?? "";
		await this.notify("success_report", file, () =>
			this.notifications.sendSuccessReport(sender),
		);
		await this.notify("admin_notice", file, () =>
			this.notifications.sendAdminNotice(sender, primary),
		);

		this.logger.info("Processed attachment", { file, sender, documents: written });
		return { kind: "success", file, sender, documents: written };
	}

	private async fail(
		file: string,
		sender: string,
		written: string[],
		error: unknown,
	): Promise<FileOutcome> {
		const code = errorCode(error);
		const logContext = {
			file,
			sender,
			error_code: code,
			classification: error instanceof Error ? classifyError(error) : "input",
			error,
		};
		this.logger.error("Attachment failed to process", logContext);

		try {
			for (const path of written) {
				await this.storage.remove(path);
			}
			await this.route(file, "error");
		} catch (cleanupError) {
			// Left in staging; the next run sees it again
			this.logger.critical("Could not route failed attachment", {
				file,
				error_code: errorCode(cleanupError),
				error: cleanupError,
			});
		}

		this.events.fileRouted({ file, route: "error", outcome: "failed", sender });
		return { kind: "failed", file, sender, errorCode: code };
	}

	private async orphan(
		file: string,
		reason: "unknown_owner" | "unsupported_extension",
	): Promise<FileOutcome> {
		try {
			await this.route(file, "error");
		} catch (error) {
			this.logger.critical("Could not route orphaned file", {
				file,
				reason,
				error_code: errorCode(error),
				error,
			});
			return { kind: "orphaned", file, reason };
		}
		this.events.fileRouted({ file, route: "error", outcome: "orphaned" });
		return { kind: "orphaned", file, reason };
	}

	private async route(file: string, route: "success" | "error"): Promise<void> {
		const target =
			route === "success" ? this.directories.success : this.directories.error;
		await this.storage.moveInto(file, target);
	}

	/**
	 * Notifications go out after routing; a failed send is logged and does
	 * not change where the file went.
	 */
	private async notify(
		kind: string,
		file: string,
		send: () => Promise<void>,
	): Promise<void> {
		try {
			await send();
		} catch (error) {
			if (error instanceof ConfigurationError) {
				this.logger.error("Notification skipped: configuration missing", {
					kind,
					file,
					settings: error.settings,
					error_code: error.code,
				});
				return;
			}
			this.logger.error("Notification failed", {
				kind,
				file,
				error_code: errorCode(error),
				error,
			});
		}
	}
}
