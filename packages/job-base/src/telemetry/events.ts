/**
 * EventLogger - structured job events on top of LoggerService.
 */

import { Injectable } from "@nestjs/common";
import type { JobConfig } from "../config/config.module.js";
import type {
	AttachmentRejectedEvent,
	AttachmentStagedEvent,
	BaseEvent,
	FileRoutedEvent,
	JobEvent,
	RunAbortedEvent,
	RunCompletedEvent,
	RunStartedEvent,
	ServiceTags,
} from "./events.types.js";
import type { LoggerService } from "./logger.service.js";

export const EVENT_LOGGER = "EVENT_LOGGER";

type EventPayload<T extends JobEvent> = Omit<T, "event" | "timestamp">;

/**
 * Creates a base event with timestamp
 */
function createBaseEvent<T extends string>(event: T): BaseEvent & { event: T } {
	return {
		event,
		timestamp: new Date().toISOString(),
	};
}

@Injectable()
export class EventLogger {
	private readonly baseTags: ServiceTags;

	constructor(
		private readonly logger: LoggerService,
		config: JobConfig,
	) {
		this.baseTags = {
			service: config.base.service.name,
			version: config.base.service.version,
			env: config.base.env,
			team: config.base.service.team,
			domain: config.base.service.domain,
			pipeline: config.base.service.pipeline,
		};
	}

	private emit(event: JobEvent): void {
		this.logger.info(event.event, { ...this.baseTags, ...event });
	}

	runStarted(runId: string): void {
		const event: RunStartedEvent = {
			...createBaseEvent("sheet_intake.run.started"),
			run_id: runId,
		};
		this.emit(event);
	}

	runCompleted(payload: EventPayload<RunCompletedEvent>): void {
		const event: RunCompletedEvent = {
			...createBaseEvent("sheet_intake.run.completed"),
			...payload,
		};
		this.emit(event);
	}

	runAborted(runId: string, error: Error, errorCode: string): void {
		const event: RunAbortedEvent = {
			...createBaseEvent("sheet_intake.run.aborted"),
			run_id: runId,
			error_code: errorCode,
			error_message: error.message,
		};
		this.emit(event);
	}

	attachmentStaged(sender: string, file: string, sequence: number): void {
		const event: AttachmentStagedEvent = {
			...createBaseEvent("sheet_intake.attachment.staged"),
			sender,
			file,
			sequence,
		};
		this.emit(event);
	}

	attachmentRejected(
		sender: string,
		reason: AttachmentRejectedEvent["reason"],
	): void {
		const event: AttachmentRejectedEvent = {
			...createBaseEvent("sheet_intake.attachment.rejected"),
			sender,
			reason,
		};
		this.emit(event);
	}

	fileRouted(payload: EventPayload<FileRoutedEvent>): void {
		const event: FileRoutedEvent = {
			...createBaseEvent("sheet_intake.file.routed"),
			...payload,
		};
		this.emit(event);
	}
}
