/**
 * Structured job events.
 *
 * Events follow the `sheet_intake.<domain>.<action>` naming convention and are
 * written through the regular logger so they land in the same stream.
 */

/**
 * Service identification tags included in all events
 */
export interface ServiceTags {
	service: string;
	version: string;
	env: string;
	team: string;
	domain: string;
	pipeline: string;
}

/**
 * Base event structure - all events extend this
 */
export interface BaseEvent {
	/** Event name following sheet_intake.<domain>.<action> convention */
	event: string;
	/** ISO 8601 timestamp */
	timestamp: string;
}

// ============================================================================
// Run Events
// ============================================================================

export interface RunStartedEvent extends BaseEvent {
	event: "sheet_intake.run.started";
	run_id: string;
}

export interface RunCompletedEvent extends BaseEvent {
	event: "sheet_intake.run.completed";
	run_id: string;
	duration_ms: number;
	staged: number;
	succeeded: number;
	invalid: number;
	failed: number;
	orphaned: number;
}

export interface RunAbortedEvent extends BaseEvent {
	event: "sheet_intake.run.aborted";
	run_id: string;
	error_code: string;
	error_message: string;
}

// ============================================================================
// Intake Events
// ============================================================================

export interface AttachmentStagedEvent extends BaseEvent {
	event: "sheet_intake.attachment.staged";
	sender: string;
	file: string;
	sequence: number;
}

export interface AttachmentRejectedEvent extends BaseEvent {
	event: "sheet_intake.attachment.rejected";
	sender: string;
	reason: "unknown_sender" | "empty_payload";
}

// ============================================================================
// Pipeline Events
// ============================================================================

export type FileRoute = "success" | "error";

export interface FileRoutedEvent extends BaseEvent {
	event: "sheet_intake.file.routed";
	file: string;
	route: FileRoute;
	outcome: "success" | "invalid" | "failed" | "orphaned";
	sender?: string;
	missing_fields?: string[];
	documents?: string[];
}

// ============================================================================
// Union Types
// ============================================================================

export type RunEvent = RunStartedEvent | RunCompletedEvent | RunAbortedEvent;

export type IntakeEvent = AttachmentStagedEvent | AttachmentRejectedEvent;

export type JobEvent = RunEvent | IntakeEvent | FileRoutedEvent;

export type EventName = JobEvent["event"];
