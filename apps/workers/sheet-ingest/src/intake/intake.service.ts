import { join } from "node:path";
import type { EventLogger, LoggerService } from "@sheet-intake/job-base";
import type { SenderRegistry } from "../registry/sender-registry.js";
import type { SequenceStore } from "../registry/sequence.store.js";
import type { StorageService } from "../storage/storage.service.js";
import type {
	IncomingAttachment,
	IntakeResult,
	Ownership,
} from "./intake.types.js";

export const INTAKE_SERVICE = "INTAKE_SERVICE";

export function stagedFileName(code: string, sequence: number): string {
	return `${code}_${sequence}.xlsx`;
}

/**
 * Writes attachments from registered senders into staging under a fresh
 * per-sender sequence number.
 */
export class IntakeService {
	constructor(
		private readonly stagingDir: string,
		private readonly registry: SenderRegistry,
		private readonly sequences: SequenceStore,
		private readonly storage: StorageService,
		private readonly logger: LoggerService,
		private readonly events: EventLogger,
	) {}

	async stage(
		attachments: Iterable<IncomingAttachment>,
		ownership: Ownership = new Map(),
	): Promise<IntakeResult> {
		let count = 0;

		for (const attachment of attachments) {
			const path = await this.stageOne(attachment);
			if (path) {
				ownership.set(path, attachment.sender);
				count++;
			}
		}

		return { ownership, count };
	}

	private async stageOne(attachment: IncomingAttachment): Promise<string | null> {
		const profile = this.registry.lookup(attachment.sender);
		if (!profile) {
			this.logger.info("Attachment from unregistered sender ignored", {
				sender: attachment.sender,
			});
			this.events.attachmentRejected(attachment.sender, "unknown_sender");
			return null;
		}

		if (attachment.content.byteLength === 0) {
			this.logger.info("Empty attachment ignored", {
				sender: profile.address,
				filename: attachment.filename,
			});
			this.events.attachmentRejected(profile.address, "empty_payload");
			return null;
		}

		// Counter moves before the write; a failed write burns the number
		const sequence = await this.sequences.next(profile.address);
		const path = join(this.stagingDir, stagedFileName(profile.code, sequence));
		await this.storage.write(path, attachment.content);

		this.events.attachmentStaged(profile.address, path, sequence);
		return path;
	}
}
