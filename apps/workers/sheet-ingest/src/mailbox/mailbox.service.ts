import {
	type EventLogger,
	type LoggerService,
	errorCode,
} from "@sheet-intake/job-base";
import type { IntakeService } from "../intake/intake.service.js";
import type { Ownership } from "../intake/intake.types.js";
import type { SenderRegistry } from "../registry/sender-registry.js";
import type { MailboxClient, MailboxClientFactory } from "./mailbox.client.js";
import { parseMessage } from "./message-parser.js";

export const MAILBOX_SERVICE = "MAILBOX_SERVICE";

export interface MailboxResult {
	ownership: Ownership;
	staged: number;
	messages: number;
	/** Left unread: unknown or missing sender */
	skipped: number;
	/** Left unread after an error */
	failed: number;
}

/**
 * One pass over the unread messages of the intake mailbox. A message from a
 * registered sender is marked read once all of its attachments went through
 * intake, whether or not each of them was staged.
 */
export class MailboxService {
	constructor(
		private readonly createClient: MailboxClientFactory,
		private readonly registry: SenderRegistry,
		private readonly intake: IntakeService,
		private readonly logger: LoggerService,
		private readonly events: EventLogger,
	) {}

	async collect(): Promise<MailboxResult> {
		const result: MailboxResult = {
			ownership: new Map(),
			staged: 0,
			messages: 0,
			skipped: 0,
			failed: 0,
		};

		const client = this.createClient();
		try {
			await client.open();
			const uids = await client.unseen();
			this.logger.log("Unread messages found", { count: uids.length });

			for (const uid of uids) {
				result.messages++;
				try {
					const handled = await this.handleMessage(client, uid, result);
					if (handled) {
						await client.markSeen(uid);
					} else {
						result.skipped++;
					}
				} catch (error) {
					result.failed++;
					this.logger.error("Message handling failed, left unread", {
						uid,
						error_code: errorCode(error),
						error,
					});
				}
			}
		} finally {
			await client.close();
		}

		this.logger.log("Mailbox collected", {
			messages: result.messages,
			staged: result.staged,
			skipped: result.skipped,
			failed: result.failed,
		});
		return result;
	}

	/**
	 * @returns false when the message is to stay unread
	 */
	private async handleMessage(
		client: MailboxClient,
		uid: number,
		result: MailboxResult,
	): Promise<boolean> {
		const source = await client.fetchSource(uid);
		if (!source) {
			this.logger.warn("Message has no source", { uid });
			return false;
		}

		const message = await parseMessage(source);
		const sender = message.sender;
		if (!sender) {
			this.logger.warn("Message has no Return-Path", { uid });
			return false;
		}
		if (!this.registry.has(sender)) {
			this.logger.info("Unknown sender", { uid, sender });
			this.events.attachmentRejected(sender, "unknown_sender");
			return false;
		}

		const intake = await this.intake.stage(
			message.attachments.map((attachment) => ({ ...attachment, sender })),
			result.ownership,
		);
		result.staged += intake.count;

		this.logger.info("Downloaded attachments", {
			uid,
			sender,
			count: intake.count,
		});
		return true;
	}
}
