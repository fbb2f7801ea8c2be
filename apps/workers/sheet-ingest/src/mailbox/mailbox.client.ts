import type { MailboxConfig } from "@sheet-intake/core-config";
import { ConfigurationError, type LoggerService } from "@sheet-intake/job-base";
import { ImapFlow } from "imapflow";

export const MAILBOX_CLIENT_FACTORY = "MAILBOX_CLIENT_FACTORY";

/**
 * The mailbox operations a run needs, addressed by UID.
 */
export interface MailboxClient {
	open(): Promise<void>;
	unseen(): Promise<number[]>;
	/** Raw RFC 822 source, without setting \Seen */
	fetchSource(uid: number): Promise<Buffer | null>;
	markSeen(uid: number): Promise<void>;
	close(): Promise<void>;
}

export type MailboxClientFactory = () => MailboxClient;

export class ImapMailboxClient implements MailboxClient {
	private readonly client: ImapFlow;
	private lock: { release(): void } | null = null;

	constructor(
		private readonly config: MailboxConfig,
		private readonly logger: LoggerService,
	) {
		const { host, user, password } = config;
		if (!host || !user || !password) {
			const missing = [
				host ? null : "MAILBOX_HOST",
				user ? null : "MAILBOX_USER",
				password ? null : "MAILBOX_PASSWORD",
			].filter((name): name is string => name !== null);
			throw new ConfigurationError(
				`Mailbox is not configured: missing ${missing.join(", ")}`,
				missing,
			);
		}

		this.client = new ImapFlow({
			host,
			port: config.port,
			secure: config.secure,
			auth: { user, pass: password },
			logger: false,
		});
	}

	async open(): Promise<void> {
		await this.client.connect();
		this.lock = await this.client.getMailboxLock(this.config.mailbox);
		this.logger.debug("Mailbox opened", {
			host: this.config.host,
			mailbox: this.config.mailbox,
		});
	}

	async unseen(): Promise<number[]> {
		const uids = await this.client.search({ seen: false }, { uid: true });
		return uids || [];
	}

	async fetchSource(uid: number): Promise<Buffer | null> {
		// Source is fetched with BODY.PEEK; \Seen stays unset
		const message = await this.client.fetchOne(
			String(uid),
			{ source: true },
			{ uid: true },
		);
		if (!message || !message.source) {
			return null;
		}
		return message.source;
	}

	async markSeen(uid: number): Promise<void> {
		await this.client.messageFlagsAdd(String(uid), ["\\Seen"], { uid: true });
	}

	/** Safe after a failed or partial `open` */
	async close(): Promise<void> {
		this.lock?.release();
		this.lock = null;
		if (!this.client.usable) {
			this.client.close();
			return;
		}
		await this.client.logout();
	}
}
