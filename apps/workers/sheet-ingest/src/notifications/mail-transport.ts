import type { SmtpConfig } from "@sheet-intake/core-config";
import { ConfigurationError, type LoggerService } from "@sheet-intake/job-base";
import nodemailer, { type Transporter } from "nodemailer";

export const MAIL_TRANSPORT = "MAIL_TRANSPORT";

export interface MailTransport {
	send(to: string, subject: string, body: string): Promise<void>;
}

/**
 * Plain-text mail over SMTP. The transporter is created on first use so a
 * run without notifications never needs SMTP settings.
 */
export class NodemailerTransport implements MailTransport {
	private transporter: Transporter | null = null;

	constructor(
		private readonly config: SmtpConfig,
		private readonly logger: LoggerService,
	) {}

	async send(to: string, subject: string, body: string): Promise<void> {
		const { transporter, from } = this.connect();

		const info = await transporter.sendMail({ from, to, subject, text: body });
		this.logger.debug("Mail sent", {
			to,
			subject,
			message_id: info.messageId,
		});
	}

	private connect(): { transporter: Transporter; from: string } {
		const { host, port, user, password, from } = this.config;
		if (!host || !user || !password || !from) {
			const missing = [
				host ? null : "SMTP_HOST",
				user ? null : "SMTP_USER",
				password ? null : "SMTP_PASSWORD",
				from ? null : "MAIL_FROM",
			].filter((name): name is string => name !== null);
			throw new ConfigurationError(
				`SMTP is not configured: missing ${missing.join(", ")}`,
				missing,
			);
		}

		if (!this.transporter) {
			this.transporter = nodemailer.createTransport({
				host,
				port,
				secure: port === 465,
				requireTLS: port === 587,
				auth: { user, pass: password },
				connectionTimeout: 10000,
				greetingTimeout: 10000,
				socketTimeout: 30000,
			});
			this.logger.log("SMTP transport created", { host, port });
		}

		return { transporter: this.transporter, from };
	}

	close(): void {
		this.transporter?.close();
		this.transporter = null;
	}
}
