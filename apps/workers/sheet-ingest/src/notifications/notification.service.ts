import type { ReportsConfig } from "@sheet-intake/core-config";
import { ConfigurationError, type LoggerService } from "@sheet-intake/job-base";
import type { SenderRegistry } from "../registry/sender-registry.js";
import type { MailTransport } from "./mail-transport.js";
import type { TemplateStore } from "./template.store.js";

export const NOTIFICATION_SERVICE = "NOTIFICATION_SERVICE";

export const FAILURE_SUBJECT = "Missing fields";
export const SUCCESS_SUBJECT = "Thank you for your email";
export const ADMIN_SUBJECT = "New files added";

export function failureBody(template: string, missingFields: string[]): string {
	return [template, ...missingFields.map((label) => `- ${label}`)].join("\n");
}

export class NotificationService {
	constructor(
		private readonly transport: MailTransport,
		private readonly templates: TemplateStore,
		private readonly registry: SenderRegistry,
		private readonly reports: ReportsConfig,
		private readonly logger: LoggerService,
	) {}

	async sendFailureReport(sender: string, missingFields: string[]): Promise<void> {
		const template = await this.templates.resolve(
			"failure",
			this.languageOf(sender),
			FAILURE_SUBJECT,
		);
		await this.transport.send(
			sender,
			FAILURE_SUBJECT,
			failureBody(template, missingFields),
		);
		this.logger.info("Failure report sent", {
			sender,
			missing_fields: missingFields,
		});
	}

	async sendSuccessReport(sender: string): Promise<void> {
		const template = await this.templates.resolve(
			"success",
			this.languageOf(sender),
			SUCCESS_SUBJECT,
		);
		await this.transport.send(sender, SUCCESS_SUBJECT, template);
		this.logger.info("Success report sent", { sender });
	}

	async sendAdminNotice(sender: string, documentPath: string): Promise<void> {
		const to = this.reports.adminAddress;
		if (!to) {
			throw new ConfigurationError("No report address configured", [
				"REPORT_EMAIL",
			]);
		}
		await this.transport.send(to, ADMIN_SUBJECT, `From ${sender}, ${documentPath}`);
		this.logger.info("Admin notice sent", { sender, file: documentPath });
	}

	private languageOf(sender: string): string | undefined {
		return this.registry.lookup(sender)?.language;
	}
}
