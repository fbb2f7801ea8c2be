import { type HeaderValue, type ParsedMail, simpleParser } from "mailparser";
import type { IncomingAttachment } from "../intake/intake.types.js";
import { normalizeAddress } from "../registry/sender-registry.js";

export interface ParsedMessage {
	/** Normalized Return-Path address, `null` when absent */
	sender: string | null;
	subject?: string;
	attachments: Array<Omit<IncomingAttachment, "sender">>;
}

function stripBrackets(text: string): string {
	return text.replace(/[<>]/g, "").trim();
}

function headerAddress(value: HeaderValue | undefined): string | null {
	if (value === undefined || value instanceof Date) {
		return null;
	}
	if (typeof value === "string") {
		return stripBrackets(value) || null;
	}
	if (Array.isArray(value)) {
		return headerAddress(value[0]);
	}
	if ("text" in value) {
		const address = value.value[0]?.address;
		return address ? address : stripBrackets(value.text) || null;
	}
	return stripBrackets(value.value) || null;
}

export function returnPath(mail: ParsedMail): string | null {
	const address = headerAddress(mail.headers.get("return-path"));
	return address ? normalizeAddress(address) : null;
}

export async function parseMessage(source: Buffer): Promise<ParsedMessage> {
	const mail = await simpleParser(source);

	return {
		sender: returnPath(mail),
		subject: mail.subject,
		attachments: mail.attachments.map((attachment) => ({
			filename: attachment.filename,
			content: attachment.content,
		})),
	};
}
