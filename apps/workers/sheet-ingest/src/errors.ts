import { InfrastructureError, InputError } from "@sheet-intake/job-base";

/**
 * The workbook cannot be turned into a record: unreadable file, missing
 * primary sheet, unusable labels.
 */
export class MalformedSpreadsheetError extends InputError {
	constructor(
		message: string,
		public readonly file?: string,
		options?: { cause?: unknown },
	) {
		super(message, "malformed_spreadsheet", options);
		this.name = "MalformedSpreadsheetError";
	}
}

export class RegistryError extends InfrastructureError {
	constructor(message: string, code: string, options?: { cause?: unknown }) {
		super(message, code, options);
		this.name = "RegistryError";
	}
}
