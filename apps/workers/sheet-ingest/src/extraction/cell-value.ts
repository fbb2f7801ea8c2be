import type { CellValue } from "exceljs";
import type { FieldValue } from "./record.types.js";

function textOrNull(text: string): string | null {
	const trimmed = text.trim();
	return trimmed === "" ? null : trimmed;
}

/**
 * Collapse an exceljs cell value into a record value.
 */
export function normalizeCellValue(value: CellValue): FieldValue {
	if (value === null || value === undefined) {
		return null;
	}
	if (value instanceof Date) {
		return value;
	}
	if (typeof value === "string") {
		return textOrNull(value);
	}
	if (typeof value === "number" || typeof value === "boolean") {
		return String(value);
	}
	if ("richText" in value) {
		return textOrNull(value.richText.map((run) => run.text).join(""));
	}
	if ("hyperlink" in value) {
		// exceljs may hand back rich text here despite its typings
		return normalizeCellValue(value.text);
	}
	if ("formula" in value || "sharedFormula" in value) {
		return normalizeCellValue(value.result ?? null);
	}
	// Error cells (#N/A, #REF!, ...)
	return null;
}

export function isoDate(value: Date): string {
	return value.toISOString().slice(0, 10);
}

/** Text form of a value used as a label or title */
export function valueText(value: FieldValue): string | null {
	if (value === null) {
		return null;
	}
	return value instanceof Date ? isoDate(value) : value;
}
