/** Absent values are `null` */
export type FieldValue = string | Date | null;

export interface RecordField {
	label: string;
	/** Element key from the key column, when given */
	key?: string;
	required: boolean;
	value: FieldValue;
}

/**
 * A secondary sheet as read: title cell, per-column labels, data rows.
 */
export interface AuxiliarySheet {
	sheetName: string;
	title: string;
	labels: Array<string | null>;
	rows: FieldValue[][];
}

export interface NormalizedRecord {
	source: string;
	fields: RecordField[];
	auxiliary: AuxiliarySheet[];
}

export const REQUIRED_MARKER = "*";

export function isAbsent(value: FieldValue): value is null {
	return value === null;
}
