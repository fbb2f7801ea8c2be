import { type NormalizedRecord, isAbsent } from "../extraction/record.types.js";

/**
 * Required labels whose value is absent, in sheet order. Empty means the
 * record passes.
 */
export function findMissingFields(record: NormalizedRecord): string[] {
	return record.fields
		.filter((field) => field.required && isAbsent(field.value))
		.map((field) => field.label);
}
