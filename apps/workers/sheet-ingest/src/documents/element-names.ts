const NON_WORD = /[^\p{L}\p{N}_]/gu;
const ELEMENT_NAME = /^[\p{L}_][\p{L}\p{N}_]*$/u;

/** Strip every non-word character */
export function sanitizeName(text: string): string {
	return text.replace(NON_WORD, "");
}

function beforeSeparator(text: string): string {
	return text.split(":")[0] ?? "";
}

/**
 * Root name of a term document from the sheet title:
 * `Place names: controlled` -> `place_names`
 */
export function termRootName(title: string): string {
	return sanitizeName(
		beforeSeparator(title).trim().toLowerCase().replace(/ /g, "_"),
	);
}

/**
 * Child name of a term from its column label:
 * `Country >` -> `country`
 */
export function termChildName(label: string): string {
	return sanitizeName(
		beforeSeparator(label).toLowerCase().replace(/>/g, "").trim().replace(/ /g, "_"),
	);
}

/** `_` alone is reserved by the serializer for text content */
export function isUsableElementName(name: string): boolean {
	return ELEMENT_NAME.test(name) && name !== "_";
}
