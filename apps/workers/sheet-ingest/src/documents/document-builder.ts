import { basename, extname } from "node:path";
import { Injectable } from "@nestjs/common";
import { MalformedSpreadsheetError } from "../errors.js";
import { isoDate, valueText } from "../extraction/cell-value.js";
import type {
	AuxiliarySheet,
	FieldValue,
	NormalizedRecord,
} from "../extraction/record.types.js";
import type { OutputDocument, XmlElement } from "./document.types.js";
import {
	isUsableElementName,
	sanitizeName,
	termChildName,
	termRootName,
} from "./element-names.js";

export const PRIMARY_ROOT = "collection";
export const PARAGRAPH = "p";

function element(name: string, text?: string): XmlElement {
	return text === undefined ? { name, children: [] } : { name, text, children: [] };
}

function paragraphs(text: string): XmlElement[] {
	return text
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line !== "")
		.map((line) => element(PARAGRAPH, line));
}

function assertName(name: string, source: string, file: string): void {
	if (!isUsableElementName(name)) {
		throw new MalformedSpreadsheetError(
			`"${source}" does not yield a usable element name`,
			file,
		);
	}
}

function assertUnique(
	seen: Set<string>,
	name: string,
	source: string,
	file: string,
): void {
	if (seen.has(name)) {
		throw new MalformedSpreadsheetError(
			`"${source}" collides with another element named ${name}`,
			file,
		);
	}
	seen.add(name);
}

function primaryValue(
	name: string,
	value: Exclude<FieldValue, null>,
): XmlElement {
	if (value instanceof Date) {
		return element(name, isoDate(value));
	}
	if (/\r?\n/.test(value)) {
		return { name, children: paragraphs(value) };
	}
	return element(name, value);
}

/**
 * Turns a validated record into its primary document and one term document
 * per secondary sheet.
 */
@Injectable()
export class DocumentBuilder {
	buildPrimary(record: NormalizedRecord): XmlElement {
		const seen = new Set<string>();
		const children: XmlElement[] = [];

		for (const field of record.fields) {
			if (field.value === null) {
				continue;
			}
			const source = field.key ?? field.label;
			const name = sanitizeName(source);
			assertName(name, source, record.source);
			assertUnique(seen, name, source, record.source);
			children.push(primaryValue(name, field.value));
		}

		return { name: PRIMARY_ROOT, children };
	}

	buildAuxiliary(sheet: AuxiliarySheet, file: string): XmlElement {
		const root = termRootName(sheet.title);
		assertName(root, sheet.title || sheet.sheetName, file);

		const groups: XmlElement[] = [];
		for (const row of sheet.rows) {
			if (row.every((cell) => cell === null)) {
				continue;
			}

			const seen = new Set<string>();
			const terms: XmlElement[] = [];
			row.forEach((cell, column) => {
				const text = valueText(cell);
				if (text === null) {
					return;
				}
				const label = sheet.labels[column] ?? null;
				if (label === null) {
					throw new MalformedSpreadsheetError(
						`Sheet "${sheet.sheetName}" has a value in unlabelled column ${column + 1}`,
						file,
					);
				}
				const name = termChildName(label);
				assertName(name, label, file);
				assertUnique(seen, name, label, file);
				terms.push(element(name, text));
			});
			groups.push({ name: PARAGRAPH, children: terms });
		}

		return { name: root, children: groups };
	}

	/**
	 * Every document for `record`, named after the staged file:
	 * `<base>.xml`, then `<base>_<root>.xml` per term sheet.
	 */
	buildAll(record: NormalizedRecord): OutputDocument[] {
		const base = basename(record.source, extname(record.source));
		const documents: OutputDocument[] = [
			{ fileName: `${base}.xml`, root: this.buildPrimary(record) },
		];

		const names = new Set<string>();
		for (const sheet of record.auxiliary) {
			const root = this.buildAuxiliary(sheet, record.source);
			assertUnique(names, root.name, sheet.title, record.source);
			documents.push({ fileName: `${base}_${root.name}.xml`, root });
		}

		return documents;
	}
}
