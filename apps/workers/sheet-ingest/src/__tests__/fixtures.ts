import { writeFile } from "node:fs/promises";
import ExcelJS from "exceljs";
import type { CellValue } from "exceljs";

export type FieldRow = [label: CellValue, key: CellValue, value: CellValue];

export interface TermSheetFixture {
	name: string;
	title: string;
	labels: string[];
	rows: CellValue[][];
}

export interface WorkbookFixture {
	primaryName?: string;
	title?: string;
	fields: FieldRow[];
	terms?: TermSheetFixture[];
}

export const COMPLETE_FIELDS: FieldRow[] = [
	["Title*", "title", "Harbour ledgers"],
	["Reference code*", "reference_code", "AX-001"],
	["Scope and content", "scope", "Line one\nLine two"],
	["Extent", null, 12],
	["Notes", "notes", null],
	["* Required", null, null],
];

export async function buildWorkbook(fixture: WorkbookFixture): Promise<Buffer> {
	const workbook = new ExcelJS.Workbook();
	const primary = workbook.addWorksheet(fixture.primaryName ?? "collection");
	primary.addRow([fixture.title ?? "COLLECTION DATA"]);
	for (const row of fixture.fields) {
		primary.addRow(row);
	}

	for (const terms of fixture.terms ?? []) {
		const sheet = workbook.addWorksheet(terms.name);
		sheet.addRow([terms.title]);
		sheet.addRow(terms.labels);
		for (const row of terms.rows) {
			sheet.addRow(row);
		}
	}

	const data = await workbook.xlsx.writeBuffer();
	return Buffer.from(data);
}

export async function writeWorkbook(
	path: string,
	fixture: WorkbookFixture,
): Promise<void> {
	await writeFile(path, await buildWorkbook(fixture));
}
