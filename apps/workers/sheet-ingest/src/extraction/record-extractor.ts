import type { LoggerService } from "@sheet-intake/job-base";
import ExcelJS from "exceljs";
import type { Workbook, Worksheet } from "exceljs";
import { MalformedSpreadsheetError } from "../errors.js";
import { normalizeCellValue, valueText } from "./cell-value.js";
import {
	type AuxiliarySheet,
	type FieldValue,
	type NormalizedRecord,
	REQUIRED_MARKER,
	type RecordField,
} from "./record.types.js";

export const RECORD_EXTRACTOR = "RECORD_EXTRACTOR";

export const PRIMARY_SHEET_NAME = "collection";

// Primary sheet columns
const LABEL_COLUMN = 1;
const KEY_COLUMN = 2;
const VALUE_COLUMN = 3;
// Row 1 holds the sheet title
const FIRST_FIELD_ROW = 2;

const LEGEND_LABEL = "* required";

/**
 * Reads a staged workbook into a NormalizedRecord: the primary sheet becomes
 * the ordered field list, every other sheet an auxiliary term sheet.
 */
export class RecordExtractor {
	constructor(private readonly logger: LoggerService) {}

	async extract(path: string): Promise<NormalizedRecord> {
		const workbook = await this.readWorkbook(path);
		const primary = this.primarySheet(workbook, path);

		const fields = this.readFields(primary, path);
		const auxiliary = workbook.worksheets
			.filter((sheet) => sheet.id !== primary.id)
			.map((sheet) => this.readAuxiliary(sheet))
			.filter((sheet): sheet is AuxiliarySheet => sheet !== null);

		this.logger.debug("Workbook extracted", {
			file: path,
			fields: fields.length,
			auxiliary_sheets: auxiliary.length,
		});

		return { source: path, fields, auxiliary };
	}

	private async readWorkbook(path: string): Promise<Workbook> {
		const workbook = new ExcelJS.Workbook();
		try {
			await workbook.xlsx.readFile(path);
		} catch (error) {
			throw new MalformedSpreadsheetError(
				`Cannot read workbook: ${
					error instanceof Error ? error.message : String(error)
				}`,
				path,
				{ cause: error },
			);
		}
		return workbook;
	}

	private primarySheet(workbook: Workbook, path: string): Worksheet {
		const sheet =
			workbook.getWorksheet(PRIMARY_SHEET_NAME) ?? workbook.worksheets[0];
		if (!sheet) {
			throw new MalformedSpreadsheetError("Workbook has no worksheets", path);
		}
		return sheet;
	}

	private readFields(sheet: Worksheet, path: string): RecordField[] {
		const fields: RecordField[] = [];
		const seen = new Set<string>();

		for (let rowNumber = FIRST_FIELD_ROW; rowNumber <= sheet.rowCount; rowNumber++) {
			const row = sheet.getRow(rowNumber);
			const label = valueText(normalizeCellValue(row.getCell(LABEL_COLUMN).value));
			const key = valueText(normalizeCellValue(row.getCell(KEY_COLUMN).value));
			const value = normalizeCellValue(row.getCell(VALUE_COLUMN).value);

			if (label === null) {
				if (value !== null) {
					throw new MalformedSpreadsheetError(
						`Row ${rowNumber} has a value but no label`,
						path,
					);
				}
				continue;
			}

			if (label.toLowerCase() === LEGEND_LABEL) {
				continue;
			}

			if (seen.has(label)) {
				throw new MalformedSpreadsheetError(
					`Duplicate label "${label}" in row ${rowNumber}`,
					path,
				);
			}
			seen.add(label);

			const field: RecordField = {
				label,
				required: label.includes(REQUIRED_MARKER),
				value,
			};
			if (key !== null) {
				field.key = key;
			}
			fields.push(field);
		}

		if (fields.length === 0) {
			throw new MalformedSpreadsheetError(
				`Sheet "${sheet.name}" has no field labels`,
				path,
			);
		}

		return fields;
	}

	/**
	 * Row 1: title, row 2: column labels, rows 3..: terms. Blank sheets are
	 * ignored.
	 */
	private readAuxiliary(sheet: Worksheet): AuxiliarySheet | null {
		if (sheet.actualRowCount === 0) {
			return null;
		}

		const columnCount = sheet.columnCount;
		const readRow = (rowNumber: number): FieldValue[] => {
			const row = sheet.getRow(rowNumber);
			const values: FieldValue[] = [];
			for (let column = 1; column <= columnCount; column++) {
				values.push(normalizeCellValue(row.getCell(column).value));
			}
			return values;
		};

		const title = valueText(normalizeCellValue(sheet.getCell(1, 1).value)) ?? "";
		const labels = readRow(2).map(valueText);
		const rows: FieldValue[][] = [];
		for (let rowNumber = 3; rowNumber <= sheet.rowCount; rowNumber++) {
			rows.push(readRow(rowNumber));
		}

		return { sheetName: sheet.name, title, labels, rows };
	}
}
