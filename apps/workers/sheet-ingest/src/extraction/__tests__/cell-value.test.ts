import type { CellValue } from "exceljs";
import { describe, expect, it } from "vitest";
import { isoDate, normalizeCellValue, valueText } from "../cell-value.js";

describe("normalizeCellValue", () => {
	it("should treat blank cells as absent", () => {
		expect(normalizeCellValue(null)).toBeNull();
		expect(normalizeCellValue(undefined)).toBeNull();
		expect(normalizeCellValue("   ")).toBeNull();
	});

	it("should trim strings", () => {
		expect(normalizeCellValue("  Harbour ledgers ")).toBe("Harbour ledgers");
	});

	it("should render numbers and booleans as text", () => {
		expect(normalizeCellValue(12)).toBe("12");
		expect(normalizeCellValue(1.5)).toBe("1.5");
		expect(normalizeCellValue(true)).toBe("true");
	});

	it("should keep dates", () => {
		const date = new Date(Date.UTC(1954, 2, 9));
		expect(normalizeCellValue(date)).toBe(date);
	});

	it("should flatten rich text and hyperlinks", () => {
		expect(
			normalizeCellValue({
				richText: [{ text: "Harbour " }, { text: "ledgers" }],
			}),
		).toBe("Harbour ledgers");
		expect(
			normalizeCellValue({
				text: "catalogue",
				hyperlink: "https://example.org/catalogue",
			}),
		).toBe("catalogue");
	});

	it("should flatten a hyperlink whose text is rich text", () => {
		const cell = {
			text: { richText: [{ text: "Port " }, { text: "records" }] },
			hyperlink: "https://example.org/port",
		} as unknown as CellValue;

		expect(normalizeCellValue(cell)).toBe("Port records");
	});

	it("should use the cached result of formulas", () => {
		expect(
			normalizeCellValue({ formula: "A1+1", result: 3, date1904: false }),
		).toBe("3");
		expect(normalizeCellValue({ formula: "A1", date1904: false })).toBeNull();
	});

	it("should treat error cells as absent", () => {
		expect(normalizeCellValue({ error: "#N/A" })).toBeNull();
	});
});

describe("valueText", () => {
	it("should render dates as calendar dates", () => {
		expect(valueText(new Date(Date.UTC(1954, 2, 9, 15, 30)))).toBe("1954-03-09");
		expect(isoDate(new Date(Date.UTC(2001, 11, 31)))).toBe("2001-12-31");
		expect(valueText(null)).toBeNull();
		expect(valueText("Title*")).toBe("Title*");
	});
});
