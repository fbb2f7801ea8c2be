import { describe, expect, it } from "vitest";
import type {
	AuxiliarySheet,
	NormalizedRecord,
	RecordField,
} from "../../extraction/record.types.js";
import { MalformedSpreadsheetError } from "../../errors.js";
import { DocumentBuilder } from "../document-builder.js";

const record = (fields: RecordField[], auxiliary: AuxiliarySheet[] = []) =>
	({
		source: "/data/sandbox/AX_1.xlsx",
		fields,
		auxiliary,
	}) satisfies NormalizedRecord;

describe("DocumentBuilder", () => {
	const builder = new DocumentBuilder();

	describe("buildPrimary", () => {
		it("should create one element per present field", () => {
			const root = builder.buildPrimary(
				record([
					{ label: "Title*", key: "title", required: true, value: "Ledgers" },
					{ label: "Notes", key: "notes", required: false, value: null },
					{ label: "Extent", required: false, value: "12" },
				]),
			);

			expect(root).toEqual({
				name: "collection",
				children: [
					{ name: "title", text: "Ledgers", children: [] },
					{ name: "Extent", text: "12", children: [] },
				],
			});
		});

		it("should split multi-line text into paragraphs", () => {
			const root = builder.buildPrimary(
				record([
					{
						label: "Scope",
						key: "scope",
						required: false,
						value: "  First line \n\n<b>Second</b>\r\nThird",
					},
				]),
			);

			expect(root.children[0]).toEqual({
				name: "scope",
				children: [
					{ name: "p", text: "First line", children: [] },
					{ name: "p", text: "<b>Second</b>", children: [] },
					{ name: "p", text: "Third", children: [] },
				],
			});
		});

		it("should render dates as calendar dates", () => {
			const root = builder.buildPrimary(
				record([
					{
						label: "Date*",
						key: "date",
						required: true,
						value: new Date(Date.UTC(1954, 2, 9, 23, 0)),
					},
				]),
			);

			expect(root.children[0]?.text).toBe("1954-03-09");
		});

		it("should reject a field without a usable name", () => {
			expect(() =>
				builder.buildPrimary(
					record([{ label: "***", required: false, value: "x" }]),
				),
			).toThrow(MalformedSpreadsheetError);
		});

		it("should reject two fields with the same element name", () => {
			expect(() =>
				builder.buildPrimary(
					record([
						{ label: "Title*", required: true, value: "a" },
						{ label: "Title", required: false, value: "b" },
					]),
				),
			).toThrow('"Title" collides with another element named Title');
		});
	});

	describe("buildAuxiliary", () => {
		const sheet: AuxiliarySheet = {
			sheetName: "places",
			title: "Place names: controlled",
			labels: ["Place name: preferred", "Country >", null],
			rows: [
				["Mombasa", "Kenya", null],
				[null, null, null],
				["Zanzibar", null, null],
			],
		};

		it("should create one group per non-empty row", () => {
			expect(builder.buildAuxiliary(sheet, "AX_1.xlsx")).toEqual({
				name: "place_names",
				children: [
					{
						name: "p",
						children: [
							{ name: "place_name", text: "Mombasa", children: [] },
							{ name: "country", text: "Kenya", children: [] },
						],
					},
					{
						name: "p",
						children: [{ name: "place_name", text: "Zanzibar", children: [] }],
					},
				],
			});
		});

		it("should reject a value under an unlabelled column", () => {
			expect(() =>
				builder.buildAuxiliary(
					{ ...sheet, rows: [["Mombasa", "Kenya", "stray"]] },
					"AX_1.xlsx",
				),
			).toThrow('Sheet "places" has a value in unlabelled column 3');
		});

		it("should reject a title without a usable root name", () => {
			expect(() =>
				builder.buildAuxiliary({ ...sheet, title: "" }, "AX_1.xlsx"),
			).toThrow(MalformedSpreadsheetError);
		});
	});

	describe("buildAll", () => {
		it("should name documents after the staged file", () => {
			const documents = builder.buildAll(
				record(
					[{ label: "Title*", key: "title", required: true, value: "Ledgers" }],
					[
						{
							sheetName: "places",
							title: "Places",
							labels: ["Place"],
							rows: [["Mombasa"]],
						},
						{
							sheetName: "subjects",
							title: "Subjects: topical",
							labels: ["Subject"],
							rows: [["Trade"]],
						},
					],
				),
			);

			expect(documents.map((document) => document.fileName)).toEqual([
				"AX_1.xml",
				"AX_1_places.xml",
				"AX_1_subjects.xml",
			]);
		});

		it("should reject two term sheets with the same root", () => {
			const places: AuxiliarySheet = {
				sheetName: "places",
				title: "Places",
				labels: ["Place"],
				rows: [],
			};

			expect(() =>
				builder.buildAll(
					record(
						[{ label: "Title*", required: true, value: "Ledgers" }],
						[places, { ...places, sheetName: "places (2)" }],
					),
				),
			).toThrow(MalformedSpreadsheetError);
		});
	});
});
