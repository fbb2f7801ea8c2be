import { describe, expect, it } from "vitest";
import {
	isUsableElementName,
	sanitizeName,
	termChildName,
	termRootName,
} from "../element-names.js";

describe("element names", () => {
	it("should strip non-word characters from labels", () => {
		expect(sanitizeName("Title*")).toBe("Title");
		expect(sanitizeName("reference_code")).toBe("reference_code");
		expect(sanitizeName("Date (from)")).toBe("Datefrom");
		expect(sanitizeName("Résumé")).toBe("Résumé");
	});

	it("should derive term roots from the sheet title", () => {
		expect(termRootName("Place names: controlled vocabulary")).toBe(
			"place_names",
		);
		expect(termRootName("  Subjects ")).toBe("subjects");
	});

	it("should derive term children from column labels", () => {
		expect(termChildName("Country >")).toBe("country");
		expect(termChildName("Place name: preferred form")).toBe("place_name");
		expect(termChildName("Broader > term")).toBe("broader__term");
	});

	it("should reject names the serializer cannot write", () => {
		expect(isUsableElementName("title")).toBe(true);
		expect(isUsableElementName("_note")).toBe(true);
		expect(isUsableElementName("")).toBe(false);
		expect(isUsableElementName("12th")).toBe(false);
		expect(isUsableElementName("_")).toBe(false);
	});
});
