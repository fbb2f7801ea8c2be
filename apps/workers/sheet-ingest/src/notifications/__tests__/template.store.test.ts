import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { LoggerService } from "@sheet-intake/job-base";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	type TempWorkspace,
	createMockLogger,
	createTempWorkspace,
} from "../../__tests__/helpers.js";
import { TemplateStore } from "../template.store.js";

describe("TemplateStore", () => {
	let workspace: TempWorkspace;
	let logger: LoggerService;
	let store: TemplateStore;

	beforeEach(async () => {
		workspace = await createTempWorkspace();
		logger = createMockLogger();
		store = new TemplateStore(workspace.templateDir, "en", logger);
		await mkdir(workspace.templateDir);
		await writeFile(
			join(workspace.templateDir, "failure_en.txt"),
			"Some required fields are empty:\n",
		);
		await writeFile(
			join(workspace.templateDir, "failure_fr.txt"),
			"Champs obligatoires manquants :\n",
		);
	});

	afterEach(async () => {
		await workspace.cleanup();
	});

	it("should use the sender's language", async () => {
		expect(await store.resolve("failure", "fr", "Missing fields")).toBe(
			"Champs obligatoires manquants :",
		);
	});

	it("should fall back to the default language", async () => {
		expect(await store.resolve("failure", "pt", "Missing fields")).toBe(
			"Some required fields are empty:",
		);
		expect(await store.resolve("failure", undefined, "Missing fields")).toBe(
			"Some required fields are empty:",
		);
	});

	it("should fall back to the given text when no template exists", async () => {
		expect(
			await store.resolve("success", "fr", "Thank you for your email"),
		).toBe("Thank you for your email");
		expect(logger.warn).toHaveBeenCalledWith(
			"Report template missing, using subject as body",
			{ kind: "success", language: "fr", dir: workspace.templateDir },
		);
	});
});
