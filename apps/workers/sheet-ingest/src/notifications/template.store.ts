import { readFile } from "node:fs/promises";
import { join } from "node:path";
import type { LoggerService } from "@sheet-intake/job-base";

export type ReportKind = "failure" | "success";

/**
 * Localized report bodies: `<dir>/<kind>_<language>.txt`.
 */
export class TemplateStore {
	private readonly cache = new Map<string, string | null>();

	constructor(
		private readonly dir: string,
		private readonly defaultLanguage: string,
		private readonly logger: LoggerService,
	) {}

	/**
	 * Template for `language`, else the default language, else `fallback`.
	 */
	async resolve(
		kind: ReportKind,
		language: string | undefined,
		fallback: string,
	): Promise<string> {
		const candidates = [language ?? this.defaultLanguage, this.defaultLanguage];
		for (const candidate of new Set(candidates)) {
			const template = await this.read(kind, candidate);
			if (template !== null) {
				return template;
			}
		}

		this.logger.warn("Report template missing, using subject as body", {
			kind,
			language,
			dir: this.dir,
		});
		return fallback;
	}

	private async read(kind: ReportKind, language: string): Promise<string | null> {
		const path = join(this.dir, `${kind}_${language}.txt`);
		const cached = this.cache.get(path);
		if (cached !== undefined) {
			return cached;
		}

		let template: string | null;
		try {
			template = (await readFile(path, "utf8")).trimEnd();
		} catch (error) {
			this.logger.debug("Report template unavailable", { file: path, error });
			template = null;
		}
		this.cache.set(path, template);
		return template;
	}
}
