import { join } from "node:path";
import type { LoggerService } from "@sheet-intake/job-base";
import { Builder } from "xml2js";
import type { StorageService } from "../storage/storage.service.js";
import type { OutputDocument, XmlElement } from "./document.types.js";

export const DOCUMENT_WRITER = "DOCUMENT_WRITER";

type XmlNode = string | { [name: string]: XmlNode[] };

/**
 * Children are grouped by name for the serializer; the builder guarantees
 * repeated names are never interleaved with other names.
 */
function toNode(element: XmlElement): XmlNode {
	if (element.children.length === 0) {
		return element.text ?? "";
	}
	const node: { [name: string]: XmlNode[] } = {};
	for (const child of element.children) {
		const siblings = node[child.name] ?? [];
		siblings.push(toNode(child));
		node[child.name] = siblings;
	}
	return node;
}

export class DocumentWriter {
	private readonly builder = new Builder({
		cdata: true,
		xmldec: { version: "1.0", encoding: "UTF-8" },
		renderOpts: { pretty: true, indent: "  ", newline: "\n" },
	});

	constructor(
		private readonly storage: StorageService,
		private readonly logger: LoggerService,
	) {}

	serialize(root: XmlElement): string {
		return `${this.builder.buildObject({ [root.name]: toNode(root) })}\n`;
	}

	/**
	 * Write every document into `dir`. All documents are serialized before
	 * the first write; if any write fails the ones already written are removed.
	 */
	async writeAll(documents: OutputDocument[], dir: string): Promise<string[]> {
		const pending = documents.map((document) => ({
			path: join(dir, document.fileName),
			content: this.serialize(document.root),
		}));

		const written: string[] = [];
		try {
			for (const { path, content } of pending) {
				await this.storage.writeAtomic(path, content);
				written.push(path);
			}
		} catch (error) {
			for (const path of written) {
				await this.storage.remove(path);
			}
			this.logger.warn("Removed partial output", {
				files: written,
				error,
			});
			throw error;
		}

		return written;
	}
}
