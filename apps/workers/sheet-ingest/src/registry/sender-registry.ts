import { readFile } from "node:fs/promises";
import { ConfigurationError, type LoggerService } from "@sheet-intake/job-base";
import { RegistryError } from "../errors.js";
import type { StorageService } from "../storage/storage.service.js";
import {
	type RegistryFile,
	type SenderEntry,
	type SenderProfile,
	type SequenceRepository,
	registryFileSchema,
} from "./registry.types.js";

export const SENDER_REGISTRY = "SENDER_REGISTRY";

export function normalizeAddress(address: string): string {
	return address.trim().toLowerCase();
}

/**
 * Registered correspondents keyed by address. The file is read once at
 * startup and rewritten whole whenever a counter moves.
 */
export class SenderRegistry implements SequenceRepository {
	private constructor(
		private readonly path: string,
		private readonly entries: Map<string, SenderEntry>,
		private readonly storage: StorageService,
		private readonly logger: LoggerService,
	) {}

	static async load(
		path: string,
		storage: StorageService,
		logger: LoggerService,
	): Promise<SenderRegistry> {
		let raw: string;
		try {
			raw = await readFile(path, "utf8");
		} catch (error) {
			logger.error("Sender registry unreadable", { file: path, error });
			throw new ConfigurationError(`Cannot read sender registry at ${path}`, [
				"SENDER_REGISTRY_PATH",
			]);
		}

		let data: unknown;
		try {
			data = JSON.parse(raw);
		} catch (error) {
			throw new ConfigurationError(
				`Sender registry at ${path} is not valid JSON: ${
					error instanceof Error ? error.message : String(error)
				}`,
				["SENDER_REGISTRY_PATH"],
			);
		}

		const result = registryFileSchema.safeParse(data);
		if (!result.success) {
			const issues = result.error.errors
				.map((e) => `${e.path.join(".")}: ${e.message}`)
				.join("; ");
			throw new ConfigurationError(
				`Sender registry at ${path} is invalid: ${issues}`,
				["SENDER_REGISTRY_PATH"],
			);
		}

		const entries = new Map<string, SenderEntry>();
		for (const [address, entry] of Object.entries(result.data.senders)) {
			entries.set(normalizeAddress(address), entry);
		}

		logger.log("Sender registry loaded", { file: path, senders: entries.size });
		return new SenderRegistry(path, entries, storage, logger);
	}

	get size(): number {
		return this.entries.size;
	}

	has(address: string): boolean {
		return this.entries.has(normalizeAddress(address));
	}

	lookup(address: string): SenderProfile | undefined {
		const key = normalizeAddress(address);
		const entry = this.entries.get(key);
		return entry ? { address: key, ...entry } : undefined;
	}

	getSequence(sender: string): number | undefined {
		return this.entries.get(normalizeAddress(sender))?.sequence;
	}

	/**
	 * Persist first; memory only follows a successful write.
	 */
	async setSequence(sender: string, value: number): Promise<void> {
		const key = normalizeAddress(sender);
		const entry = this.entries.get(key);
		if (!entry) {
			throw new RegistryError(
				`Cannot set a sequence for unregistered sender ${sender}`,
				"unknown_sender",
			);
		}

		const updated: SenderEntry = { ...entry, sequence: value };
		const snapshot = this.serialize(key, updated);

		try {
			await this.storage.writeAtomic(
				this.path,
				`${JSON.stringify(snapshot, null, 2)}\n`,
			);
		} catch (error) {
			throw new RegistryError(
				`Failed to persist sequence for ${key}`,
				"registry_write_failed",
				{ cause: error },
			);
		}

		this.entries.set(key, updated);
		this.logger.debug("Sequence persisted", { sender: key, sequence: value });
	}

	private serialize(key: string, replacement: SenderEntry): RegistryFile {
		const senders: Record<string, SenderEntry> = {};
		for (const [address, entry] of this.entries) {
			senders[address] = address === key ? replacement : entry;
		}
		return { senders };
	}
}
