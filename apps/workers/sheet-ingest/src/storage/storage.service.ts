import { copyFile, mkdir, open, readdir, rename, rm, unlink } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { LoggerService } from "@sheet-intake/job-base";
import { Injectable } from "@nestjs/common";
import { v4 as uuidv4 } from "uuid";

export const STORAGE_SERVICE = "STORAGE_SERVICE";

export interface MoveResult {
	moved: boolean;
	destination: string;
}

function hasErrorCode(error: unknown, code: string): boolean {
	return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Local-disk operations used by intake and routing: atomic writes, moves
 * between areas, ordered listings.
 */
@Injectable()
export class StorageService {
	constructor(private readonly logger: LoggerService) {}

	async ensureDirectories(paths: string[]): Promise<void> {
		for (const path of paths) {
			await mkdir(path, { recursive: true });
		}
	}

	/**
	 * Regular files directly inside `dir`, sorted by name
	 */
	async listFiles(dir: string): Promise<string[]> {
		const entries = await readdir(dir, { withFileTypes: true });
		return entries
			.filter((entry) => entry.isFile())
			.map((entry) => entry.name)
			.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
			.map((name) => join(dir, name));
	}

	/**
	 * Write through a temp file in the same directory, flushed before the
	 * rename, so readers never see a partial file.
	 */
	async writeAtomic(path: string, data: string | Uint8Array): Promise<void> {
		const temp = join(
			dirname(path),
			`.${basename(path)}.${uuidv4()}.tmp`,
		);
		const handle = await open(temp, "w");
		try {
			await handle.writeFile(data);
			await handle.sync();
		} finally {
			await handle.close();
		}

		try {
			await rename(temp, path);
		} catch (error) {
			await rm(temp, { force: true });
			throw error;
		}
	}

	/**
	 * Plain write for staged attachments
	 */
	async write(path: string, data: Uint8Array): Promise<void> {
		const handle = await open(path, "wx");
		try {
			await handle.writeFile(data);
		} finally {
			await handle.close();
		}
	}

	/**
	 * Move `source` into `targetDir`, keeping its name. A missing source is a
	 * no-op so that routing a file twice does nothing the second time.
	 */
	async moveInto(source: string, targetDir: string): Promise<MoveResult> {
		const destination = join(targetDir, basename(source));

		try {
			await rename(source, destination);
		} catch (error) {
			if (hasErrorCode(error, "ENOENT")) {
				this.logger.warn("File already left staging", {
					file: source,
					destination,
				});
				return { moved: false, destination };
			}
			if (!hasErrorCode(error, "EXDEV")) {
				throw error;
			}
			// Different filesystems: copy, then drop the original
			await copyFile(source, destination);
			await unlink(source);
		}

		this.logger.debug("Moved file", { file: source, destination });
		return { moved: true, destination };
	}

	async remove(path: string): Promise<void> {
		await rm(path, { force: true });
	}
}
