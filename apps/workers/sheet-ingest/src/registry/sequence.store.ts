import type { LoggerService } from "@sheet-intake/job-base";
import type { SequenceRepository } from "./registry.types.js";

export const SEQUENCE_STORE = "SEQUENCE_STORE";

export class SequenceStore {
	constructor(
		private readonly repository: SequenceRepository,
		private readonly logger: LoggerService,
	) {}

	/**
	 * Next sequence number for `sender`, persisted before it is returned.
	 * Starts at 1.
	 */
	async next(sender: string): Promise<number> {
		const previous = this.repository.getSequence(sender) ?? 0;
		const value = previous + 1;
		await this.repository.setSequence(sender, value);
		this.logger.debug("Sequence advanced", { sender, sequence: value });
		return value;
	}
}
