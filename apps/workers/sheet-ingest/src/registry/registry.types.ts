import { z } from "zod";

export const senderProfileSchema = z.object({
	code: z
		.string()
		.regex(/^[A-Za-z0-9_-]+$/, "code may only contain letters, digits, _ and -"),
	language: z
		.string()
		.regex(/^[a-z]{2,3}$/)
		.optional(),
	sequence: z.number().int().nonnegative().optional(),
});

export const registryFileSchema = z.object({
	senders: z.record(z.string().email(), senderProfileSchema),
});

export type SenderEntry = z.infer<typeof senderProfileSchema>;
export type RegistryFile = z.infer<typeof registryFileSchema>;

export interface SenderProfile extends SenderEntry {
	address: string;
}

/**
 * Narrow read/update view of per-sender counters
 */
export interface SequenceRepository {
	getSequence(sender: string): number | undefined;
	setSequence(sender: string, value: number): Promise<void>;
}
