export interface IncomingAttachment {
	/** Normalized sender address */
	sender: string;
	content: Uint8Array;
	filename?: string;
}

/** Staged path -> owning sender */
export type Ownership = Map<string, string>;

export interface IntakeResult {
	ownership: Ownership;
	count: number;
}
