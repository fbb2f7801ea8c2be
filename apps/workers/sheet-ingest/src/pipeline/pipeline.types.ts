import type { DirectoriesConfig } from "@sheet-intake/core-config";

export type PipelineDirectories = Pick<
	DirectoriesConfig,
	"staging" | "success" | "error" | "output"
>;

export type FileOutcome =
	| {
			kind: "success";
			file: string;
			sender: string;
			documents: string[];
	  }
	| {
			kind: "invalid";
			file: string;
			sender: string;
			missingFields: string[];
	  }
	| {
			kind: "failed";
			file: string;
			sender: string;
			errorCode: string;
	  }
	| {
			kind: "orphaned";
			file: string;
			reason: "unknown_owner" | "unsupported_extension";
	  };

export type OutcomeKind = FileOutcome["kind"];

export interface PipelineSummary {
	outcomes: FileOutcome[];
	counts: Record<OutcomeKind, number>;
}
