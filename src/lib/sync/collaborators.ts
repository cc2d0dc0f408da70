// ---------------------------------------------------------------------------
// Sync Collaborators
// Interfaces the orchestrator calls out to. Implementations live elsewhere
// (e-mail notifier) or are supplied by the host process.
// ---------------------------------------------------------------------------

import type { SyncCycleReport } from "./types";

export interface ClassificationResult {
	success: boolean;
	jobFunction: string;
	/** Comma-separated industry labels */
	industries: string;
	seniorityLevel: string;
	error?: string;
}

/** Labels a job for the feed's enrichment fields. A failed result is never fatal. */
export interface Classifier {
	classify(title: string, description: string): Promise<ClassificationResult>;
}

/** Used when no classifier is configured: every entry gets blank labels. */
export class NullClassifier implements Classifier {
	async classify(): Promise<ClassificationResult> {
		return {
			success: false,
			jobFunction: "",
			industries: "",
			seniorityLevel: "",
			error: "no classifier configured",
		};
	}
}

export type SyncEvent = { kind: "summary"; report: SyncCycleReport } | { kind: "failure"; report: SyncCycleReport };

export interface Notifier {
	notify(event: SyncEvent): Promise<void>;
}

/** Delivers the finished feed to wherever it is served from. */
export interface Transport {
	/** @returns false when the upload was rejected */
	publish(bytes: Buffer): Promise<boolean>;
}
