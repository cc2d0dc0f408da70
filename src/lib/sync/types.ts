// ---------------------------------------------------------------------------
// Sync Engine — Types
// ---------------------------------------------------------------------------

import type { CollectionFetchResult } from "@/lib/ats/types";

export type MaterialField =
	| "title"
	| "description"
	| "city"
	| "state"
	| "country"
	| "employmentKind"
	| "workArrangement"
	| "assignedOwnerName";

export interface FieldChange {
	field: MaterialField;
	oldValue: string;
	newValue: string;
}

export interface ReconciliationSummary {
	previousCount: number;
	currentCount: number;
	addedCount: number;
	removedCount: number;
	modifiedCount: number;
}

export interface ReconciliationResult {
	added: string[];
	removed: string[];
	modified: Record<string, FieldChange[]>;
	summary: ReconciliationSummary;
}

export type SyncPhase = "fetching" | "reconciling" | "mutating" | "verifying" | "done" | "failed";

export interface SyncErrorEntry {
	/** Where it happened: a phase, `collection:<id>` or `record:<id>` */
	entity: string;
	code: string;
	message: string;
	timestamp: string;
}

/** Per-collection fetch diagnostics, without the records themselves. */
export type CollectionDiagnostics = Omit<CollectionFetchResult, "records" | "issues"> & {
	recordCount: number;
	issueCount: number;
};

export interface MutationCounts {
	inserted: number;
	updated: number;
	removed: number;
	reissued: number;
	duplicatesDropped: number;
	failed: number;
}

export interface PublishOutcome {
	attempted: boolean;
	success: boolean;
	message?: string;
}

/** Outcome of one sync cycle. Transient: only the notifier and the caller see it. */
export interface SyncCycleReport {
	cycleId: string;
	startTime: string;
	endTime: string | null;
	status: "running" | "done" | "failed";
	phases: SyncPhase[];
	collections: CollectionDiagnostics[];
	reconciliation: ReconciliationResult | null;
	mutations: MutationCounts;
	errors: SyncErrorEntry[];
	publish: PublishOutcome;
}
