// ---------------------------------------------------------------------------
// ATS — Record Types
// ---------------------------------------------------------------------------

import type {
	MappingError,
	PaginationInconsistencyError,
	TransientFetchError,
} from "@/lib/sync/errors";

export type EmploymentKind = "Contract" | "Contract to Hire" | "Direct Hire" | "Full-time" | "Part-time";

export type WorkArrangement = "Remote" | "Hybrid" | "Onsite" | "No Preference" | "Off-Site";

export interface JobLocation {
	city?: string;
	state?: string;
	country?: string;
}

/** A job order as held by the ATS, normalized. Read-only: never written back. */
export interface JobRecord {
	externalId: string;
	title: string;
	description: string;
	location: JobLocation;
	employmentKind: EmploymentKind;
	workArrangement: WorkArrangement;
	assignedOwnerName: string;
	/** ISO-8601 */
	lastModifiedAt: string;
	/** ISO-8601, null when the ATS did not report `dateAdded` */
	postedAt: string | null;
	isActive: boolean;
}

export type FetchIssue = TransientFetchError | PaginationInconsistencyError | MappingError;

/** Outcome of fetching one tearsheet, including the cross-check diagnostics. */
export interface CollectionFetchResult {
	collectionId: string;
	/** Active, deduplicated, exclusion-filtered records */
	records: JobRecord[];
	/** Total reported by the association surface; null when it could not be read */
	associationTotal: number | null;
	/** Number of raw items returned by the search surface (0 when it was not consulted) */
	searchCount: number;
	/** Search results dropped because the association surface no longer lists them */
	orphanedByAssociation: string[];
	/** Association members the search surface did not return */
	unresolvedIds: string[];
	excludedCount: number;
	inactiveCount: number;
	/** True when the fetched set cannot be trusted for removals */
	orphanRemovalDisabled: boolean;
	issues: FetchIssue[];
}
