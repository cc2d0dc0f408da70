// ---------------------------------------------------------------------------
// Sync Error Taxonomy
// ---------------------------------------------------------------------------

export type FeedSyncErrorCode =
	| "AUTH_FAILED"
	| "TRANSIENT_FETCH"
	| "PAGINATION_INCONSISTENT"
	| "VALIDATION_FAILED"
	| "MAPPING_FAILED"
	| "LOCK_TIMEOUT"
	| "SYNC_IN_PROGRESS"
	| "REGISTRY_LOAD_FAILED";

export abstract class FeedSyncError extends Error {
	abstract readonly code: FeedSyncErrorCode;
}

/** Any step of the ATS token exchange failed, or a data request came back 401/403. Fatal for the cycle. */
export class AuthError extends FeedSyncError {
	readonly code = "AUTH_FAILED";

	constructor(
		public readonly step: string,
		message: string,
	) {
		super(`ATS authentication failed at ${step}: ${message}`);
		this.name = "AuthError";
	}
}

/** A page request timed out, hit a 5xx after retries, or returned a payload we could not read. */
export class TransientFetchError extends FeedSyncError {
	readonly code = "TRANSIENT_FETCH";

	constructor(
		public readonly collectionId: string,
		public readonly surface: "association" | "search",
		public readonly start: number,
		message: string,
	) {
		super(`${surface} page at start=${start} for collection ${collectionId} failed: ${message}`);
		this.name = "TransientFetchError";
	}
}

export class PaginationInconsistencyError extends FeedSyncError {
	readonly code = "PAGINATION_INCONSISTENT";

	constructor(
		public readonly collectionId: string,
		public readonly collected: number,
		public readonly reportedTotal: number,
	) {
		super(
			`Collection ${collectionId}: association pagination collected ${collected} ids but reports ${reportedTotal}; orphan removal disabled`,
		);
		this.name = "PaginationInconsistencyError";
	}
}

export class ValidationError extends FeedSyncError {
	readonly code = "VALIDATION_FAILED";

	constructor(public readonly issues: string[]) {
		super(`Feed validation failed: ${issues.join("; ")}`);
		this.name = "ValidationError";
	}
}

export class MappingError extends FeedSyncError {
	readonly code = "MAPPING_FAILED";

	constructor(
		public readonly externalId: string,
		message: string,
	) {
		super(`Record ${externalId} cannot be mapped: ${message}`);
		this.name = "MappingError";
	}
}

export class LockTimeoutError extends FeedSyncError {
	readonly code = "LOCK_TIMEOUT";

	constructor(timeoutMs: number) {
		super(`Could not acquire the feed lock within ${timeoutMs}ms`);
		this.name = "LockTimeoutError";
	}
}

export class SyncInProgressError extends FeedSyncError {
	readonly code = "SYNC_IN_PROGRESS";

	constructor() {
		super("A sync cycle is already running");
		this.name = "SyncInProgressError";
	}
}

export class RegistryLoadError extends FeedSyncError {
	readonly code = "REGISTRY_LOAD_FAILED";

	constructor(path: string, message: string) {
		super(`Reference code registry at ${path} is unreadable: ${message}`);
		this.name = "RegistryLoadError";
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
