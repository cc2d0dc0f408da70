// ---------------------------------------------------------------------------
// Job Feed Sync — Public API
// ---------------------------------------------------------------------------

export { AtsSessionManager } from "@/lib/ats/auth";
export { AtsApiError, AtsClient } from "@/lib/ats/client";
export { RemoteSourceClient } from "@/lib/ats/collection-fetcher";
export { createRemoteSourceClient } from "@/lib/ats/factory";
export { mapJobRecord } from "@/lib/ats/mapper";
export type { CollectionFetchResult, JobRecord } from "@/lib/ats/types";
export { type AppConfig, loadConfig, resetConfig } from "@/lib/config";
export { FeedStore } from "@/lib/feed/feed-store";
export type { FeedEntry, FeedValidator } from "@/lib/feed/types";
export { parseFeed, serializeFeed } from "@/lib/feed/xml";
export { flushRollbar } from "@/lib/monitoring/rollbar";
export { EmailNotifier, createEmailNotifier } from "@/lib/notifications/email";
export { IdentifierRegistry } from "@/lib/registry/identifier-registry";
export {
	type ClassificationResult,
	type Classifier,
	NullClassifier,
	type Notifier,
	type SyncEvent,
	type Transport,
} from "@/lib/sync/collaborators";
export * from "@/lib/sync/errors";
export { createSyncOrchestrator } from "@/lib/sync/factory";
export { type ReissuePolicy, SyncOrchestrator, type SyncRunOptions } from "@/lib/sync/orchestrator";
export { AsyncMutex } from "@/lib/sync/mutex";
export { diffRecords, reconcile, withArtifactOrphans } from "@/lib/sync/reconcile";
export { readSnapshot, writeSnapshot } from "@/lib/sync/snapshot";
export type { ReconciliationResult, SyncCycleReport } from "@/lib/sync/types";
