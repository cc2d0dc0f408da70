// ---------------------------------------------------------------------------
// Sync Orchestrator Factory
// Composition root: builds every component once from config.
// ---------------------------------------------------------------------------

import { createRemoteSourceClient } from "@/lib/ats/factory";
import { type AppConfig, loadConfig } from "@/lib/config";
import { FeedStore } from "@/lib/feed/feed-store";
import { createEmailNotifier } from "@/lib/notifications/email";
import { IdentifierRegistry } from "@/lib/registry/identifier-registry";
import type { Classifier, Notifier, Transport } from "./collaborators";
import { type ReissuePolicy, SyncOrchestrator } from "./orchestrator";

export interface SyncOrchestratorDeps {
	config?: AppConfig;
	classifier?: Classifier;
	/** Overrides the e-mail notifier built from SMTP settings */
	notifier?: Notifier;
	transport?: Transport;
	reissuePolicy?: ReissuePolicy;
	fetchFn?: typeof fetch;
}

/**
 * Create a fully wired SyncOrchestrator.
 * Collaborators the host does not supply fall back to config-driven defaults.
 */
export function createSyncOrchestrator(deps: SyncOrchestratorDeps = {}): SyncOrchestrator {
	const config = deps.config ?? loadConfig();

	return new SyncOrchestrator({
		source: createRemoteSourceClient(config, deps.fetchFn),
		registry: new IdentifierRegistry({ filePath: config.FEED_REGISTRY_PATH }),
		store: new FeedStore({
			filePath: config.FEED_OUTPUT_PATH,
			header: { publisher: config.FEED_PUBLISHER_NAME, publisherUrl: config.FEED_PUBLISHER_URL },
			lockTimeoutMs: config.FEED_LOCK_TIMEOUT_MS,
		}),
		collectionIds: config.FEED_COLLECTION_IDS,
		snapshotPath: config.FEED_SNAPSHOT_PATH,
		entryDefaults: {
			companyName: config.FEED_COMPANY_NAME,
			applyUrl: config.FEED_APPLY_URL,
			defaultCountry: config.FEED_DEFAULT_COUNTRY,
		},
		classifier: deps.classifier,
		notifier: deps.notifier ?? createEmailNotifier(config) ?? undefined,
		transport: deps.transport,
		reissuePolicy: deps.reissuePolicy,
	});
}
