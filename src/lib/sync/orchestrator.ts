// ---------------------------------------------------------------------------
// Sync Cycle Orchestrator
// fetching → reconciling → mutating → verifying → done (failed from anywhere)
// ---------------------------------------------------------------------------

import type { CollectionFetchResult, JobRecord } from "@/lib/ats/types";
import {
	BLANK_LABELS,
	buildFeedEntry,
	type EnrichmentLabels,
	type FeedEntryDefaults,
} from "@/lib/feed/entry-builder";
import type { FeedEntry } from "@/lib/feed/types";
import type { FeedStore } from "@/lib/feed/feed-store";
import { logSyncCritical, logSyncError, logSyncInfo, logSyncWarning } from "@/lib/monitoring/sync-logger";
import type { IdentifierRegistry } from "@/lib/registry/identifier-registry";
import { v4 as uuidv4 } from "uuid";
import { type Classifier, NullClassifier, type Notifier, type Transport } from "./collaborators";
import { FeedSyncError, SyncInProgressError, ValidationError, errorMessage } from "./errors";
import { reconcile, withArtifactOrphans } from "./reconcile";
import type { SnapshotEntry } from "./schemas";
import { readSnapshot, writeSnapshot } from "./snapshot";
import type { FieldChange, ReconciliationResult, SyncCycleReport, SyncPhase } from "./types";

/** What the orchestrator needs from the remote side. */
export interface CollectionSource {
	fetchCollection(collectionId: string): Promise<CollectionFetchResult>;
	isExcluded(externalId: string): boolean;
}

/** Decides whether a modified record gets a fresh reference code. */
export type ReissuePolicy = (externalId: string, changes: FieldChange[]) => boolean;

export const neverReissue: ReissuePolicy = () => false;

export interface SyncOrchestratorOptions {
	source: CollectionSource;
	registry: IdentifierRegistry;
	store: FeedStore;
	collectionIds: string[];
	snapshotPath: string;
	entryDefaults: FeedEntryDefaults;
	classifier?: Classifier;
	notifier?: Notifier;
	transport?: Transport;
	reissuePolicy?: ReissuePolicy;
	/** Replaceable for tests; the cycle's start time becomes every written entry's `lastupdated` */
	clock?: () => Date;
}

export interface SyncRunOptions {
	/** Ids that get a new reference code this cycle */
	reissue?: string[];
}

/** Records of the cycle keyed by id, with the tearsheets each belongs to. */
interface RecordSet {
	records: Map<string, JobRecord>;
	membership: Map<string, string[]>;
}

interface FetchedCollections {
	set: RecordSet;
	results: CollectionFetchResult[];
}

interface MutationOutcome {
	/** Record versions the feed now reflects, for the next cycle's diff */
	synced: Map<string, JobRecord>;
	/** Ids the feed must contain after mutating */
	expectedIds: Set<string>;
}

/**
 * Runs sync cycles against the feed.
 *
 * One cycle at a time: a concurrent `run()` fails fast with SyncInProgressError.
 * Recoverable problems are collected in the report; authentication failures
 * and anything unexpected end the cycle as `failed`.
 */
export class SyncOrchestrator {
	private readonly source: CollectionSource;
	private readonly registry: IdentifierRegistry;
	private readonly store: FeedStore;
	private readonly collectionIds: string[];
	private readonly snapshotPath: string;
	private readonly entryDefaults: FeedEntryDefaults;
	private readonly classifier: Classifier;
	private readonly notifier?: Notifier;
	private readonly transport?: Transport;
	private readonly reissuePolicy: ReissuePolicy;
	private readonly clock: () => Date;

	private running = false;

	constructor(options: SyncOrchestratorOptions) {
		this.source = options.source;
		this.registry = options.registry;
		this.store = options.store;
		this.collectionIds = options.collectionIds;
		this.snapshotPath = options.snapshotPath;
		this.entryDefaults = options.entryDefaults;
		this.classifier = options.classifier ?? new NullClassifier();
		this.notifier = options.notifier;
		this.transport = options.transport;
		this.reissuePolicy = options.reissuePolicy ?? neverReissue;
		this.clock = options.clock ?? (() => new Date());
	}

	get isRunning(): boolean {
		return this.running;
	}

	async run(options: SyncRunOptions = {}): Promise<SyncCycleReport> {
		if (this.running) {
			throw new SyncInProgressError();
		}
		this.running = true;
		try {
			return await this.execute(options);
		} finally {
			this.running = false;
		}
	}

	private async execute(options: SyncRunOptions): Promise<SyncCycleReport> {
		const startedAt = this.clock();
		const report: SyncCycleReport = {
			cycleId: uuidv4(),
			startTime: startedAt.toISOString(),
			endTime: null,
			status: "running",
			phases: [],
			collections: [],
			reconciliation: null,
			mutations: { inserted: 0, updated: 0, removed: 0, reissued: 0, duplicatesDropped: 0, failed: 0 },
			errors: [],
			publish: { attempted: false, success: false },
		};

		try {
			// 1. Fetch every configured tearsheet
			this.enter(report, "fetching");
			const fetched = await this.fetchAll(report);

			// 2. Diff against the last synced set
			this.enter(report, "reconciling");
			await this.registry.load();
			const previous = await this.loadPrevious(report);
			const current = this.applyRetention(fetched, previous, report);
			const artifact = await this.store.snapshot();

			const previousRecords = previous.map((entry) => entry.record);
			const diff = reconcile(previousRecords, [...current.records.values()]);
			const result = this.foldArtifactOrphans(report, diff, fetched, previousRecords, current, artifact);
			report.reconciliation = result;
			logSyncInfo(report.cycleId, "Reconciled", { ...result.summary });

			// 3. Apply the diff to the feed
			this.enter(report, "mutating");
			let outcome: MutationOutcome;
			try {
				outcome = await this.applyMutations(report, result, current, previous, startedAt, options);
			} catch (err) {
				// Codes handed out before the failure are already in the feed
				await this.persistRegistryAfterFailure(report);
				throw err;
			}
			await this.registry.persist();

			// 4. Check the feed against what was intended
			this.enter(report, "verifying");
			const violations = await this.verify(outcome.expectedIds);
			if (violations.length > 0) {
				throw new ValidationError(violations);
			}

			// 5. Persist the synced set and publish
			await writeSnapshot(this.snapshotPath, {
				syncedAt: startedAt.toISOString(),
				records: [...outcome.synced.values()].map((record) => ({
					record,
					collections: current.membership.get(record.externalId) ?? [],
				})),
			});
			this.enter(report, "done");
			report.status = "done";
			await this.publish(report);
		} catch (err) {
			this.recordError(report, "sync", err);
			logSyncError(report.cycleId, `Cycle failed: ${errorMessage(err)}`, { entity: "sync" });
			this.enter(report, "failed");
			report.status = "failed";
		}

		report.endTime = this.clock().toISOString();
		await this.notify(report);
		return report;
	}

	// -----------------------------------------------------------------------
	// Fetching
	// -----------------------------------------------------------------------

	private async fetchAll(report: SyncCycleReport): Promise<FetchedCollections> {
		const set: RecordSet = { records: new Map(), membership: new Map() };
		const results: CollectionFetchResult[] = [];

		for (const collectionId of this.collectionIds) {
			const result = await this.source.fetchCollection(collectionId);
			results.push(result);

			const { records, issues, ...diagnostics } = result;
			report.collections.push({ ...diagnostics, recordCount: records.length, issueCount: issues.length });
			for (const issue of issues) {
				this.recordError(report, `collection:${collectionId}`, issue);
				logSyncWarning(report.cycleId, issue.message, { entity: collectionId });
			}

			for (const record of records) {
				// First tearsheet to list a job wins
				if (!set.records.has(record.externalId)) {
					set.records.set(record.externalId, record);
				}
				const membership = set.membership.get(record.externalId) ?? [];
				if (!membership.includes(collectionId)) membership.push(collectionId);
				set.membership.set(record.externalId, membership);
			}

			logSyncInfo(report.cycleId, `Fetched ${records.length} active jobs`, {
				entity: collectionId,
				associationTotal: result.associationTotal,
				searchCount: result.searchCount,
				orphanRemovalDisabled: result.orphanRemovalDisabled,
			});
		}

		return { set, results };
	}

	// -----------------------------------------------------------------------
	// Reconciling
	// -----------------------------------------------------------------------

	private async loadPrevious(report: SyncCycleReport): Promise<SnapshotEntry[]> {
		try {
			const snapshot = await readSnapshot(this.snapshotPath);
			return snapshot?.records ?? [];
		} catch (err) {
			// Treated as a first run: existing feed entries are updated, not duplicated
			this.recordError(report, "snapshot", err);
			logSyncWarning(report.cycleId, `Previous snapshot unreadable: ${errorMessage(err)}`, { entity: "snapshot" });
			return [];
		}
	}

	/**
	 * Carry previous records forward where the fetched set cannot be trusted
	 * to say they are gone: collections with orphan removal disabled, and
	 * members the search surface did not return.
	 */
	private applyRetention(
		fetched: FetchedCollections,
		previous: SnapshotEntry[],
		report: SyncCycleReport,
	): RecordSet {
		const records = new Map(fetched.set.records);
		const membership = new Map(fetched.set.membership);
		const untrusted = new Set(fetched.results.filter((r) => r.orphanRemovalDisabled).map((r) => r.collectionId));
		const unresolved = new Set(fetched.results.flatMap((r) => r.unresolvedIds));

		const retained: string[] = [];
		for (const { record, collections } of previous) {
			const id = record.externalId;
			if (records.has(id) || this.source.isExcluded(id)) continue;
			if (unresolved.has(id) || collections.some((c) => untrusted.has(c))) {
				records.set(id, record);
				membership.set(id, collections);
				retained.push(id);
			}
		}

		if (retained.length > 0) {
			logSyncWarning(report.cycleId, `Retained ${retained.length} previous jobs pending a trustworthy fetch`, {
				entity: "retention",
				ids: retained,
			});
		}
		return { records, membership };
	}

	/**
	 * Entries in the feed that neither the snapshot nor this fetch knows are
	 * only removed when every tearsheet was fetched completely. Members the
	 * search surface did not resolve always count as known.
	 */
	private foldArtifactOrphans(
		report: SyncCycleReport,
		diff: ReconciliationResult,
		fetched: FetchedCollections,
		previousRecords: JobRecord[],
		current: RecordSet,
		artifact: FeedEntry[],
	): ReconciliationResult {
		const untrusted = fetched.results.filter((r) => r.orphanRemovalDisabled).map((r) => r.collectionId);
		if (untrusted.length > 0) {
			logSyncWarning(report.cycleId, "Skipped feed orphan cleanup while removals are disabled", {
				entity: "retention",
				collections: untrusted,
			});
			return diff;
		}

		const knownIds = new Set([
			...previousRecords.map((r) => r.externalId),
			...current.records.keys(),
			...fetched.results.flatMap((r) => r.unresolvedIds),
		]);
		return withArtifactOrphans(
			diff,
			artifact.map((entry) => entry.bhatsid),
			knownIds,
		);
	}

	// -----------------------------------------------------------------------
	// Mutating
	// -----------------------------------------------------------------------

	private async applyMutations(
		report: SyncCycleReport,
		result: ReconciliationResult,
		current: RecordSet,
		previous: SnapshotEntry[],
		startedAt: Date,
		options: SyncRunOptions,
	): Promise<MutationOutcome> {
		const stamp = startedAt.toISOString();
		const previousById = new Map(previous.map((entry) => [entry.record.externalId, entry]));
		const synced = new Map(current.records);
		const expectedIds = new Set(current.records.keys());

		report.mutations.duplicatesDropped = await this.store.deduplicate();
		const artifactCodes = new Map((await this.store.snapshot()).map((e) => [e.bhatsid, e.referencenumber]));
		// Entries the diff does not remove stay in the feed
		const removing = new Set(result.removed);
		for (const id of artifactCodes.keys()) {
			if (!removing.has(id)) expectedIds.add(id);
		}

		// Removals first
		for (const id of result.removed) {
			try {
				if (await this.store.remove(id)) report.mutations.removed++;
			} catch (err) {
				report.mutations.failed++;
				expectedIds.add(id);
				const before = previousById.get(id);
				if (before) {
					synced.set(id, before.record);
					current.membership.set(id, before.collections);
				}
				this.recordError(report, `record:${id}`, err);
				logSyncError(report.cycleId, `Remove failed: ${errorMessage(err)}`, { externalId: id });
			}
		}

		const reissue = new Set(options.reissue ?? []);
		for (const id of reissue) {
			if (!current.records.has(id)) {
				logSyncWarning(report.cycleId, "Reissue requested for a job that is not in the feed", { externalId: id });
			}
		}

		// Adds, modifications, and anything the feed is missing, oldest first so the newest ends on top
		const upsertIds = new Set([...result.added, ...Object.keys(result.modified)]);
		for (const id of current.records.keys()) {
			if (!artifactCodes.has(id) || reissue.has(id)) upsertIds.add(id);
		}
		const upserts = [...upsertIds]
			.map((id) => current.records.get(id))
			.filter((record): record is JobRecord => record !== undefined)
			.sort((a, b) => a.lastModifiedAt.localeCompare(b.lastModifiedAt) || a.externalId.localeCompare(b.externalId));

		for (const record of upserts) {
			const id = record.externalId;
			const changes = result.modified[id];
			const wantsReissue = reissue.has(id) || (changes !== undefined && this.reissuePolicy(id, changes));
			const existingCode = artifactCodes.get(id);
			const registeredCode = this.registry.lookup(id);

			try {
				let code: string;
				if (wantsReissue) {
					code = this.registry.assign(id);
				} else {
					code = existingCode ?? registeredCode ?? this.registry.assign(id);
					if (this.registry.lookup(id) !== code) this.registry.adopt(id, code);
				}

				const labels = await this.classify(report.cycleId, record);
				const entry = buildFeedEntry(record, code, labels, this.entryDefaults, stamp);

				if (existingCode !== undefined) {
					await this.store.updateInPlace(id, entry, { reissueReferenceCode: wantsReissue });
					report.mutations.updated++;
					if (wantsReissue) report.mutations.reissued++;
				} else {
					await this.store.insertAtHead(entry);
					report.mutations.inserted++;
				}
			} catch (err) {
				report.mutations.failed++;
				this.restoreCode(id, existingCode, registeredCode);

				const before = previousById.get(id);
				if (before) {
					synced.set(id, before.record);
				} else {
					synced.delete(id);
				}
				if (existingCode === undefined) expectedIds.delete(id);

				this.recordError(report, `record:${id}`, err);
				logSyncError(report.cycleId, `Upsert failed: ${errorMessage(err)}`, { externalId: id });
			}
		}

		// Untouched entries whose code the registry lost or disagrees with
		for (const [id, code] of artifactCodes) {
			if (upsertIds.has(id) || !expectedIds.has(id)) continue;
			if (this.registry.lookup(id) !== code) {
				this.registry.adopt(id, code);
				logSyncWarning(report.cycleId, "Registry adopted reference code from the feed", { externalId: id });
			}
		}

		logSyncInfo(report.cycleId, "Feed updated", { ...report.mutations });
		return { synced, expectedIds };
	}

	/** After a failed upsert the feed is unchanged, so the registry goes back to matching it. */
	private restoreCode(id: string, existingCode: string | undefined, registeredCode: string | undefined): void {
		if (existingCode !== undefined) {
			this.registry.adopt(id, existingCode);
		} else if (registeredCode !== undefined) {
			this.registry.adopt(id, registeredCode);
		} else {
			this.registry.retire(id);
		}
	}

	private async persistRegistryAfterFailure(report: SyncCycleReport): Promise<void> {
		try {
			await this.registry.persist();
		} catch (err) {
			this.recordError(report, "registry", err);
			logSyncCritical(report.cycleId, `Registry could not be saved after a failed mutation: ${errorMessage(err)}`);
		}
	}

	private async classify(cycleId: string, record: JobRecord): Promise<EnrichmentLabels> {
		try {
			const result = await this.classifier.classify(record.title, record.description);
			if (!result.success) {
				if (result.error) {
					logSyncWarning(cycleId, `Classification unavailable: ${result.error}`, { externalId: record.externalId });
				}
				return BLANK_LABELS;
			}
			return {
				jobFunction: result.jobFunction,
				industries: result.industries,
				seniority: result.seniorityLevel,
			};
		} catch (err) {
			logSyncWarning(cycleId, `Classifier threw: ${errorMessage(err)}`, { externalId: record.externalId });
			return BLANK_LABELS;
		}
	}

	// -----------------------------------------------------------------------
	// Verifying
	// -----------------------------------------------------------------------

	private async verify(expectedIds: ReadonlySet<string>): Promise<string[]> {
		const entries = await this.store.snapshot();
		const violations: string[] = [];
		const seen = new Set<string>();

		entries.forEach((entry, index) => {
			const id = entry.bhatsid;
			if (seen.has(id)) violations.push(`Duplicate entry for ${id}`);
			seen.add(id);

			if (!expectedIds.has(id)) violations.push(`Unexpected entry for ${id}`);

			const code = this.registry.lookup(id);
			if (code !== entry.referencenumber) {
				violations.push(`Reference code of ${id} is ${entry.referencenumber}, registry has ${code ?? "none"}`);
			}

			const next = entries[index + 1];
			if (next && next.lastupdated > entry.lastupdated) {
				violations.push(`Entry ${next.bhatsid} is newer than ${id} but listed after it`);
			}
		});

		for (const id of expectedIds) {
			if (!seen.has(id)) violations.push(`Missing entry for ${id}`);
		}
		return violations;
	}

	// -----------------------------------------------------------------------
	// Done / reporting
	// -----------------------------------------------------------------------

	private async publish(report: SyncCycleReport): Promise<void> {
		if (!this.transport) return;
		report.publish.attempted = true;
		try {
			const bytes = await this.store.readBytes();
			report.publish.success = await this.transport.publish(bytes);
			if (!report.publish.success) {
				report.publish.message = "Transport rejected the feed";
				logSyncWarning(report.cycleId, "Transport rejected the feed", { entity: "publish" });
			}
		} catch (err) {
			report.publish.message = errorMessage(err);
			this.recordError(report, "publish", err);
			logSyncError(report.cycleId, `Publish failed: ${errorMessage(err)}`, { entity: "publish" });
		}
	}

	private async notify(report: SyncCycleReport): Promise<void> {
		if (!this.notifier) return;
		try {
			await this.notifier.notify({ kind: report.status === "done" ? "summary" : "failure", report });
		} catch (err) {
			logSyncError(report.cycleId, `Notifier failed: ${errorMessage(err)}`, { entity: "notify" });
		}
	}

	private enter(report: SyncCycleReport, phase: SyncPhase): void {
		report.phases.push(phase);
		logSyncInfo(report.cycleId, `Phase ${phase}`);
	}

	private recordError(report: SyncCycleReport, entity: string, err: unknown): void {
		report.errors.push({
			entity,
			code: err instanceof FeedSyncError ? err.code : "UNEXPECTED",
			message: errorMessage(err),
			timestamp: new Date().toISOString(),
		});
	}
}
