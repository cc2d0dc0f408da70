// ---------------------------------------------------------------------------
// Record Set Reconciliation
// Pure diff between the last synced record set and the freshly fetched one.
// ---------------------------------------------------------------------------

import type { JobRecord } from "@/lib/ats/types";
import type { FieldChange, MaterialField, ReconciliationResult } from "./types";

/** Fields whose change makes a record "modified". Enrichment labels are never compared. */
export const MATERIAL_FIELDS: readonly MaterialField[] = [
	"title",
	"description",
	"city",
	"state",
	"country",
	"employmentKind",
	"workArrangement",
	"assignedOwnerName",
];

function materialValue(record: JobRecord, field: MaterialField): string {
	switch (field) {
		case "city":
		case "state":
		case "country":
			return record.location[field] ?? "";
		default:
			return record[field];
	}
}

/** Field-level differences between two versions of the same record. */
export function diffRecords(previous: JobRecord, current: JobRecord): FieldChange[] {
	const changes: FieldChange[] = [];
	for (const field of MATERIAL_FIELDS) {
		const oldValue = materialValue(previous, field);
		const newValue = materialValue(current, field);
		if (oldValue !== newValue) {
			changes.push({ field, oldValue, newValue });
		}
	}
	return changes;
}

/**
 * Compare the previous and current record sets by `externalId`.
 * Neither input is mutated; ids are reported in input order.
 */
export function reconcile(previous: readonly JobRecord[], current: readonly JobRecord[]): ReconciliationResult {
	const previousById = new Map(previous.map((r) => [r.externalId, r]));
	const currentById = new Map(current.map((r) => [r.externalId, r]));

	const added = [...currentById.keys()].filter((id) => !previousById.has(id));
	const removed = [...previousById.keys()].filter((id) => !currentById.has(id));

	const modified: Record<string, FieldChange[]> = {};
	for (const [id, record] of currentById) {
		const before = previousById.get(id);
		if (!before) continue;
		const changes = diffRecords(before, record);
		if (changes.length > 0) modified[id] = changes;
	}

	return {
		added,
		removed,
		modified,
		summary: {
			previousCount: previousById.size,
			currentCount: currentById.size,
			addedCount: added.length,
			removedCount: removed.length,
			modifiedCount: Object.keys(modified).length,
		},
	};
}

/**
 * Fold feed entries that belong to neither record set into `removed`,
 * so stale jobs left behind by an earlier crash are cleaned up.
 */
export function withArtifactOrphans(
	result: ReconciliationResult,
	artifactIds: Iterable<string>,
	knownIds: ReadonlySet<string>,
): ReconciliationResult {
	const removed = new Set(result.removed);
	const orphans: string[] = [];
	for (const id of artifactIds) {
		if (!knownIds.has(id) && !removed.has(id)) {
			orphans.push(id);
			removed.add(id);
		}
	}
	if (orphans.length === 0) return result;

	return {
		...result,
		removed: [...result.removed, ...orphans],
		summary: { ...result.summary, removedCount: result.summary.removedCount + orphans.length },
	};
}
