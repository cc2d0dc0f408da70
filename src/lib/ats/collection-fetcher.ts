// ---------------------------------------------------------------------------
// Tearsheet Collection Fetcher
// Resolves tearsheet membership across the association and search surfaces,
// which routinely disagree on totals while the ATS catches up with itself.
// ---------------------------------------------------------------------------

import type { QueryParams } from "@/lib/ats/client";
import { DEFAULT_ACTIVE_STATUSES, mapJobRecord, rawExternalId } from "@/lib/ats/mapper";
import {
	AssociationPageSchema,
	SearchPageSchema,
	TearsheetEntitySchema,
} from "@/lib/ats/schemas";
import type { CollectionFetchResult, FetchIssue, JobRecord } from "@/lib/ats/types";
import {
	AuthError,
	PaginationInconsistencyError,
	TransientFetchError,
	errorMessage,
} from "@/lib/sync/errors";
import type { z } from "zod";

/** Fields needed to build a feed entry, requested from both surfaces. */
export const JOB_FIELDS = [
	"id",
	"title",
	"isOpen",
	"isDeleted",
	"status",
	"dateAdded",
	"dateLastModified",
	"publicDescription",
	"description",
	"address(city,state,countryName)",
	"employmentType",
	"onSite",
	"assignments(primaryRecruiter(firstName,lastName))",
	"assignedUsers(firstName,lastName)",
	"responseUser(firstName,lastName)",
	"owner(firstName,lastName)",
].join(",");

/** Collections this small are taken from the association surface without a cross-check. */
export const SMALL_COLLECTION_THRESHOLD = 5;

/** The slice of AtsClient the fetcher reads through. */
export interface AtsResourceReader {
	get<T>(path: string, params: QueryParams, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T>;
	invalidateSession(): void;
}

export interface RemoteSourceClientOptions {
	client: AtsResourceReader;
	/** Items per page on both surfaces (default: 200) */
	pageSize?: number;
	/** Operator override: ids that never appear in output */
	excludedIds?: Iterable<string>;
	activeStatuses?: readonly string[];
}

interface AssociationFirstPage {
	total: number;
	items: unknown[];
}

interface SearchOutcome {
	items: unknown[];
	/** False when a page failed and the loop stopped early */
	complete: boolean;
}

/**
 * Produces the authoritative set of active job records for one tearsheet.
 *
 * Partial failures never throw: the records gathered so far are returned and
 * the gaps are listed in `issues`. Only AuthError escapes.
 */
export class RemoteSourceClient {
	private readonly client: AtsResourceReader;
	private readonly pageSize: number;
	private readonly excludedIds: ReadonlySet<string>;
	private readonly activeStatuses: readonly string[];

	constructor(options: RemoteSourceClientOptions) {
		this.client = options.client;
		this.pageSize = options.pageSize ?? 200;
		this.excludedIds = new Set(options.excludedIds ?? []);
		this.activeStatuses = options.activeStatuses ?? DEFAULT_ACTIVE_STATUSES;
	}

	isExcluded(externalId: string): boolean {
		return this.excludedIds.has(externalId);
	}

	invalidateSession(): void {
		this.client.invalidateSession();
	}

	async fetchCollection(collectionId: string): Promise<CollectionFetchResult> {
		const issues: FetchIssue[] = [];
		const association = await this.fetchAssociationFirstPage(collectionId, issues);

		if (association && association.total <= SMALL_COLLECTION_THRESHOLD) {
			return this.buildResult(collectionId, association.items, issues, {
				associationTotal: association.total,
				searchCount: 0,
				orphanedByAssociation: [],
				unresolvedIds: [],
				orphanRemovalDisabled: false,
			});
		}

		let memberIds: Set<string> | null = null;
		let orphanRemovalDisabled = association === null;

		if (association) {
			memberIds = await this.collectMemberIds(collectionId, association, issues);
			if (memberIds.size < association.total) {
				// Reported total is unreliable: filtering against a short id list would delete live jobs
				issues.push(new PaginationInconsistencyError(collectionId, memberIds.size, association.total));
				memberIds = null;
				orphanRemovalDisabled = true;
			}
		}

		const search = await this.fetchSearch(collectionId, issues);
		if (!search.complete) orphanRemovalDisabled = true;

		let items = search.items;
		const orphanedByAssociation: string[] = [];
		const unresolvedIds: string[] = [];

		if (association && memberIds) {
			if (association.total < search.items.length) {
				// Association surface is authoritative for membership
				const members = memberIds;
				items = search.items.filter((item) => {
					const id = rawExternalId(item);
					if (id !== null && members.has(id)) return true;
					if (id !== null) orphanedByAssociation.push(id);
					return false;
				});
			} else if (association.total > search.items.length) {
				// Search surface is authoritative; members it missed are kept by the caller
				const searchIds = new Set(search.items.map(rawExternalId));
				for (const id of memberIds) {
					if (!searchIds.has(id) && !this.isExcluded(id)) unresolvedIds.push(id);
				}
			}
		}

		return this.buildResult(collectionId, items, issues, {
			associationTotal: association?.total ?? null,
			searchCount: search.items.length,
			orphanedByAssociation,
			unresolvedIds,
			orphanRemovalDisabled,
		});
	}

	private async fetchAssociationFirstPage(
		collectionId: string,
		issues: FetchIssue[],
	): Promise<AssociationFirstPage | null> {
		try {
			const entity = await this.client.get(
				`entity/Tearsheet/${encodeURIComponent(collectionId)}`,
				{ fields: `id,name,jobOrders(${JOB_FIELDS})` },
				TearsheetEntitySchema,
			);
			return { total: entity.data.jobOrders.total, items: entity.data.jobOrders.data };
		} catch (err) {
			if (err instanceof AuthError) throw err;
			issues.push(new TransientFetchError(collectionId, "association", 0, errorMessage(err)));
			return null;
		}
	}

	private async collectMemberIds(
		collectionId: string,
		firstPage: AssociationFirstPage,
		issues: FetchIssue[],
	): Promise<Set<string>> {
		const ids = new Set<string>();
		for (const item of firstPage.items) {
			const id = rawExternalId(item);
			if (id !== null) ids.add(id);
		}

		let start = firstPage.items.length;
		while (start < firstPage.total) {
			let page;
			try {
				page = await this.client.get(
					`entity/Tearsheet/${encodeURIComponent(collectionId)}/jobOrders`,
					{ fields: "id", start, count: this.pageSize },
					AssociationPageSchema,
				);
			} catch (err) {
				if (err instanceof AuthError) throw err;
				issues.push(new TransientFetchError(collectionId, "association", start, errorMessage(err)));
				break;
			}

			if (page.data.length === 0) break;
			for (const item of page.data) {
				const id = rawExternalId(item);
				if (id !== null) ids.add(id);
			}
			start += page.data.length;
			if (page.data.length < this.pageSize) break;
		}

		return ids;
	}

	private async fetchSearch(collectionId: string, issues: FetchIssue[]): Promise<SearchOutcome> {
		const items: unknown[] = [];
		let start = 0;

		while (true) {
			let page;
			try {
				page = await this.client.get(
					"search/JobOrder",
					{
						query: `tearsheets.id:${collectionId}`,
						fields: JOB_FIELDS,
						sort: "-dateLastModified",
						start,
						count: this.pageSize,
					},
					SearchPageSchema,
				);
			} catch (err) {
				if (err instanceof AuthError) throw err;
				issues.push(new TransientFetchError(collectionId, "search", start, errorMessage(err)));
				return { items, complete: false };
			}

			items.push(...page.data);
			// Without a total only a short page ends the listing
			const reachedTotal = page.total !== undefined && items.length >= page.total;
			if (page.data.length < this.pageSize || reachedTotal) {
				return { items, complete: true };
			}
			start += this.pageSize;
		}
	}

	private buildResult(
		collectionId: string,
		items: unknown[],
		issues: FetchIssue[],
		diagnostics: Pick<
			CollectionFetchResult,
			"associationTotal" | "searchCount" | "orphanedByAssociation" | "unresolvedIds" | "orphanRemovalDisabled"
		>,
	): CollectionFetchResult {
		const records: JobRecord[] = [];
		const seen = new Set<string>();
		let excludedCount = 0;
		let inactiveCount = 0;

		for (const item of items) {
			const mapped = mapJobRecord(item, this.activeStatuses);
			if (!mapped.ok) {
				issues.push(mapped.error);
				continue;
			}
			const { record } = mapped;
			if (seen.has(record.externalId)) continue;
			seen.add(record.externalId);

			if (this.isExcluded(record.externalId)) {
				excludedCount++;
				continue;
			}
			if (!record.isActive) {
				inactiveCount++;
				continue;
			}
			records.push(record);
		}

		return {
			collectionId,
			records,
			...diagnostics,
			excludedCount,
			inactiveCount,
			issues,
		};
	}
}
