// ---------------------------------------------------------------------------
// Unit Tests: Tearsheet Collection Fetcher
// Association/search cross-check, pagination safeguards, partial failures
// ---------------------------------------------------------------------------

import type { QueryParams } from "@/lib/ats/client";
import { type AtsResourceReader, RemoteSourceClient } from "@/lib/ats/collection-fetcher";
import { AuthError, MappingError, PaginationInconsistencyError, TransientFetchError } from "@/lib/sync/errors";
import { describe, expect, it, vi } from "vitest";
import type { z } from "zod";
import { rawJob } from "../fixtures/jobs";

type Route = (params: QueryParams) => unknown;

/** Routes requests by path; a route that throws simulates a failed page. */
class FakeAtsClient implements AtsResourceReader {
	readonly calls: Array<{ path: string; params: QueryParams }> = [];
	readonly invalidateSession = vi.fn();

	constructor(private readonly routes: Record<string, Route>) {}

	async get<T>(path: string, params: QueryParams, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
		this.calls.push({ path, params });
		const route = this.routes[path];
		if (!route) throw new Error(`Unexpected request: ${path}`);
		return schema.parse(route(params));
	}

	starts(path: string): Array<string | number | undefined> {
		return this.calls.filter((c) => c.path === path).map((c) => c.params.start);
	}
}

const ENTITY = "entity/Tearsheet/7";
const MEMBERS = "entity/Tearsheet/7/jobOrders";
const SEARCH = "search/JobOrder";

function range(from: number, to: number): number[] {
	return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}

function entity(total: number, ids: number[]) {
	return () => ({ data: { id: 7, name: "Hot jobs", jobOrders: { total, data: ids.map((id) => rawJob(id)) } } });
}

function members(pages: Record<number, number[]>) {
	return (params: QueryParams) => ({ data: (pages[Number(params.start)] ?? []).map((id) => ({ id })) });
}

function search(ids: number[], pageSize = 200) {
	return (params: QueryParams) => {
		const start = Number(params.start);
		return { total: ids.length, start, data: ids.slice(start, start + pageSize).map((id) => rawJob(id)) };
	};
}

function ids(records: Array<{ externalId: string }>): string[] {
	return records.map((r) => r.externalId);
}

describe("RemoteSourceClient", () => {
	describe("small collections", () => {
		it("takes up to five members straight from the association surface", async () => {
			const client = new FakeAtsClient({ [ENTITY]: entity(2, [101, 102]) });
			const result = await new RemoteSourceClient({ client }).fetchCollection("7");

			expect(ids(result.records)).toEqual(["101", "102"]);
			expect(result).toMatchObject({
				collectionId: "7",
				associationTotal: 2,
				searchCount: 0,
				orphanRemovalDisabled: false,
				issues: [],
			});
			expect(client.calls).toHaveLength(1);
			expect(client.calls[0].params.fields).toContain("jobOrders(id,title,");
		});

		it("drops inactive and excluded jobs and counts them", async () => {
			const client = new FakeAtsClient({
				[ENTITY]: () => ({
					data: {
						jobOrders: {
							total: 4,
							data: [rawJob(101), rawJob(102), rawJob(103, { isOpen: false }), rawJob(104, { status: "Filled" })],
						},
					},
				}),
			});
			const result = await new RemoteSourceClient({ client, excludedIds: ["102"] }).fetchCollection("7");

			expect(ids(result.records)).toEqual(["101"]);
			expect(result.excludedCount).toBe(1);
			expect(result.inactiveCount).toBe(2);
		});

		it("deduplicates by id, first occurrence wins", async () => {
			const client = new FakeAtsClient({
				[ENTITY]: () => ({
					data: { jobOrders: { total: 2, data: [rawJob(101, { title: "First" }), rawJob(101, { title: "Second" })] } },
				}),
			});
			const result = await new RemoteSourceClient({ client }).fetchCollection("7");

			expect(result.records).toHaveLength(1);
			expect(result.records[0].title).toBe("First");
		});

		it("records unmappable jobs as issues and keeps the rest", async () => {
			const client = new FakeAtsClient({
				[ENTITY]: () => ({ data: { jobOrders: { total: 2, data: [rawJob(101), rawJob(102, { title: 42 })] } } }),
			});
			const result = await new RemoteSourceClient({ client }).fetchCollection("7");

			expect(ids(result.records)).toEqual(["101"]);
			expect(result.issues).toHaveLength(1);
			expect(result.issues[0]).toBeInstanceOf(MappingError);
			expect(result.issues[0]).toMatchObject({ externalId: "102" });
		});
	});

	describe("association/search cross-check", () => {
		it("keeps only association members when the search surface returns more", async () => {
			const client = new FakeAtsClient({
				[ENTITY]: entity(6, range(201, 205)),
				[MEMBERS]: members({ 5: [206] }),
				[SEARCH]: search(range(201, 208)),
			});
			const result = await new RemoteSourceClient({ client }).fetchCollection("7");

			expect(ids(result.records)).toEqual(["201", "202", "203", "204", "205", "206"]);
			expect(result.orphanedByAssociation).toEqual(["207", "208"]);
			expect(result.unresolvedIds).toEqual([]);
			expect(result.associationTotal).toBe(6);
			expect(result.searchCount).toBe(8);
			expect(result.orphanRemovalDisabled).toBe(false);
		});

		it("trusts the search surface when the association reports more, listing the missing members", async () => {
			const client = new FakeAtsClient({
				[ENTITY]: entity(7, range(301, 305)),
				[MEMBERS]: members({ 5: [306, 307] }),
				[SEARCH]: search(range(301, 305)),
			});
			const result = await new RemoteSourceClient({ client, excludedIds: ["307"] }).fetchCollection("7");

			expect(ids(result.records)).toEqual(["301", "302", "303", "304", "305"]);
			expect(result.unresolvedIds).toEqual(["306"]);
			expect(result.orphanedByAssociation).toEqual([]);
			expect(result.orphanRemovalDisabled).toBe(false);
		});

		it("queries the search surface by tearsheet, newest first", async () => {
			const client = new FakeAtsClient({
				[ENTITY]: entity(6, range(201, 205)),
				[MEMBERS]: members({ 5: [206] }),
				[SEARCH]: search(range(201, 206)),
			});
			await new RemoteSourceClient({ client }).fetchCollection("7");

			const searchCall = client.calls.find((c) => c.path === SEARCH);
			expect(searchCall?.params).toMatchObject({
				query: "tearsheets.id:7",
				sort: "-dateLastModified",
				start: 0,
				count: 200,
			});
		});
	});

	describe("pagination", () => {
		it("pages both surfaces with the configured page size", async () => {
			const client = new FakeAtsClient({
				[ENTITY]: entity(6, range(501, 505)),
				[MEMBERS]: members({ 5: [506] }),
				[SEARCH]: search(range(501, 506), 2),
			});
			const result = await new RemoteSourceClient({ client, pageSize: 2 }).fetchCollection("7");

			expect(ids(result.records)).toEqual(["501", "502", "503", "504", "505", "506"]);
			expect(client.starts(MEMBERS)).toEqual([5]);
			expect(client.starts(SEARCH)).toEqual([0, 2, 4]);
			expect(result.issues).toEqual([]);
		});

		it("keeps paging search results that carry no total until a short page", async () => {
			const all = range(601, 610);
			const client = new FakeAtsClient({
				[ENTITY]: entity(10, range(601, 605)),
				[MEMBERS]: members({ 5: range(606, 610) }),
				[SEARCH]: (params) => {
					const start = Number(params.start);
					return { data: all.slice(start, start + 4).map((id) => rawJob(id)) };
				},
			});
			const result = await new RemoteSourceClient({ client, pageSize: 4 }).fetchCollection("7");

			expect(client.starts(SEARCH)).toEqual([0, 4, 8]);
			expect(ids(result.records)).toEqual(all.map(String));
			expect(result.orphanRemovalDisabled).toBe(false);
		});

		it("disables orphan removal when association pages fall short of the reported total", async () => {
			const client = new FakeAtsClient({
				[ENTITY]: entity(8, range(401, 405)),
				[MEMBERS]: members({ 5: [406] }),
				[SEARCH]: search(range(401, 410)),
			});
			const result = await new RemoteSourceClient({ client }).fetchCollection("7");

			expect(result.orphanRemovalDisabled).toBe(true);
			expect(result.issues).toHaveLength(1);
			expect(result.issues[0]).toBeInstanceOf(PaginationInconsistencyError);
			expect(result.issues[0]).toMatchObject({ collected: 6, reportedTotal: 8 });
			// No membership filter without a complete id list
			expect(result.records).toHaveLength(10);
			expect(result.orphanedByAssociation).toEqual([]);
		});

		it("stops on an empty association page", async () => {
			const client = new FakeAtsClient({
				[ENTITY]: entity(9, range(401, 405)),
				[MEMBERS]: members({}),
				[SEARCH]: search(range(401, 405)),
			});
			const result = await new RemoteSourceClient({ client }).fetchCollection("7");

			expect(client.starts(MEMBERS)).toEqual([5]);
			expect(result.orphanRemovalDisabled).toBe(true);
		});
	});

	describe("partial failures", () => {
		it("keeps the search pages fetched before a failure and disables orphan removal", async () => {
			const pages = search(range(501, 506), 2);
			const client = new FakeAtsClient({
				[ENTITY]: entity(6, range(501, 505)),
				[MEMBERS]: members({ 5: [506] }),
				[SEARCH]: (params) => {
					if (params.start === 2) throw new Error("HTTP 503");
					return pages(params);
				},
			});
			const result = await new RemoteSourceClient({ client, pageSize: 2 }).fetchCollection("7");

			expect(ids(result.records)).toEqual(["501", "502"]);
			expect(result.orphanRemovalDisabled).toBe(true);
			expect(result.unresolvedIds).toEqual(["503", "504", "505", "506"]);
			expect(result.issues).toHaveLength(1);
			expect(result.issues[0]).toBeInstanceOf(TransientFetchError);
			expect(result.issues[0]).toMatchObject({ surface: "search", start: 2 });
		});

		it("falls back to the search surface when the association surface fails", async () => {
			const client = new FakeAtsClient({
				[ENTITY]: () => {
					throw new Error("timeout");
				},
				[SEARCH]: search([101, 102]),
			});
			const result = await new RemoteSourceClient({ client }).fetchCollection("7");

			expect(ids(result.records)).toEqual(["101", "102"]);
			expect(result.associationTotal).toBeNull();
			expect(result.orphanRemovalDisabled).toBe(true);
			expect(result.issues[0]).toMatchObject({ surface: "association", start: 0 });
		});

		it("propagates authentication failures", async () => {
			const client = new FakeAtsClient({
				[ENTITY]: () => {
					throw new AuthError("request", "HTTP 401 for entity/Tearsheet/7");
				},
			});
			await expect(new RemoteSourceClient({ client }).fetchCollection("7")).rejects.toBeInstanceOf(AuthError);
		});
	});

	it("isExcluded reflects the configured exclusion set", () => {
		const fetcher = new RemoteSourceClient({ client: new FakeAtsClient({}), excludedIds: ["31939"] });
		expect(fetcher.isExcluded("31939")).toBe(true);
		expect(fetcher.isExcluded("101")).toBe(false);
	});

	it("invalidateSession() forces a fresh login on the client", () => {
		const client = new FakeAtsClient({});
		new RemoteSourceClient({ client }).invalidateSession();
		expect(client.invalidateSession).toHaveBeenCalledTimes(1);
	});
});
