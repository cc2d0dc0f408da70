// ---------------------------------------------------------------------------
// Unit Tests: Job Feed Store
// Head insertion, in-place updates, validation and byte-for-byte rollback
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { FeedStore } from "@/lib/feed/feed-store";
import type { FeedValidator } from "@/lib/feed/types";
import { serializeFeed } from "@/lib/feed/xml";
import { ValidationError } from "@/lib/sync/errors";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { HEADER, feedEntry } from "../fixtures/feed";

describe("FeedStore", () => {
	let tmpDir: string;
	let feedPath: string;

	beforeEach(async () => {
		tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "feed-store-test-"));
		feedPath = path.join(tmpDir, "feed.xml");
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	function createStore(validators: FeedValidator[] = []): FeedStore {
		return new FeedStore({ filePath: feedPath, header: HEADER, validators });
	}

	async function ids(store: FeedStore): Promise<string[]> {
		return (await store.snapshot()).map((e) => e.bhatsid);
	}

	describe("reading", () => {
		it("treats a missing file as an empty feed", async () => {
			const store = createStore();
			expect(await store.snapshot()).toEqual([]);
			expect((await store.readBytes()).toString("utf-8")).toBe(serializeFeed({ header: HEADER, entries: [] }));
		});

		it("fails on a feed it cannot parse", async () => {
			await fs.writeFile(feedPath, "<source><job></source>");
			await expect(createStore().snapshot()).rejects.toBeInstanceOf(ValidationError);
		});
	});

	describe("insertAtHead", () => {
		it("puts each new entry first", async () => {
			const store = createStore();
			await store.insertAtHead(feedEntry("101"));
			await store.insertAtHead(feedEntry("102"));
			await store.insertAtHead(feedEntry("103"));

			expect(await ids(store)).toEqual(["103", "102", "101"]);
			expect(await fs.readFile(feedPath, "utf-8")).toBe(
				serializeFeed({ header: HEADER, entries: [feedEntry("103"), feedEntry("102"), feedEntry("101")] }),
			);
		});

		it("rewrites the publisher header from its configuration", async () => {
			const oldHeader = { publisher: "Old Staffing Co", publisherUrl: "https://old.example.test" };
			await fs.writeFile(feedPath, serializeFeed({ header: oldHeader, entries: [feedEntry("101")] }));

			await createStore().insertAtHead(feedEntry("102"));

			expect(await fs.readFile(feedPath, "utf-8")).toBe(
				serializeFeed({ header: HEADER, entries: [feedEntry("102"), feedEntry("101")] }),
			);
		});

		it("refuses an id that is already in the feed", async () => {
			const store = createStore();
			await store.insertAtHead(feedEntry("101"));
			await expect(store.insertAtHead(feedEntry("101"))).rejects.toThrow("101 is already in the feed");
			expect(await ids(store)).toEqual(["101"]);
		});
	});

	describe("updateInPlace", () => {
		it("keeps the existing reference code and moves the entry to the head", async () => {
			const store = createStore();
			await store.insertAtHead(feedEntry("101"));
			await store.insertAtHead(feedEntry("102"));

			const updated = await store.updateInPlace(
				"101",
				feedEntry("101", { title: "Renamed (101)", referencenumber: "NEWCODE001" }),
			);

			expect(updated).toBe(true);
			const entries = await store.snapshot();
			expect(entries.map((e) => e.bhatsid)).toEqual(["101", "102"]);
			expect(entries[0].title).toBe("Renamed (101)");
			expect(entries[0].referencenumber).toBe("CODE000101");
		});

		it("takes the new code when a reissue is requested", async () => {
			const store = createStore();
			await store.insertAtHead(feedEntry("101"));

			await store.updateInPlace("101", feedEntry("101", { referencenumber: "NEWCODE001" }), {
				reissueReferenceCode: true,
			});

			expect((await store.snapshot())[0].referencenumber).toBe("NEWCODE001");
		});

		it("returns false without touching the file for an unknown id", async () => {
			const store = createStore();
			await store.insertAtHead(feedEntry("101"));
			const before = await fs.readFile(feedPath);

			expect(await store.updateInPlace("999", feedEntry("999"))).toBe(false);
			expect(await fs.readFile(feedPath)).toEqual(before);
		});
	});

	describe("remove / deduplicate", () => {
		it("removes an entry by id", async () => {
			const store = createStore();
			await store.insertAtHead(feedEntry("101"));
			await store.insertAtHead(feedEntry("102"));

			expect(await store.remove("101")).toBe(true);
			expect(await store.remove("101")).toBe(false);
			expect(await ids(store)).toEqual(["102"]);
		});

		it("keeps the first occurrence of a repeated id", async () => {
			const entries = [
				feedEntry("101", { title: "Newest (101)" }),
				feedEntry("102"),
				feedEntry("101", { title: "Oldest (101)" }),
			];
			await fs.writeFile(feedPath, serializeFeed({ header: HEADER, entries }));
			const store = createStore();

			expect(await store.deduplicate()).toBe(1);
			const result = await store.snapshot();
			expect(result.map((e) => e.bhatsid)).toEqual(["101", "102"]);
			expect(result[0].title).toBe("Newest (101)");
			expect(await store.deduplicate()).toBe(0);
		});
	});

	describe("validation and rollback", () => {
		const rejectId =
			(id: string): FeedValidator =>
			(document) =>
				document.entries.some((e) => e.bhatsid === id) ? [`job ${id} is not allowed`] : [];

		it("restores the previous bytes exactly when validation fails", async () => {
			const store = createStore([rejectId("999")]);
			await store.insertAtHead(feedEntry("101", { description: "Line one\nLine two" }));
			const before = await fs.readFile(feedPath);

			const error = await store.insertAtHead(feedEntry("999")).catch((err: unknown) => err);

			expect(error).toBeInstanceOf(ValidationError);
			expect(error).toMatchObject({ issues: ["job 999 is not allowed"] });
			expect(await fs.readFile(feedPath)).toEqual(before);
			expect(await fs.readdir(tmpDir)).toEqual(["feed.xml"]);
		});

		it("removes the file again when the first write fails validation", async () => {
			const store = createStore([() => ["always invalid"]]);

			await expect(store.insertAtHead(feedEntry("101"))).rejects.toBeInstanceOf(ValidationError);
			expect(await fs.readdir(tmpDir)).toEqual([]);
		});

		it("leaves no backup behind after a successful write", async () => {
			const store = createStore();
			await store.insertAtHead(feedEntry("101"));
			await store.insertAtHead(feedEntry("102"));

			expect(await fs.readdir(tmpDir)).toEqual(["feed.xml"]);
		});
	});

	it("serializes concurrent mutations", async () => {
		const store = createStore();
		await Promise.all(["101", "102", "103", "104"].map((id) => store.insertAtHead(feedEntry(id))));

		expect((await ids(store)).sort()).toEqual(["101", "102", "103", "104"]);
	});
});
