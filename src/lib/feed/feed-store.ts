// ---------------------------------------------------------------------------
// Job Feed Store
// Owns the on-disk feed. Every mutation is serialized, backed up, written
// atomically, re-read and validated, and rolled back byte-for-byte on failure.
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { AsyncMutex } from "@/lib/sync/mutex";
import { ValidationError } from "@/lib/sync/errors";
import type { FeedDocument, FeedEntry, FeedHeader, FeedValidator } from "./types";
import { parseFeed, serializeFeed } from "./xml";

export interface FeedStoreOptions {
	filePath: string;
	/** Publisher header written on every mutation, replacing the one in an existing file */
	header: FeedHeader;
	/** Max wait for the store lock before LockTimeoutError (default: 5s) */
	lockTimeoutMs?: number;
	/** Extra post-write checks on top of the structural validation */
	validators?: FeedValidator[];
}

export interface UpdateOptions {
	/** Take `entry.referencenumber` instead of the code already in the feed */
	reissueReferenceCode?: boolean;
}

interface Mutation<T> {
	changed: boolean;
	value: T;
}

export class FeedStore {
	readonly filePath: string;
	readonly backupPath: string;
	private readonly header: FeedHeader;
	private readonly validators: FeedValidator[];
	private readonly mutex: AsyncMutex;

	constructor(options: FeedStoreOptions) {
		this.filePath = options.filePath;
		this.backupPath = `${options.filePath}.bak`;
		this.header = options.header;
		this.validators = options.validators ?? [];
		this.mutex = new AsyncMutex(options.lockTimeoutMs ?? 5_000);
	}

	/** Current entries in document order. A missing file is an empty feed. */
	async snapshot(): Promise<FeedEntry[]> {
		return this.mutex.runExclusive(async () => {
			const bytes = await this.readFile();
			return bytes === null ? [] : this.load(bytes).entries;
		});
	}

	/** Serialized feed as published; a missing file yields the empty feed. */
	async readBytes(): Promise<Buffer> {
		return this.mutex.runExclusive(async () => {
			const bytes = await this.readFile();
			return bytes ?? Buffer.from(serializeFeed({ header: this.header, entries: [] }), "utf-8");
		});
	}

	/** Add a new entry as the first (newest) job. The id must not be in the feed yet. */
	async insertAtHead(entry: FeedEntry): Promise<void> {
		await this.mutate((document) => {
			if (document.entries.some((e) => e.bhatsid === entry.bhatsid)) {
				throw new Error(`FeedStore.insertAtHead: ${entry.bhatsid} is already in the feed`);
			}
			document.entries.unshift(entry);
			return { changed: true, value: undefined };
		});
	}

	/**
	 * Replace the entry for `externalId` and move it to the head, keeping the
	 * reference code it already had unless a reissue is requested.
	 *
	 * @returns false when the id is not in the feed
	 */
	async updateInPlace(externalId: string, entry: FeedEntry, options: UpdateOptions = {}): Promise<boolean> {
		return this.mutate((document) => {
			const index = document.entries.findIndex((e) => e.bhatsid === externalId);
			if (index === -1) return { changed: false, value: false };

			const existing = document.entries[index];
			const replacement: FeedEntry = {
				...entry,
				bhatsid: externalId,
				referencenumber: options.reissueReferenceCode ? entry.referencenumber : existing.referencenumber,
			};
			document.entries.splice(index, 1);
			document.entries.unshift(replacement);
			return { changed: true, value: true };
		});
	}

	/** @returns false when the id is not in the feed */
	async remove(externalId: string): Promise<boolean> {
		return this.mutate((document) => {
			const before = document.entries.length;
			document.entries = document.entries.filter((e) => e.bhatsid !== externalId);
			const removed = document.entries.length < before;
			return { changed: removed, value: removed };
		});
	}

	/**
	 * Drop repeated ids, keeping the first occurrence (the most recently written).
	 *
	 * @returns number of entries dropped
	 */
	async deduplicate(): Promise<number> {
		return this.mutate((document) => {
			const seen = new Set<string>();
			const kept: FeedEntry[] = [];
			for (const entry of document.entries) {
				if (seen.has(entry.bhatsid)) continue;
				seen.add(entry.bhatsid);
				kept.push(entry);
			}
			const dropped = document.entries.length - kept.length;
			document.entries = kept;
			return { changed: dropped > 0, value: dropped };
		});
	}

	// -----------------------------------------------------------------------
	// Internals
	// -----------------------------------------------------------------------

	private async mutate<T>(apply: (document: FeedDocument) => Mutation<T>): Promise<T> {
		return this.mutex.runExclusive(async () => {
			const original = await this.readFile();
			const document: FeedDocument =
				original === null ? { header: this.header, entries: [] } : this.load(original);

			const { changed, value } = apply(document);
			if (!changed) return value;

			// 1. Backup
			if (original !== null) {
				await fs.writeFile(this.backupPath, original);
			}

			try {
				// 2. Atomic write
				await this.writeAtomic(serializeFeed({ header: this.header, entries: document.entries }));

				// 3. Re-read and validate what actually landed on disk
				const written = await fs.readFile(this.filePath, "utf-8");
				const issues = this.validate(written);
				if (issues.length > 0) {
					throw new ValidationError(issues);
				}
			} catch (err) {
				await this.rollback(original !== null);
				throw err;
			}

			await fs.rm(this.backupPath, { force: true });
			return value;
		});
	}

	private validate(xml: string): string[] {
		const result = parseFeed(xml);
		if (!result.ok) return result.issues;
		return this.validators.flatMap((validator) => validator(result.document));
	}

	/** Parse the current file leniently: duplicates are tolerated so they can be repaired. */
	private load(bytes: Buffer): FeedDocument {
		const result = parseFeed(bytes.toString("utf-8"), { allowDuplicateIds: true });
		if (!result.ok) {
			throw new ValidationError(result.issues);
		}
		return result.document;
	}

	private async rollback(hadFile: boolean): Promise<void> {
		if (hadFile) {
			await fs.copyFile(this.backupPath, this.filePath);
			await fs.rm(this.backupPath, { force: true });
		} else {
			await fs.rm(this.filePath, { force: true });
		}
	}

	private async writeAtomic(content: string): Promise<void> {
		await fs.mkdir(path.dirname(this.filePath), { recursive: true });
		const tmpPath = `${this.filePath}.tmp`;
		await fs.writeFile(tmpPath, content, "utf-8");
		await fs.rename(tmpPath, this.filePath);
	}

	private async readFile(): Promise<Buffer | null> {
		try {
			return await fs.readFile(this.filePath);
		} catch (err) {
			if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
			throw err;
		}
	}
}
