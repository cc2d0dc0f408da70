// ---------------------------------------------------------------------------
// Previous-Records Snapshot
// The last successfully synced record set, kept for the next cycle's diff.
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { type SnapshotFile, SnapshotFileSchema } from "./schemas";

/**
 * Read the snapshot from the filesystem.
 * Returns null if the file doesn't exist; throws if it exists but is unreadable.
 */
export async function readSnapshot(snapshotPath: string): Promise<SnapshotFile | null> {
	let content: string;
	try {
		content = await fs.readFile(snapshotPath, "utf-8");
	} catch (err) {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
		throw err;
	}

	const parsed = SnapshotFileSchema.safeParse(JSON.parse(content));
	if (!parsed.success) {
		throw new Error(
			`Snapshot ${snapshotPath} is invalid: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`,
		);
	}
	return parsed.data;
}

/**
 * Write the snapshot atomically (tmp + rename).
 */
export async function writeSnapshot(snapshotPath: string, snapshot: SnapshotFile): Promise<void> {
	await fs.mkdir(path.dirname(snapshotPath), { recursive: true });

	const tmpPath = `${snapshotPath}.tmp`;
	await fs.writeFile(tmpPath, JSON.stringify(snapshot, null, 2), "utf-8");
	await fs.rename(tmpPath, snapshotPath);
}
