// ---------------------------------------------------------------------------
// Sync State Files — Zod Validation Schemas
// Everything the engine reads back from disk is validated here.
// ---------------------------------------------------------------------------

import { z } from "zod";

// --- Reference code registry (flat `{ externalId: code }`) ---

export const RegistryFileSchema = z.record(z.string().min(1), z.string().min(1));

// --- Previous-records snapshot ---

export const JobRecordSchema = z.object({
	externalId: z.string().min(1),
	title: z.string(),
	description: z.string(),
	location: z.object({
		city: z.string().optional(),
		state: z.string().optional(),
		country: z.string().optional(),
	}),
	employmentKind: z.enum(["Contract", "Contract to Hire", "Direct Hire", "Full-time", "Part-time"]),
	workArrangement: z.enum(["Remote", "Hybrid", "Onsite", "No Preference", "Off-Site"]),
	assignedOwnerName: z.string(),
	lastModifiedAt: z.string(),
	postedAt: z.string().nullable(),
	isActive: z.boolean(),
});

export const SnapshotEntrySchema = z.object({
	record: JobRecordSchema,
	/** Tearsheets the record was a member of when it was synced */
	collections: z.array(z.string()),
});

export const SnapshotFileSchema = z.object({
	syncedAt: z.string().datetime({ offset: true }),
	records: z.array(SnapshotEntrySchema),
});

export type SnapshotEntry = z.infer<typeof SnapshotEntrySchema>;
export type SnapshotFile = z.infer<typeof SnapshotFileSchema>;
