// ---------------------------------------------------------------------------
// ATS Job Order → JobRecord Mapping
// The only place raw ATS payloads are interpreted. Every optional field
// resolves to a documented default instead of null/undefined.
// ---------------------------------------------------------------------------

import { RawJobSchema, type RawJob } from "@/lib/ats/schemas";
import type { EmploymentKind, JobLocation, JobRecord, WorkArrangement } from "@/lib/ats/types";
import { MappingError } from "@/lib/sync/errors";

export const DEFAULT_ACTIVE_STATUSES = ["Accepting Candidates", "Open", "Active"] as const;

export type MapResult = { ok: true; record: JobRecord } | { ok: false; error: MappingError };

const EMPLOYMENT_EXACT: Record<string, EmploymentKind> = {
	Contract: "Contract",
	"Contract-to-Hire": "Contract to Hire",
	"Contract to Hire": "Contract to Hire",
	"Direct Hire": "Direct Hire",
	"Full-Time": "Direct Hire",
	"Full Time": "Full-time",
	"Part-Time": "Part-time",
	"Part Time": "Part-time",
	Temporary: "Contract",
};

/** Unknown or empty values fall back to `Contract`. */
export function mapEmploymentKind(value: string | null | undefined): EmploymentKind {
	if (!value) return "Contract";
	const exact = EMPLOYMENT_EXACT[value];
	if (exact) return exact;

	const lower = value.toLowerCase();
	if (lower.includes("contract to hire") || lower.includes("contract-to-hire")) return "Contract to Hire";
	if (lower.includes("direct") || lower.includes("perm") || lower.includes("full-time")) return "Direct Hire";
	return "Contract";
}

const ARRANGEMENT_EXACT: Record<string, WorkArrangement> = {
	remote: "Remote",
	"on-site": "Onsite",
	"on site": "Onsite",
	onsite: "Onsite",
	hybrid: "Hybrid",
	"no preference": "No Preference",
	offsite: "Remote",
	"off-site": "Off-Site",
	"off site": "Off-Site",
};

/** List values use their first element; empty or unknown values fall back to `Onsite`. */
export function mapWorkArrangement(value: string | string[] | null | undefined): WorkArrangement {
	const raw = Array.isArray(value) ? (value[0] ?? "") : (value ?? "");
	const lower = raw.trim().toLowerCase();

	const exact = ARRANGEMENT_EXACT[lower];
	if (exact) return exact;
	if (lower.includes("remote")) return "Remote";
	if (lower.includes("hybrid")) return "Hybrid";
	if (lower.includes("off-site") || lower.includes("off site")) return "Off-Site";
	return "Onsite";
}

type Person = { name?: string | null; firstName?: string | null; lastName?: string | null } | null | undefined;

function personName(person: Person): string {
	if (!person) return "";
	if (person.name?.trim()) return person.name.trim();
	return [person.firstName, person.lastName]
		.map((part) => part?.trim() ?? "")
		.filter((part) => part.length > 0)
		.join(" ");
}

/** Primary recruiter of the first assignment, then assigned users, response user, owner. */
export function resolveOwnerName(job: RawJob): string {
	const candidates: Person[] = [
		...(job.assignments?.data ?? []).map((a) => a.primaryRecruiter),
		...(job.assignedUsers?.data ?? []),
		job.responseUser,
		job.owner,
	];
	for (const candidate of candidates) {
		const name = personName(candidate);
		if (name) return name;
	}
	return "";
}

function collapseWhitespace(value: string | null | undefined): string {
	return (value ?? "").split(/\s+/).filter(Boolean).join(" ");
}

function toIso(epochMs: number | null | undefined): string | null {
	if (epochMs == null) return null;
	const date = new Date(epochMs);
	return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

function mapLocation(job: RawJob): JobLocation {
	const location: JobLocation = {};
	const city = job.address?.city?.trim();
	const state = job.address?.state?.trim();
	const country = job.address?.countryName?.trim();
	if (city) location.city = city;
	if (state) location.state = state;
	if (country) location.country = country;
	return location;
}

export function normalizeExternalId(id: number | string): string {
	return typeof id === "number" ? String(id) : id.trim();
}

/** Best-effort id of an unvalidated payload, for error reporting and membership checks. */
export function rawExternalId(raw: unknown): string | null {
	if (raw === null || typeof raw !== "object" || !("id" in raw)) return null;
	const id = raw.id;
	if (typeof id === "number" && Number.isFinite(id)) return String(id);
	if (typeof id === "string" && id.trim()) return id.trim();
	return null;
}

export function isActiveJob(job: RawJob, activeStatuses: readonly string[]): boolean {
	return job.isOpen === true && job.isDeleted !== true && activeStatuses.includes(job.status ?? "");
}

/**
 * Convert one raw job order into a JobRecord.
 * Payloads that fail schema validation yield a MappingError instead of throwing.
 */
export function mapJobRecord(
	raw: unknown,
	activeStatuses: readonly string[] = DEFAULT_ACTIVE_STATUSES,
): MapResult {
	const parsed = RawJobSchema.safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join(", ");
		return { ok: false, error: new MappingError(rawExternalId(raw) ?? "unknown", issues) };
	}

	const job = parsed.data;
	const lastModifiedAt = toIso(job.dateLastModified) ?? toIso(job.dateAdded) ?? new Date(0).toISOString();

	return {
		ok: true,
		record: {
			externalId: normalizeExternalId(job.id),
			title: collapseWhitespace(job.title),
			description: collapseWhitespace(job.publicDescription || job.description),
			location: mapLocation(job),
			employmentKind: mapEmploymentKind(job.employmentType),
			workArrangement: mapWorkArrangement(job.onSite),
			assignedOwnerName: resolveOwnerName(job),
			lastModifiedAt,
			postedAt: toIso(job.dateAdded),
			isActive: isActiveJob(job, activeStatuses),
		},
	};
}
