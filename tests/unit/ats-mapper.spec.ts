// ---------------------------------------------------------------------------
// Unit Tests: ATS Job Order Mapping
// ---------------------------------------------------------------------------

import {
	isActiveJob,
	mapEmploymentKind,
	mapJobRecord,
	mapWorkArrangement,
	resolveOwnerName,
	rawExternalId,
} from "@/lib/ats/mapper";
import { RawJobSchema } from "@/lib/ats/schemas";
import { MappingError } from "@/lib/sync/errors";
import { describe, expect, it } from "vitest";
import { rawJob } from "../fixtures/jobs";

describe("mapJobRecord", () => {
	it("maps a complete job order", () => {
		const result = mapJobRecord(
			rawJob(101, {
				title: "  Senior   Engineer ",
				publicDescription: "<p>Build\n\n  things</p>",
				employmentType: "Contract to Hire",
				onSite: ["Remote", "Hybrid"],
				assignments: { data: [{ primaryRecruiter: { firstName: "Sam", lastName: "Lee" } }] },
			}),
		);

		expect(result).toEqual({
			ok: true,
			record: {
				externalId: "101",
				title: "Senior Engineer",
				description: "<p>Build things</p>",
				location: { city: "Austin", state: "TX", country: "United States" },
				employmentKind: "Contract to Hire",
				workArrangement: "Remote",
				assignedOwnerName: "Sam Lee",
				lastModifiedAt: "2026-01-10T00:00:00.000Z",
				postedAt: "2026-01-05T00:00:00.000Z",
				isActive: true,
			},
		});
	});

	it("falls back to the internal description when the public one is empty", () => {
		const result = mapJobRecord(rawJob(101, { publicDescription: "", description: "Internal text" }));
		expect(result.ok && result.record.description).toBe("Internal text");
	});

	it("defaults every optional field", () => {
		const result = mapJobRecord({ id: "  202 " });
		expect(result).toEqual({
			ok: true,
			record: {
				externalId: "202",
				title: "",
				description: "",
				location: {},
				employmentKind: "Contract",
				workArrangement: "Onsite",
				assignedOwnerName: "",
				lastModifiedAt: "1970-01-01T00:00:00.000Z",
				postedAt: null,
				isActive: false,
			},
		});
	});

	it("uses dateAdded when dateLastModified is missing", () => {
		const result = mapJobRecord(rawJob(101, { dateLastModified: null }));
		expect(result.ok && result.record.lastModifiedAt).toBe("2026-01-05T00:00:00.000Z");
	});

	it("drops blank address parts", () => {
		const result = mapJobRecord(rawJob(101, { address: { city: " ", state: "OH", countryName: null } }));
		expect(result.ok && result.record.location).toEqual({ state: "OH" });
	});

	it("returns a MappingError for payloads without an id", () => {
		const result = mapJobRecord({ title: "No id" });
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(MappingError);
			expect(result.error.externalId).toBe("unknown");
		}
	});

	it("keeps the id of a payload with malformed fields", () => {
		const result = mapJobRecord(rawJob(303, { title: 42 }));
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.externalId).toBe("303");
			expect(result.error.message).toContain("title");
		}
	});
});

describe("isActiveJob", () => {
	const statuses = ["Accepting Candidates", "Open"];
	const parse = (overrides: Record<string, unknown>) => RawJobSchema.parse(rawJob(1, overrides));

	it("accepts open, undeleted jobs in an active status", () => {
		expect(isActiveJob(parse({}), statuses)).toBe(true);
		expect(isActiveJob(parse({ status: "Open" }), statuses)).toBe(true);
	});

	it("rejects closed, deleted or inactive-status jobs", () => {
		expect(isActiveJob(parse({ isOpen: false }), statuses)).toBe(false);
		expect(isActiveJob(parse({ isDeleted: true }), statuses)).toBe(false);
		expect(isActiveJob(parse({ status: "Filled" }), statuses)).toBe(false);
		expect(isActiveJob(parse({ status: null }), statuses)).toBe(false);
	});
});

describe("mapEmploymentKind", () => {
	it.each([
		["Contract", "Contract"],
		["Contract-to-Hire", "Contract to Hire"],
		["Direct Hire", "Direct Hire"],
		["Full-Time", "Direct Hire"],
		["Full Time", "Full-time"],
		["Part-Time", "Part-time"],
		["Temporary", "Contract"],
		["Permanent placement", "Direct Hire"],
		["contract to hire (6 months)", "Contract to Hire"],
		["Seasonal", "Contract"],
		["", "Contract"],
		[null, "Contract"],
	])("maps %s to %s", (input, expected) => {
		expect(mapEmploymentKind(input)).toBe(expected);
	});
});

describe("mapWorkArrangement", () => {
	it.each([
		["Remote", "Remote"],
		["On-Site", "Onsite"],
		["onsite", "Onsite"],
		["Hybrid", "Hybrid"],
		["No Preference", "No Preference"],
		["Offsite", "Remote"],
		["Off-Site", "Off-Site"],
		["Fully remote (US only)", "Remote"],
		["Hybrid - 3 days", "Hybrid"],
		["", "Onsite"],
		[null, "Onsite"],
	])("maps %s to %s", (input, expected) => {
		expect(mapWorkArrangement(input)).toBe(expected);
	});

	it("uses the first element of a list", () => {
		expect(mapWorkArrangement(["Hybrid", "Remote"])).toBe("Hybrid");
		expect(mapWorkArrangement([])).toBe("Onsite");
	});
});

describe("resolveOwnerName", () => {
	it("prefers the primary recruiter of the first assignment", () => {
		const job = RawJobSchema.parse(
			rawJob(1, {
				assignments: { data: [{ primaryRecruiter: { firstName: "Sam", lastName: "Lee" } }] },
				assignedUsers: { data: [{ firstName: "Alex", lastName: "Kim" }] },
			}),
		);
		expect(resolveOwnerName(job)).toBe("Sam Lee");
	});

	it("skips blank candidates and uses `name` when present", () => {
		const job = RawJobSchema.parse(
			rawJob(1, {
				assignments: { data: [{ primaryRecruiter: null }] },
				assignedUsers: { data: [{ firstName: " ", lastName: "" }, { name: "Alex Kim" }] },
			}),
		);
		expect(resolveOwnerName(job)).toBe("Alex Kim");
	});

	it("falls back to the response user, then the owner", () => {
		expect(resolveOwnerName(RawJobSchema.parse(rawJob(1, { responseUser: { firstName: "Jo" } })))).toBe("Jo");
		expect(resolveOwnerName(RawJobSchema.parse(rawJob(1)))).toBe("Dana Reyes");
		expect(resolveOwnerName(RawJobSchema.parse(rawJob(1, { owner: null })))).toBe("");
	});
});

describe("rawExternalId", () => {
	it("reads numeric and string ids", () => {
		expect(rawExternalId({ id: 42 })).toBe("42");
		expect(rawExternalId({ id: " 43 " })).toBe("43");
	});

	it("returns null for anything else", () => {
		expect(rawExternalId(null)).toBeNull();
		expect(rawExternalId({ id: "" })).toBeNull();
		expect(rawExternalId({ id: {} })).toBeNull();
		expect(rawExternalId("101")).toBeNull();
	});
});
