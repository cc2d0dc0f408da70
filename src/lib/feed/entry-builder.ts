// ---------------------------------------------------------------------------
// JobRecord → FeedEntry
// ---------------------------------------------------------------------------

import type { JobRecord } from "@/lib/ats/types";
import { MappingError } from "@/lib/sync/errors";
import type { FeedEntry } from "./types";

/** Classifier output as written to the feed; blank when classification failed. */
export interface EnrichmentLabels {
	jobFunction: string;
	industries: string;
	seniority: string;
}

export const BLANK_LABELS: EnrichmentLabels = { jobFunction: "", industries: "", seniority: "" };

export interface FeedEntryDefaults {
	companyName: string;
	applyUrl: string;
	/** Used when the ATS address carries no country */
	defaultCountry: string;
}

const displayDate = new Intl.DateTimeFormat("en-US", {
	month: "long",
	day: "2-digit",
	year: "numeric",
	timeZone: "UTC",
});

/** e.g. `October 05, 2026`; blank for unparseable input. */
export function formatDisplayDate(iso: string): string {
	const date = new Date(iso);
	return Number.isNaN(date.getTime()) ? "" : displayDate.format(date);
}

/** Feed titles carry the ATS id so candidates can quote it. */
export function formatFeedTitle(record: JobRecord): string {
	return `${record.title} (${record.externalId})`;
}

/**
 * Build the `<job>` element for a record.
 *
 * @param lastUpdated ISO timestamp stamped on every entry written in this cycle
 * @throws MappingError when the record has no title to publish
 */
export function buildFeedEntry(
	record: JobRecord,
	referenceCode: string,
	labels: EnrichmentLabels,
	defaults: FeedEntryDefaults,
	lastUpdated: string,
): FeedEntry {
	if (!record.title) {
		throw new MappingError(record.externalId, "title is empty");
	}
	if (!referenceCode) {
		throw new MappingError(record.externalId, "no reference code");
	}

	return {
		title: formatFeedTitle(record),
		company: defaults.companyName,
		date: formatDisplayDate(record.postedAt ?? record.lastModifiedAt),
		referencenumber: referenceCode,
		bhatsid: record.externalId,
		url: defaults.applyUrl,
		description: record.description,
		jobtype: record.employmentKind,
		city: record.location.city ?? "",
		state: record.location.state ?? "",
		country: record.location.country ?? defaults.defaultCountry,
		remotetype: record.workArrangement,
		assignedrecruiter: record.assignedOwnerName,
		jobfunction: labels.jobFunction,
		jobindustries: labels.industries,
		senioritylevel: labels.seniority,
		lastupdated: lastUpdated,
	};
}
