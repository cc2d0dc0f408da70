// ---------------------------------------------------------------------------
// Job Feed — Entry Types
// ---------------------------------------------------------------------------

/** Child elements of `<job>`, in serialization order. */
export const FEED_FIELDS = [
	"title",
	"company",
	"date",
	"referencenumber",
	"bhatsid",
	"url",
	"description",
	"jobtype",
	"city",
	"state",
	"country",
	"remotetype",
	"assignedrecruiter",
	"jobfunction",
	"jobindustries",
	"senioritylevel",
	"lastupdated",
] as const;

export type FeedField = (typeof FEED_FIELDS)[number];

/** One `<job>` element; every field is present, blank when unknown. */
export type FeedEntry = Record<FeedField, string>;

export function emptyFeedEntry(): FeedEntry {
	return {
		title: "",
		company: "",
		date: "",
		referencenumber: "",
		bhatsid: "",
		url: "",
		description: "",
		jobtype: "",
		city: "",
		state: "",
		country: "",
		remotetype: "",
		assignedrecruiter: "",
		jobfunction: "",
		jobindustries: "",
		senioritylevel: "",
		lastupdated: "",
	};
}

/** Elements every `<job>` must carry for the feed to validate. */
export const REQUIRED_FEED_FIELDS: readonly FeedField[] = [
	"title",
	"company",
	"date",
	"referencenumber",
	"bhatsid",
	"url",
	"description",
];

export interface FeedHeader {
	publisher: string;
	publisherUrl: string;
}

export interface FeedDocument {
	header: FeedHeader;
	entries: FeedEntry[];
}

/** Extra check run against the parsed document after every write; returns issues, empty when valid. */
export type FeedValidator = (document: FeedDocument) => string[];
