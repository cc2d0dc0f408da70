// ---------------------------------------------------------------------------
// Job Feed — XML Serialization & Parsing
// Output is built by hand so the byte layout is deterministic; reading and
// well-formedness checks go through fast-xml-parser.
// ---------------------------------------------------------------------------

import { XMLParser, XMLValidator } from "fast-xml-parser";
import {
	emptyFeedEntry,
	FEED_FIELDS,
	REQUIRED_FEED_FIELDS,
	type FeedDocument,
	type FeedEntry,
	type FeedHeader,
} from "./types";

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

// XML 1.0 forbids these even inside CDATA
const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

/**
 * Wrap a payload as `<![CDATA[ value ]]>`.
 * A literal `]]>` inside the payload is split across two CDATA sections.
 */
export function cdata(value: string): string {
	const clean = value.replace(INVALID_XML_CHARS, "").replaceAll("]]>", "]]]]><![CDATA[>");
	return `<![CDATA[ ${clean} ]]>`;
}

function element(name: string, value: string, indent: string): string {
	return `${indent}<${name}>${cdata(value)}</${name}>`;
}

export function serializeEntry(entry: FeedEntry): string {
	const lines = ["  <job>"];
	for (const field of FEED_FIELDS) {
		lines.push(element(field, entry[field], "    "));
	}
	lines.push("  </job>");
	return lines.join("\n");
}

export function serializeFeed(document: FeedDocument): string {
	const lines = [
		XML_DECLARATION,
		"<source>",
		element("publisher", document.header.publisher, "  "),
		element("publisherurl", document.header.publisherUrl, "  "),
		...document.entries.map(serializeEntry),
		"</source>",
	];
	return `${lines.join("\n")}\n`;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const parser = new XMLParser({
	ignoreAttributes: true,
	ignoreDeclaration: true,
	parseTagValue: false,
	trimValues: true,
	isArray: (name, jpath) => jpath === "source.job",
});

export interface ParseOptions {
	/** Accept repeated `bhatsid` values (used when loading a feed for repair) */
	allowDuplicateIds?: boolean;
}

export type ParseResult = { ok: true; document: FeedDocument } | { ok: false; issues: string[] };

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Text content of a leaf element, or undefined when absent or not a leaf. */
function leafText(value: unknown): string | undefined {
	if (typeof value === "string") return value.trim();
	if (typeof value === "number" || typeof value === "boolean") return String(value);
	return undefined;
}

/**
 * Parse and structurally validate a feed document.
 *
 * Checks: well-formed XML, a single `source` root, every required field
 * present on each job, and no two jobs sharing a `bhatsid`.
 */
export function parseFeed(xml: string, options: ParseOptions = {}): ParseResult {
	const wellFormed = XMLValidator.validate(xml);
	if (wellFormed !== true) {
		return {
			ok: false,
			issues: [`Malformed XML at line ${wellFormed.err.line}: ${wellFormed.err.msg}`],
		};
	}

	const parsed: unknown = parser.parse(xml);
	if (!isRecord(parsed)) {
		return { ok: false, issues: ["Document has no root element"] };
	}
	const roots = Object.keys(parsed);
	if (roots.length !== 1 || roots[0] !== "source") {
		return { ok: false, issues: [`Root element must be <source>, found: ${roots.join(", ") || "none"}`] };
	}

	const source = parsed.source;
	const root: Record<string, unknown> = isRecord(source) ? source : {};
	const issues: string[] = [];

	const header: FeedHeader = {
		publisher: leafText(root.publisher) ?? "",
		publisherUrl: leafText(root.publisherurl) ?? "",
	};

	const rawJobs: unknown[] = Array.isArray(root.job) ? root.job : [];
	const entries: FeedEntry[] = [];
	const seen = new Set<string>();

	rawJobs.forEach((rawJob, index) => {
		const job: Record<string, unknown> = isRecord(rawJob) ? rawJob : {};
		const entry = emptyFeedEntry();
		for (const field of FEED_FIELDS) {
			const text = leafText(job[field]);
			if (text === undefined && REQUIRED_FEED_FIELDS.includes(field)) {
				issues.push(`Job ${index + 1} missing required field: ${field}`);
			}
			entry[field] = text ?? "";
		}

		if (entry.bhatsid) {
			if (seen.has(entry.bhatsid) && !options.allowDuplicateIds) {
				issues.push(`Duplicate bhatsid ${entry.bhatsid} at job ${index + 1}`);
			}
			seen.add(entry.bhatsid);
		}
		entries.push(entry);
	});

	if (issues.length > 0) return { ok: false, issues };
	return { ok: true, document: { header, entries } };
}
