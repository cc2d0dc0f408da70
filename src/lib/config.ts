// ---------------------------------------------------------------------------
// Environment Configuration Loader
// Validates all env vars on first use with Zod and caches the result.
// ---------------------------------------------------------------------------
//
// Recommended flag values per environment:
//
// ┌──────────────────────────────┬──────────┬──────────┬──────────┐
// │ Flag                         │ Local    │ CI/Test  │ Prod     │
// ├──────────────────────────────┼──────────┼──────────┼──────────┤
// │ ROLLBAR_ENABLED              │ 0        │ 0        │ 1        │
// │ FEED_LOCK_TIMEOUT_MS         │ 5000     │ 500      │ 5000     │
// │ ATS_MAX_RETRIES              │ 2        │ 0        │ 2        │
// │ NOTIFY_FAILURE_THRESHOLD     │ 1        │ —        │ 3        │
// └──────────────────────────────┴──────────┴──────────┴──────────┘
// — Not applicable (no mail transport in CI).
// ---------------------------------------------------------------------------

import { z } from "zod";

/**
 * Coerce environment variable strings to booleans for use in Zod schemas.
 *
 * Truthy values: `"1"`, `1`, `true`, `"true"`
 * Falsy values:  `"0"`, `0`, `false`, `"false"`; unset falls back to the default.
 */
const envBoolOptional = z.preprocess((v) => {
	if (v == null || v === "") return undefined;
	if (v === "1" || v === 1 || v === true || v === "true") return true;
	if (v === "0" || v === 0 || v === false || v === "false") return false;
	return v;
}, z.boolean().optional());

const envBool = (defaultValue: boolean) => envBoolOptional.transform((v) => v ?? defaultValue);

/** Comma-separated list → trimmed, non-empty strings. */
const envList = (defaultValue: string[]) =>
	z
		.string()
		.optional()
		.transform((v) =>
			v === undefined
				? defaultValue
				: v
						.split(",")
						.map((s) => s.trim())
						.filter((s) => s.length > 0),
		);

const EnvSchema = z
	.object({
		// ATS (remote source of truth)
		ATS_LOGIN_INFO_URL: z.string().url().default("https://rest.bullhornstaffing.com/rest-services/loginInfo"),
		ATS_CLIENT_ID: z.string().min(1),
		ATS_CLIENT_SECRET: z.string().min(1),
		ATS_USERNAME: z.string().min(1),
		ATS_PASSWORD: z.string().min(1),
		ATS_REDIRECT_URI: z.string().url().optional(),
		ATS_PAGE_SIZE: z.coerce.number().int().positive().max(500).default(200),
		ATS_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
		ATS_MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),
		ATS_RATE_LIMIT: z.coerce.number().int().positive().default(5),
		ATS_ACTIVE_STATUSES: envList(["Accepting Candidates", "Open", "Active"]),

		// Feed
		FEED_COLLECTION_IDS: envList([]).refine((ids) => ids.length > 0, {
			message: "FEED_COLLECTION_IDS must name at least one tearsheet id",
		}),
		FEED_EXCLUDED_IDS: envList([]),
		FEED_OUTPUT_PATH: z.string().min(1).default("output/feed.xml"),
		FEED_REGISTRY_PATH: z.string().min(1).default("output/reference-codes.json"),
		FEED_SNAPSHOT_PATH: z.string().min(1).default("output/previous-records.json"),
		FEED_PUBLISHER_NAME: z.string().min(1).default("Job Feed"),
		FEED_PUBLISHER_URL: z.string().url().default("https://example.com"),
		FEED_COMPANY_NAME: z.string().min(1).default("Job Feed"),
		FEED_APPLY_URL: z.string().url().default("https://example.com/apply"),
		FEED_DEFAULT_COUNTRY: z.string().default("United States"),
		FEED_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),

		// SMTP notifications (optional: the e-mail notifier is only wired when SMTP_HOST is set)
		SMTP_HOST: z.string().optional(),
		SMTP_PORT: z.coerce.number().int().positive().default(587),
		SMTP_USER: z.string().optional(),
		SMTP_PASS: z.string().optional(),
		SMTP_FROM: z.string().email().optional(),
		SMTP_SECURE: envBoolOptional,
		NOTIFY_EMAIL_TO: z.string().email().optional(),
		NOTIFY_FAILURE_THRESHOLD: z.coerce.number().int().positive().default(3),

		// Rollbar
		ROLLBAR_SERVER_TOKEN: z.string().default(""),
		ROLLBAR_ENABLED: envBool(false),
	})
	.refine((env) => !env.ROLLBAR_ENABLED || env.ROLLBAR_SERVER_TOKEN.length > 0, {
		message: "ROLLBAR_SERVER_TOKEN required when ROLLBAR_ENABLED=true",
		path: ["ROLLBAR_SERVER_TOKEN"],
	})
	.refine((env) => !env.SMTP_HOST || (env.SMTP_FROM !== undefined && env.NOTIFY_EMAIL_TO !== undefined), {
		message: "SMTP_FROM and NOTIFY_EMAIL_TO are required when SMTP_HOST is set",
		path: ["SMTP_HOST"],
	});

export type AppConfig = z.infer<typeof EnvSchema>;

let _config: AppConfig | null = null;

/**
 * Load and validate environment configuration.
 * Throws a descriptive error if any required env var is missing or invalid.
 * Result is cached after first successful load.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	if (_config) return _config;

	const result = EnvSchema.safeParse(env);
	if (!result.success) {
		const issues = result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n");
		throw new Error(`Environment configuration invalid:\n${issues}`);
	}

	_config = result.data;
	return _config;
}

/** Reset cached config (for testing). */
export function resetConfig(): void {
	_config = null;
}
