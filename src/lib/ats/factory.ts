// ---------------------------------------------------------------------------
// ATS Client Factory
// Builds the session manager, HTTP client and collection fetcher from config
// ---------------------------------------------------------------------------

import { AtsSessionManager } from "@/lib/ats/auth";
import { AtsClient } from "@/lib/ats/client";
import { RemoteSourceClient } from "@/lib/ats/collection-fetcher";
import type { AppConfig } from "@/lib/config";

/**
 * Create a RemoteSourceClient wired to the configured ATS tenant.
 * The session is shared by every request the fetcher makes.
 */
export function createRemoteSourceClient(config: AppConfig, fetchFn?: typeof fetch): RemoteSourceClient {
	const sessions = new AtsSessionManager({
		loginInfoUrl: config.ATS_LOGIN_INFO_URL,
		credentials: {
			clientId: config.ATS_CLIENT_ID,
			clientSecret: config.ATS_CLIENT_SECRET,
			username: config.ATS_USERNAME,
			password: config.ATS_PASSWORD,
		},
		redirectUri: config.ATS_REDIRECT_URI,
		timeoutMs: config.ATS_REQUEST_TIMEOUT_MS,
		fetchFn,
	});

	const client = new AtsClient({
		sessions,
		rateLimit: config.ATS_RATE_LIMIT,
		maxRetries: config.ATS_MAX_RETRIES,
		timeoutMs: config.ATS_REQUEST_TIMEOUT_MS,
		fetchFn,
	});

	return new RemoteSourceClient({
		client,
		pageSize: config.ATS_PAGE_SIZE,
		excludedIds: config.FEED_EXCLUDED_IDS,
		activeStatuses: config.ATS_ACTIVE_STATUSES,
	});
}
