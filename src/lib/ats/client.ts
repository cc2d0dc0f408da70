// ---------------------------------------------------------------------------
// ATS REST API — HTTP Client
// Session auth, throttling (p-throttle), bounded retry (p-retry), Zod parsing
// ---------------------------------------------------------------------------

import type { AtsSession } from "@/lib/ats/auth";
import { AuthError } from "@/lib/sync/errors";
import pRetry, { AbortError } from "p-retry";
import pThrottle from "p-throttle";
import type { z } from "zod";

/** What the client needs from the session manager. */
export interface AtsSessionProvider {
	getSession(): Promise<AtsSession>;
	invalidate(): void;
}

export type QueryParams = Record<string, string | number>;

export interface AtsClientOptions {
	sessions: AtsSessionProvider;
	/** Requests per second (default: 5) */
	rateLimit?: number;
	/** Retries on 429/5xx/network errors (default: 2) */
	maxRetries?: number;
	/** First retry delay in ms (default: 1000) */
	retryMinTimeoutMs?: number;
	/** Per-request timeout in ms (default: 30s) */
	timeoutMs?: number;
	/** Custom fetch implementation (for testing) */
	fetchFn?: typeof fetch;
}

export class AtsApiError extends Error {
	constructor(
		public readonly status: number,
		public readonly statusText: string,
		public readonly body: string,
		public readonly url: string,
	) {
		super(`ATS API error ${status} (${statusText}) for ${url}`);
		this.name = "AtsApiError";
	}
}

/**
 * HTTP client for the ATS REST API.
 *
 * - REST session token appended as `BhRestToken` query parameter
 * - Rate limiting via p-throttle
 * - Bounded retry on 5xx/429/network errors via p-retry; callers treat an
 *   exhausted retry as a transient failure and stop paginating
 * - 401/403 invalidate the session and surface as AuthError without retry
 * - Zod validation of every response
 */
export class AtsClient {
	private readonly sessions: AtsSessionProvider;
	private readonly maxRetries: number;
	private readonly retryMinTimeoutMs: number;
	private readonly timeoutMs: number;
	private readonly fetchFn: typeof fetch;
	private readonly throttledFetch: typeof fetch;

	constructor(options: AtsClientOptions) {
		this.sessions = options.sessions;
		this.maxRetries = options.maxRetries ?? 2;
		this.retryMinTimeoutMs = options.retryMinTimeoutMs ?? 1000;
		this.timeoutMs = options.timeoutMs ?? 30_000;
		this.fetchFn = options.fetchFn ?? globalThis.fetch;

		const throttle = pThrottle({
			limit: options.rateLimit ?? 5,
			interval: 1000,
		});

		this.throttledFetch = throttle((input: string | URL | Request, init?: RequestInit) =>
			this.fetchFn(input, init),
		) as typeof fetch;
	}

	/**
	 * GET a resource relative to the session's REST URL and validate it with Zod.
	 *
	 * @param path   e.g. "search/JobOrder"
	 * @param params Query parameters (the session token is added here)
	 * @param schema Zod schema for the response body
	 */
	async get<T>(path: string, params: QueryParams, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
		const session = await this.sessions.getSession();
		const url = this.buildUrl(session, path, params);

		const response = await pRetry(
			async () => {
				const res = await this.throttledFetch(url, {
					method: "GET",
					headers: { Accept: "application/json" },
					signal: AbortSignal.timeout(this.timeoutMs),
				});

				if (res.status === 429) {
					await this.delay(parseRetryAfter(res.headers.get("Retry-After"), this.retryMinTimeoutMs));
					throw new AtsApiError(res.status, res.statusText, "", path);
				}

				// Session expired or revoked: no retry, the cycle cannot continue on this token
				if (res.status === 401 || res.status === 403) {
					this.sessions.invalidate();
					throw new AbortError(new AuthError("request", `HTTP ${res.status} for ${path}`));
				}

				if (res.status >= 500) {
					const responseBody = await res.text();
					throw new AtsApiError(res.status, res.statusText, responseBody, path);
				}

				if (!res.ok) {
					const responseBody = await res.text();
					throw new AbortError(new AtsApiError(res.status, res.statusText, responseBody, path));
				}

				return res;
			},
			{
				retries: this.maxRetries,
				minTimeout: this.retryMinTimeoutMs,
				factor: 2,
				randomize: true,
			},
		);

		const json: unknown = await response.json();
		return schema.parse(json);
	}

	/** Force a fresh login on the next request. */
	invalidateSession(): void {
		this.sessions.invalidate();
	}

	private buildUrl(session: AtsSession, path: string, params: QueryParams): string {
		const url = new URL(path.replace(/^\/+/, ""), session.restUrl);
		for (const [key, value] of Object.entries(params)) {
			url.searchParams.set(key, String(value));
		}
		url.searchParams.set("BhRestToken", session.restToken);
		return url.toString();
	}

	private delay(ms: number): Promise<void> {
		return new Promise((resolve) => setTimeout(resolve, ms));
	}
}

/**
 * Wait in ms for a `Retry-After` value given in seconds or as an HTTP date.
 * Anything unparseable falls back to `fallbackMs`.
 */
export function parseRetryAfter(value: string | null, fallbackMs: number, now: number = Date.now()): number {
	if (!value) return fallbackMs;
	const trimmed = value.trim();
	if (/^\d+$/.test(trimmed)) return Number.parseInt(trimmed, 10) * 1000;

	const at = Date.parse(trimmed);
	if (Number.isNaN(at)) return fallbackMs;
	return Math.max(0, at - now);
}
