// ---------------------------------------------------------------------------
// ATS Session Manager
// OAuth code flow → access token → REST session token, cached per process.
// ---------------------------------------------------------------------------

import {
	LoginInfoResponseSchema,
	RestLoginResponseSchema,
	TokenResponseSchema,
} from "@/lib/ats/schemas";
import { AuthError, errorMessage } from "@/lib/sync/errors";
import type { z } from "zod";

export interface AtsCredentials {
	clientId: string;
	clientSecret: string;
	username: string;
	password: string;
}

export interface AtsSession {
	/** REST base URL, always ending in "/" */
	restUrl: string;
	restToken: string;
}

export interface AtsSessionManagerOptions {
	loginInfoUrl: string;
	credentials: AtsCredentials;
	/** Must match the redirect URI whitelisted for the OAuth client, when one is required */
	redirectUri?: string;
	timeoutMs?: number;
	/** Custom fetch implementation (for testing) */
	fetchFn?: typeof fetch;
}

/**
 * Performs the ATS multi-step login and caches the resulting REST session.
 *
 * Concurrent callers share one in-flight login. Any failed step surfaces as
 * an AuthError naming the step; no step is retried here.
 */
export class AtsSessionManager {
	private readonly loginInfoUrl: string;
	private readonly credentials: AtsCredentials;
	private readonly redirectUri?: string;
	private readonly timeoutMs: number;
	private readonly fetchFn: typeof fetch;

	private session: AtsSession | null = null;
	private pendingLogin: Promise<AtsSession> | null = null;

	constructor(options: AtsSessionManagerOptions) {
		const missing = Object.entries(options.credentials)
			.filter(([, value]) => !value)
			.map(([key]) => key);
		if (missing.length > 0) {
			throw new Error(`AtsSessionManager: missing credentials: ${missing.join(", ")}`);
		}
		this.loginInfoUrl = options.loginInfoUrl;
		this.credentials = options.credentials;
		this.redirectUri = options.redirectUri;
		this.timeoutMs = options.timeoutMs ?? 30_000;
		this.fetchFn = options.fetchFn ?? globalThis.fetch;
	}

	/** Returns the cached session, logging in first when there is none. */
	async getSession(): Promise<AtsSession> {
		if (this.session) return this.session;
		if (!this.pendingLogin) {
			this.pendingLogin = this.login().finally(() => {
				this.pendingLogin = null;
			});
		}
		return this.pendingLogin;
	}

	/** Drop the cached session so the next request logs in again. */
	invalidate(): void {
		this.session = null;
	}

	private async login(): Promise<AtsSession> {
		const { clientId, clientSecret, username, password } = this.credentials;

		// 1. Discover the data-center specific OAuth and REST URLs
		const loginInfoUrl = new URL(this.loginInfoUrl);
		loginInfoUrl.searchParams.set("username", username);
		const loginInfo = await this.requestJson("loginInfo", loginInfoUrl, { method: "GET" }, LoginInfoResponseSchema);
		const oauthUrl = loginInfo.oauthUrl.replace(/\/+$/, "");

		// 2. Authorization code (credentials posted directly; the code comes back in a redirect)
		const authorizeUrl = new URL(`${oauthUrl}/authorize`);
		authorizeUrl.searchParams.set("client_id", clientId);
		authorizeUrl.searchParams.set("response_type", "code");
		authorizeUrl.searchParams.set("username", username);
		authorizeUrl.searchParams.set("password", password);
		authorizeUrl.searchParams.set("action", "Login");
		if (this.redirectUri) authorizeUrl.searchParams.set("redirect_uri", this.redirectUri);
		const code = await this.requestAuthorizationCode(authorizeUrl);

		// 3. Exchange the code for an access token
		const tokenBody = new URLSearchParams({
			grant_type: "authorization_code",
			code,
			client_id: clientId,
			client_secret: clientSecret,
		});
		if (this.redirectUri) tokenBody.set("redirect_uri", this.redirectUri);
		const token = await this.requestJson(
			"token",
			new URL(`${oauthUrl}/token`),
			{
				method: "POST",
				headers: {
					"Content-Type": "application/x-www-form-urlencoded",
					Accept: "application/json",
				},
				body: tokenBody.toString(),
			},
			TokenResponseSchema,
		);

		// 4. REST login
		const restLoginUrl = new URL(`${loginInfo.restUrl.replace(/\/+$/, "")}/login`);
		restLoginUrl.searchParams.set("version", "2.0");
		restLoginUrl.searchParams.set("access_token", token.access_token);
		const rest = await this.requestJson("restLogin", restLoginUrl, { method: "POST" }, RestLoginResponseSchema);

		const restUrl = (rest.restUrl ?? loginInfo.restUrl).replace(/\/*$/, "/");
		this.session = { restUrl, restToken: rest.BhRestToken };
		return this.session;
	}

	private async requestAuthorizationCode(url: URL): Promise<string> {
		const res = await this.send("authorize", url, { method: "GET", redirect: "manual" });

		if (res.status >= 300 && res.status < 400) {
			const location = res.headers.get("Location") ?? "";
			const params = new URL(location, url).searchParams;
			const code = params.get("code");
			if (code) return code;
			const error = params.get("error");
			throw new AuthError("authorize", error ? `OAuth error: ${error}` : "redirect carried no authorization code");
		}

		const body = await res.text();
		const match = /"code"\s*:\s*"([^"]+)"/.exec(body) ?? /[?&]code=([^&\s"']+)/.exec(body);
		if (!match) {
			throw new AuthError("authorize", `unexpected response ${res.status} without authorization code`);
		}
		try {
			return decodeURIComponent(match[1]);
		} catch (err) {
			throw new AuthError("authorize", `malformed authorization code: ${errorMessage(err)}`);
		}
	}

	private async requestJson<T>(
		step: string,
		url: URL,
		init: RequestInit,
		schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	): Promise<T> {
		const res = await this.send(step, url, init);
		if (!res.ok) {
			throw new AuthError(step, `HTTP ${res.status} (${res.statusText})`);
		}

		let json: unknown;
		try {
			json = await res.json();
		} catch (err) {
			throw new AuthError(step, `response is not JSON: ${errorMessage(err)}`);
		}

		const parsed = schema.safeParse(json);
		if (!parsed.success) {
			throw new AuthError(step, parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", "));
		}
		return parsed.data;
	}

	private async send(step: string, url: URL, init: RequestInit): Promise<Response> {
		try {
			return await this.fetchFn(url.toString(), { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
		} catch (err) {
			throw new AuthError(step, errorMessage(err));
		}
	}
}
