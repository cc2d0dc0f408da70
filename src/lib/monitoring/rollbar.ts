// ---------------------------------------------------------------------------
// Rollbar Server-Side Integration
// Singleton instance with test no-op and secret scrubbing.
// ---------------------------------------------------------------------------

import Rollbar from "rollbar";

type LogArgs = [message: string, custom?: Record<string, unknown>];

/** The subset of the Rollbar API the sync engine logs through. */
export interface SyncLogSink {
	critical: (...args: LogArgs) => void;
	error: (...args: LogArgs) => void;
	warning: (...args: LogArgs) => void;
	info: (...args: LogArgs) => void;
	wait: (cb?: () => void) => void;
}

const isTestMode =
	process.env.NODE_ENV === "test" ||
	// Vitest sets VITEST / VITEST_POOL_ID
	typeof process.env.VITEST !== "undefined";

const noopSink: SyncLogSink = {
	critical: () => {},
	error: () => {},
	warning: () => {},
	info: () => {},
	wait: (cb?: () => void) => {
		if (typeof cb === "function") cb();
	},
};

let _instance: SyncLogSink | null = null;

/**
 * Get the server Rollbar instance.
 * Under test, or when no ROLLBAR_SERVER_TOKEN is set, a no-op sink is returned.
 */
export function getServerInstance(): SyncLogSink {
	if (_instance) return _instance;

	const token = process.env.ROLLBAR_SERVER_TOKEN;
	if (isTestMode || !token || process.env.ROLLBAR_ENABLED === "0") {
		_instance = noopSink;
		return _instance;
	}

	const rollbar = new Rollbar({
		accessToken: token,
		environment: process.env.NODE_ENV ?? "development",
		captureUncaught: true,
		captureUnhandledRejections: true,
		payload: {
			server: { root: process.cwd() },
		},
		scrubFields: ["password", "secret", "token", "access_token", "BhRestToken", "client_secret", "authorization"],
	});

	_instance = {
		critical: (message, custom) => rollbar.critical(message, custom),
		error: (message, custom) => rollbar.error(message, custom),
		warning: (message, custom) => rollbar.warning(message, custom),
		info: (message, custom) => rollbar.info(message, custom),
		wait: (cb) => rollbar.wait(cb ?? (() => {})),
	};
	return _instance;
}

/** Flush pending Rollbar items, e.g. before a one-shot process exits. */
export function flushRollbar(): Promise<void> {
	return new Promise((resolve) => getServerInstance().wait(() => resolve()));
}

/** Reset singleton (for testing). */
export function resetRollbar(): void {
	_instance = null;
}
