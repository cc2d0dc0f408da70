// ---------------------------------------------------------------------------
// Sync Logging — Rollbar Integration
// Structured log entries for sync cycles, keyed by cycle and record.
// ---------------------------------------------------------------------------

import { getServerInstance } from "@/lib/monitoring/rollbar";

export interface SyncLogContext {
	/** Tearsheet id, or a pipeline stage such as "feed" / "registry" */
	entity?: string;
	externalId?: string;
	[key: string]: unknown;
}

function syncContext(cycleId: string, context: SyncLogContext = {}): Record<string, unknown> {
	return {
		cycleId,
		...context,
		timestamp: new Date().toISOString(),
	};
}

export function logSyncInfo(cycleId: string, message: string, context?: SyncLogContext): void {
	getServerInstance().info(`Sync: ${message}`, syncContext(cycleId, context));
}

export function logSyncWarning(cycleId: string, message: string, context?: SyncLogContext): void {
	getServerInstance().warning(`Sync warning: ${message}`, syncContext(cycleId, context));
}

export function logSyncError(cycleId: string, message: string, context?: SyncLogContext): void {
	getServerInstance().error(`Sync error: ${message}`, syncContext(cycleId, context));
}

export function logSyncCritical(cycleId: string, message: string): void {
	getServerInstance().critical(`Sync critical: ${message}`, syncContext(cycleId));
}
