// ---------------------------------------------------------------------------
// Email Notification Service — Nodemailer
// Change summaries per cycle; failure alerts once a threshold is reached.
// ---------------------------------------------------------------------------

import type { AppConfig } from "@/lib/config";
import { logSyncError } from "@/lib/monitoring/sync-logger";
import type { Notifier, SyncEvent } from "@/lib/sync/collaborators";
import { errorMessage } from "@/lib/sync/errors";
import type { SyncCycleReport } from "@/lib/sync/types";
import nodemailer from "nodemailer";

/** The part of a nodemailer transporter the notifier uses. */
export interface MailTransport {
	sendMail(options: nodemailer.SendMailOptions): Promise<unknown>;
}

export interface EmailNotifierOptions {
	transport: MailTransport;
	from: string;
	to: string;
	/** Consecutive failed cycles before an alert goes out (default: 3) */
	failureThreshold?: number;
}

export class EmailNotifier implements Notifier {
	private readonly transport: MailTransport;
	private readonly from: string;
	private readonly to: string;
	private readonly failureThreshold: number;
	private failureCount = 0;

	constructor(options: EmailNotifierOptions) {
		this.transport = options.transport;
		this.from = options.from;
		this.to = options.to;
		this.failureThreshold = options.failureThreshold ?? 3;
	}

	getFailureCount(): number {
		return this.failureCount;
	}

	async notify(event: SyncEvent): Promise<void> {
		if (event.kind === "failure") {
			await this.notifyFailure(event.report);
			return;
		}

		this.failureCount = 0;
		if (!hasChanges(event.report)) return;
		await this.send(`Job feed updated (cycle ${event.report.cycleId})`, formatSummary(event.report), event.report);
	}

	private async notifyFailure(report: SyncCycleReport): Promise<void> {
		this.failureCount++;
		if (this.failureCount < this.failureThreshold) return;

		await this.send(`Job feed sync failed (cycle ${report.cycleId})`, formatFailure(report, this.failureCount), report);
		this.failureCount = 0;
	}

	private async send(subject: string, text: string, report: SyncCycleReport): Promise<void> {
		try {
			await this.transport.sendMail({ from: this.from, to: this.to, subject, text });
		} catch (err) {
			// failureCount stays raised so the next failed cycle tries again
			logSyncError(report.cycleId, `Notification mail not sent: ${errorMessage(err)}`, {
				entity: "notify",
				recipient: "[REDACTED]",
			});
			throw err;
		}
	}
}

function hasChanges(report: SyncCycleReport): boolean {
	const { inserted, updated, removed } = report.mutations;
	return inserted + updated + removed > 0;
}

export function formatSummary(report: SyncCycleReport): string {
	const summary = report.reconciliation?.summary;
	const lines = [
		`Sync cycle ${report.cycleId} completed at ${report.endTime ?? report.startTime}.`,
		"",
		`Jobs in source: ${summary?.currentCount ?? 0} (previously ${summary?.previousCount ?? 0})`,
		`Added: ${report.mutations.inserted}`,
		`Updated: ${report.mutations.updated}`,
		`Removed: ${report.mutations.removed}`,
	];
	if (report.mutations.reissued > 0) lines.push(`Reference codes reissued: ${report.mutations.reissued}`);
	if (report.mutations.failed > 0) lines.push(`Failed mutations: ${report.mutations.failed}`);

	const modified = Object.entries(report.reconciliation?.modified ?? {});
	if (modified.length > 0) {
		lines.push("", "Changed fields:");
		for (const [id, changes] of modified) {
			lines.push(`  ${id}: ${changes.map((c) => c.field).join(", ")}`);
		}
	}
	if (report.errors.length > 0) {
		lines.push("", `Warnings: ${report.errors.length}`);
	}
	return lines.join("\n");
}

export function formatFailure(report: SyncCycleReport, consecutiveFailures: number): string {
	const lines = [
		`Sync cycle ${report.cycleId} failed (${consecutiveFailures} consecutive failures).`,
		`Phases: ${report.phases.join(" → ")}`,
		"",
		"Errors:",
		...report.errors.map((e) => `  [${e.code}] ${e.entity}: ${e.message}`),
		"",
		`Timestamp: ${report.endTime ?? new Date().toISOString()}`,
	];
	return lines.join("\n");
}

/**
 * Build an EmailNotifier from config, or null when SMTP is not configured.
 */
export function createEmailNotifier(config: AppConfig): EmailNotifier | null {
	if (!config.SMTP_HOST || !config.SMTP_FROM || !config.NOTIFY_EMAIL_TO) return null;

	// secure: true for port 465 (SMTPS), otherwise from config
	const secure = config.SMTP_SECURE ?? config.SMTP_PORT === 465;
	const transport = nodemailer.createTransport({
		host: config.SMTP_HOST,
		port: config.SMTP_PORT,
		secure,
		auth: config.SMTP_USER ? { user: config.SMTP_USER, pass: config.SMTP_PASS } : undefined,
	});

	return new EmailNotifier({
		transport,
		from: config.SMTP_FROM,
		to: config.NOTIFY_EMAIL_TO,
		failureThreshold: config.NOTIFY_FAILURE_THRESHOLD,
	});
}
