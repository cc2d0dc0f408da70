// ---------------------------------------------------------------------------
// Reference Code Registry
// Durable externalId → reference code map. Codes survive feed regeneration;
// an id only gets a new code on explicit reissue.
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { RegistryLoadError, errorMessage } from "@/lib/sync/errors";
import { RegistryFileSchema } from "@/lib/sync/schemas";

export const CODE_LENGTH = 10;
export const CODE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
export const MAX_GENERATION_ATTEMPTS = 1000;

export interface IdentifierRegistryOptions {
	filePath: string;
	/** Uniform in [0, 1), replaceable for deterministic tests */
	random?: () => number;
	/** Epoch milliseconds, used by the collision fallback */
	now?: () => number;
}

export class IdentifierRegistry {
	private readonly filePath: string;
	private readonly random: () => number;
	private readonly now: () => number;

	private codes = new Map<string, string>();
	/** Every code issued or loaded during this instance's lifetime, including discarded ones */
	private issued = new Set<string>();

	constructor(options: IdentifierRegistryOptions) {
		this.filePath = options.filePath;
		this.random = options.random ?? Math.random;
		this.now = options.now ?? Date.now;
	}

	get size(): number {
		return this.codes.size;
	}

	lookup(externalId: string): string | undefined {
		return this.codes.get(externalId);
	}

	/**
	 * Issue a fresh code for `externalId`, replacing any existing one.
	 * Callers that want to keep a stable code must `lookup` first.
	 */
	assign(externalId: string): string {
		const code = this.generateCode();
		this.codes.set(externalId, code);
		this.issued.add(code);
		return code;
	}

	/** Record a code that already exists elsewhere (e.g. in the feed) for `externalId`. */
	adopt(externalId: string, code: string): void {
		this.codes.set(externalId, code);
		this.issued.add(code);
	}

	/** Permanently forget `externalId`. Its code is never reissued by this instance. */
	retire(externalId: string): boolean {
		return this.codes.delete(externalId);
	}

	entries(): Array<[string, string]> {
		return [...this.codes.entries()];
	}

	/**
	 * Replace the in-memory map with the file's contents.
	 * A missing file yields an empty registry; anything unreadable throws RegistryLoadError.
	 */
	async load(): Promise<void> {
		let content: string;
		try {
			content = await fs.readFile(this.filePath, "utf-8");
		} catch (err) {
			if (isNotFound(err)) {
				this.codes = new Map();
				return;
			}
			throw new RegistryLoadError(this.filePath, errorMessage(err));
		}

		let json: unknown;
		try {
			json = JSON.parse(content);
		} catch (err) {
			throw new RegistryLoadError(this.filePath, errorMessage(err));
		}

		const parsed = RegistryFileSchema.safeParse(json);
		if (!parsed.success) {
			throw new RegistryLoadError(this.filePath, parsed.error.issues.map((i) => i.message).join(", "));
		}

		this.codes = new Map(Object.entries(parsed.data));
		for (const code of this.codes.values()) this.issued.add(code);
	}

	/** Write the whole map atomically (tmp + rename) with sorted keys. */
	async persist(): Promise<void> {
		await fs.mkdir(path.dirname(this.filePath), { recursive: true });

		const sorted: Record<string, string> = {};
		for (const [id, code] of [...this.codes.entries()].sort(([a], [b]) => a.localeCompare(b))) {
			sorted[id] = code;
		}

		const tmpPath = `${this.filePath}.tmp`;
		await fs.writeFile(tmpPath, `${JSON.stringify(sorted, null, 2)}\n`, "utf-8");
		await fs.rename(tmpPath, this.filePath);
	}

	private generateCode(): string {
		for (let attempt = 0; attempt < MAX_GENERATION_ATTEMPTS; attempt++) {
			const candidate = this.randomChars(CODE_LENGTH);
			if (!this.issued.has(candidate)) return candidate;
		}
		// Collision budget spent: 6 random chars + last 4 digits of the Unix time
		const suffix = String(Math.floor(this.now() / 1000)).slice(-4).padStart(4, "0");
		return `${this.randomChars(CODE_LENGTH - 4)}${suffix}`;
	}

	private randomChars(length: number): string {
		let out = "";
		for (let i = 0; i < length; i++) {
			out += CODE_ALPHABET[Math.floor(this.random() * CODE_ALPHABET.length) % CODE_ALPHABET.length];
		}
		return out;
	}
}

function isNotFound(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "ENOENT";
}
