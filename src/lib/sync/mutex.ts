// ---------------------------------------------------------------------------
// Async Mutex
// FIFO in-process lock with a bounded wait; serializes feed mutations.
// ---------------------------------------------------------------------------

import { LockTimeoutError } from "./errors";

interface Waiter {
	grant: () => void;
	timer: NodeJS.Timeout;
}

export class AsyncMutex {
	private locked = false;
	private queue: Waiter[] = [];

	constructor(private readonly timeoutMs: number = 5_000) {}

	get isLocked(): boolean {
		return this.locked;
	}

	/** Resolves once the lock is held; rejects with LockTimeoutError after `timeoutMs`. */
	async acquire(): Promise<void> {
		if (!this.locked) {
			this.locked = true;
			return;
		}

		return new Promise((resolve, reject) => {
			const waiter: Waiter = {
				grant: () => {
					clearTimeout(waiter.timer);
					this.locked = true;
					resolve();
				},
				timer: setTimeout(() => {
					this.queue = this.queue.filter((w) => w !== waiter);
					reject(new LockTimeoutError(this.timeoutMs));
				}, this.timeoutMs),
			};
			this.queue.push(waiter);
		});
	}

	release(): void {
		const next = this.queue.shift();
		if (next) {
			next.grant();
		} else {
			this.locked = false;
		}
	}

	async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}
}
