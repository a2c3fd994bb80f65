/**
 * Async mutex. Callers queue in arrival order; the critical section of one
 * caller finishes before the next begins.
 *
 *   await mutex.withLock(async () => { ... });
 */
export class Mutex {
	private queue: Array<() => void> = [];
	private locked = false;

	async acquire(): Promise<() => void> {
		if (!this.locked) {
			this.locked = true;
			return () => this.release();
		}

		return new Promise((resolve) => {
			this.queue.push(() => {
				resolve(() => this.release());
			});
		});
	}

	async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
		const release = await this.acquire();
		try {
			return await fn();
		} finally {
			release();
		}
	}

	private release(): void {
		const next = this.queue.shift();
		if (next) {
			next();
		} else {
			this.locked = false;
		}
	}
}
