/**
 * AsyncLock - Promise-based mutual exclusion
 *
 * Serializes async critical sections. Guards the connection state record
 * and the capture registry's worker map; the two locks are never nested.
 */

export class AsyncLock {
	private queue: Array<() => void> = [];
	private locked = false;

	/**
	 * Acquire the lock, waiting behind earlier callers
	 */
	async acquire(): Promise<void> {
		return new Promise<void>(resolve => {
			if (!this.locked) {
				this.locked = true;
				resolve();
			} else {
				this.queue.push(resolve);
			}
		});
	}

	/**
	 * Release the lock, handing it straight to the next waiter if there is one
	 */
	release(): void {
		if (!this.locked) {
			throw new Error('Cannot release a lock that is not acquired');
		}

		const next = this.queue.shift();
		if (next) {
			next();
		} else {
			this.locked = false;
		}
	}

	/**
	 * Run `fn` while holding the lock. The lock is released even if `fn` throws.
	 */
	async withLock<T>(fn: () => Promise<T> | T): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}

	isLocked(): boolean {
		return this.locked;
	}

	getQueueLength(): number {
		return this.queue.length;
	}
}
