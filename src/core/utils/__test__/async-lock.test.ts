import { describe, it, expect } from 'vitest';
import { AsyncLock } from '../async-lock.js';

describe('AsyncLock', () => {
	it('should run critical sections one at a time in arrival order', async () => {
		const lock = new AsyncLock();
		const order: string[] = [];
		let releaseFirst: () => void = () => {};
		const firstGate = new Promise<void>(resolve => {
			releaseFirst = resolve;
		});

		const first = lock.withLock(async () => {
			order.push('first:start');
			await firstGate;
			order.push('first:end');
		});
		const second = lock.withLock(async () => {
			order.push('second');
		});

		await Promise.resolve();
		expect(lock.isLocked()).toBe(true);
		expect(lock.getQueueLength()).toBe(1);

		releaseFirst();
		await Promise.all([first, second]);

		expect(order).toEqual(['first:start', 'first:end', 'second']);
		expect(lock.isLocked()).toBe(false);
	});

	it('should release the lock when the section throws', async () => {
		const lock = new AsyncLock();

		await expect(
			lock.withLock(async () => {
				throw new Error('boom');
			})
		).rejects.toThrow('boom');

		expect(lock.isLocked()).toBe(false);
		await expect(lock.withLock(() => 42)).resolves.toBe(42);
	});

	it('should refuse to release a lock that is not held', () => {
		const lock = new AsyncLock();
		expect(() => lock.release()).toThrow('Cannot release a lock that is not acquired');
	});
});
