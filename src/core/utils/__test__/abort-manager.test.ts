import { describe, it, expect, vi } from 'vitest';
import { AbortManager } from '../abort-manager.js';

describe('AbortManager', () => {
	it('should abort with a reason and only once', () => {
		const manager = new AbortManager();
		const cleanup = vi.fn();
		manager.addCleanup(cleanup);

		manager.abort('first');
		manager.abort('second');

		expect(manager.aborted).toBe(true);
		expect(manager.reason).toBe('first');
		expect(manager.signal.aborted).toBe(true);
		expect(cleanup).toHaveBeenCalledTimes(1);
	});

	it('should abort children with their parent', () => {
		const parent = new AbortManager();
		const child = parent.createChild();
		const grandchild = child.createChild();

		expect(parent.getChildCount()).toBe(1);
		parent.abort('shutdown');

		expect(child.aborted).toBe(true);
		expect(grandchild.aborted).toBe(true);
		expect(child.reason).toBe('shutdown');
		expect(parent.getChildCount()).toBe(0);
	});

	it('should leave the parent running when a child aborts', () => {
		const parent = new AbortManager();
		const child = parent.createChild();

		child.abort('worker stopped');

		expect(parent.aborted).toBe(false);
		expect(parent.getChildCount()).toBe(0);
	});

	it('should follow an external parent signal', () => {
		const controller = new AbortController();
		const manager = new AbortManager({ parentSignal: controller.signal });

		controller.abort('external');

		expect(manager.aborted).toBe(true);
		expect(manager.reason).toBe('external');
	});

	it('should start aborted when the parent signal already is', () => {
		const controller = new AbortController();
		controller.abort('gone');

		const manager = new AbortManager({ parentSignal: controller.signal });

		expect(manager.aborted).toBe(true);
		expect(manager.reason).toBe('gone');
	});

	it('should run cleanups registered after abort immediately', () => {
		const manager = new AbortManager();
		manager.abort();
		const cleanup = vi.fn();

		manager.addCleanup(cleanup);

		expect(cleanup).toHaveBeenCalledTimes(1);
	});

	it('should not run an unregistered cleanup', () => {
		const manager = new AbortManager();
		const cleanup = vi.fn();
		const unregister = manager.addCleanup(cleanup);

		unregister();
		manager.abort();

		expect(cleanup).not.toHaveBeenCalled();
	});

	it('should keep running cleanups after one throws', () => {
		const manager = new AbortManager();
		const after = vi.fn();
		manager.addCleanup(() => {
			throw new Error('cleanup failed');
		});
		manager.addCleanup(after);

		expect(() => manager.abort()).not.toThrow();
		expect(after).toHaveBeenCalledTimes(1);
	});
});
