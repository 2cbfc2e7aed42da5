/**
 * In-Memory Store Tests
 */

import { describe, it, expect } from 'vitest';
import { InMemoryCaptureStore } from '../in-memory.js';
import { BACKEND_TYPES } from '../../constants.js';
import { describeCaptureStoreContract } from './contract.js';

describeCaptureStoreContract('InMemoryCaptureStore', () => new InMemoryCaptureStore());

describe('InMemoryCaptureStore', () => {
	it('should return correct backend type', () => {
		expect(new InMemoryCaptureStore().getBackendType()).toBe(BACKEND_TYPES.IN_MEMORY);
	});

	it('should clear data on disconnect', async () => {
		const store = new InMemoryCaptureStore();
		await store.connect();
		await store.createTarget({ name: 'camera', sourceName: 'Camera' });
		await store.setState('key', 'value');

		await store.disconnect();
		await store.connect();

		await expect(store.listTargets()).resolves.toEqual([]);
		await expect(store.getState('key')).resolves.toBeUndefined();
	});

	it('should hand out copies of stored targets', async () => {
		const store = new InMemoryCaptureStore();
		await store.connect();
		const target = await store.createTarget({ name: 'camera', sourceName: 'Camera' });

		target.sourceName = 'Changed';

		await expect(store.getTarget(target.id)).resolves.toMatchObject({ sourceName: 'Camera' });
	});
});
