/**
 * SQLite Store Tests
 *
 * The shared contract runs against `:memory:` databases; the file-backed
 * cases use a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { SqliteCaptureStore } from '../sqlite.js';
import { StorageConnectionError } from '../types.js';
import { BACKEND_TYPES } from '../../constants.js';
import { describeCaptureStoreContract } from './contract.js';

describeCaptureStoreContract('SqliteCaptureStore', () => new SqliteCaptureStore({ type: 'sqlite', path: ':memory:' }));

describe('SqliteCaptureStore', () => {
	let testDir: string;

	beforeEach(() => {
		testDir = mkdtempSync(join(tmpdir(), 'scenewatch-sqlite-'));
	});

	afterEach(() => {
		rmSync(testDir, { recursive: true, force: true });
	});

	it('should return correct backend type', () => {
		const store = new SqliteCaptureStore({ type: 'sqlite', path: ':memory:' });
		expect(store.getBackendType()).toBe(BACKEND_TYPES.SQLITE);
	});

	it('should create the database inside a directory path', async () => {
		const store = new SqliteCaptureStore({ type: 'sqlite', path: `${join(testDir, 'data')}/` });

		await store.connect();
		await store.disconnect();

		expect(store.getDatabasePath()).toBe(join(testDir, 'data', 'scenewatch.db'));
		expect(existsSync(join(testDir, 'data', 'scenewatch.db'))).toBe(true);
	});

	it('should use the configured database name in an existing directory', async () => {
		const store = new SqliteCaptureStore({ type: 'sqlite', path: testDir, database: 'captures.db' });

		await store.connect();
		await store.disconnect();

		expect(store.getDatabasePath()).toBe(join(testDir, 'captures.db'));
	});

	it('should keep targets and artifacts across reconnects', async () => {
		const path = join(testDir, 'persist.sqlite');
		const first = new SqliteCaptureStore({ type: 'sqlite', path });
		await first.connect();
		const target = await first.createTarget({ name: 'camera', sourceName: 'Camera', imageFormat: 'jpeg' });
		await first.saveArtifact({ targetId: target.id, imageData: 'abc', mimeType: 'image/jpeg', sizeBytes: 2 });
		await first.setState('last_successful_connection', '2024-06-01T08:30:00.000Z');
		await first.disconnect();

		const second = new SqliteCaptureStore({ type: 'sqlite', path });
		await second.connect();

		await expect(second.getTargetByName('camera')).resolves.toMatchObject({
			id: target.id,
			imageFormat: 'jpeg',
		});
		await expect(second.countArtifacts(target.id)).resolves.toBe(1);
		await expect(second.getState('last_successful_connection')).resolves.toBe('2024-06-01T08:30:00.000Z');
		await second.disconnect();
	});

	it('should wrap open failures in StorageConnectionError', async () => {
		// a regular file where the parent directory should be
		const blocker = join(testDir, 'blocker.sqlite');
		const setup = new SqliteCaptureStore({ type: 'sqlite', path: blocker });
		await setup.connect();
		await setup.disconnect();

		const store = new SqliteCaptureStore({ type: 'sqlite', path: join(blocker, 'nested.db') });

		await expect(store.connect()).rejects.toThrow(StorageConnectionError);
		expect(store.isConnected()).toBe(false);
	});
});
