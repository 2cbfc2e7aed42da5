/**
 * Behaviour every CaptureStore backend must share. Each backend's test file
 * runs this suite against a fresh store.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StorageConflictError, StorageError, type CaptureStore, type CaptureTarget } from '../types.js';

const BASE_TIME = Date.UTC(2024, 5, 1, 8, 30, 0);

export function describeCaptureStoreContract(name: string, createStore: () => CaptureStore): void {
	describe(`${name} (CaptureStore contract)`, () => {
		let store: CaptureStore;

		const capture = (targetId: number, secondsAfterBase: number) =>
			store.saveArtifact({
				targetId,
				imageData: `frame-${secondsAfterBase}`,
				mimeType: 'image/png',
				sizeBytes: 7,
				capturedAt: new Date(BASE_TIME + secondsAfterBase * 1000),
			});

		const createCamera = (): Promise<CaptureTarget> =>
			store.createTarget({ name: 'camera', sourceName: 'Camera', cadenceMs: 1000 });

		beforeEach(async () => {
			store = createStore();
			await store.connect();
		});

		afterEach(async () => {
			await store.disconnect();
		});

		describe('Connection Management', () => {
			it('should report its connection state', async () => {
				expect(store.isConnected()).toBe(true);
				await store.connect();
				expect(store.isConnected()).toBe(true);

				await store.disconnect();
				expect(store.isConnected()).toBe(false);
			});

			it('should reject operations while disconnected', async () => {
				await store.disconnect();

				await expect(store.listTargets()).rejects.toThrow(StorageError);
				await expect(store.getState('key')).rejects.toThrow('Capture store is not connected');
			});
		});

		describe('Targets', () => {
			it('should create a target with defaults filled in', async () => {
				const target = await store.createTarget({ name: 'webcam', sourceName: 'Webcam' });

				expect(target).toMatchObject({
					name: 'webcam',
					sourceName: 'Webcam',
					cadenceMs: 5000,
					imageFormat: 'png',
					imageWidth: 0,
					imageHeight: 0,
					quality: 80,
					enabled: true,
				});
				expect(target.id).toBeGreaterThan(0);
				expect(target.createdAt).toBeInstanceOf(Date);
				await expect(store.getTarget(target.id)).resolves.toEqual(target);
				await expect(store.getTargetByName('webcam')).resolves.toEqual(target);
			});

			it('should keep explicit settings', async () => {
				const target = await store.createTarget({
					name: 'slides',
					sourceName: 'Slides',
					cadenceMs: 250,
					imageFormat: 'webp',
					imageWidth: 1280,
					imageHeight: 720,
					quality: 60,
					enabled: false,
				});

				await expect(store.getTarget(target.id)).resolves.toMatchObject({
					cadenceMs: 250,
					imageFormat: 'webp',
					imageWidth: 1280,
					imageHeight: 720,
					quality: 60,
					enabled: false,
				});
			});

			it('should reject a duplicate name', async () => {
				await createCamera();

				const error = await createCamera().catch((caught: unknown) => caught);

				expect(error).toBeInstanceOf(StorageConflictError);
				expect(error).toMatchObject({ code: 'STORAGE_CONFLICT', operation: 'createTarget' });
			});

			it('should return undefined for unknown targets', async () => {
				await expect(store.getTarget(404)).resolves.toBeUndefined();
				await expect(store.getTargetByName('missing')).resolves.toBeUndefined();
				await expect(store.updateTarget(404, { cadenceMs: 10 })).resolves.toBeUndefined();
			});

			it('should list the newest target first', async () => {
				await store.createTarget({ name: 'first', sourceName: 'A' });
				await store.createTarget({ name: 'second', sourceName: 'B' });

				const targets = await store.listTargets();

				expect(targets.map(target => target.name)).toEqual(['second', 'first']);
			});

			it('should merge updates and leave other fields alone', async () => {
				const target = await createCamera();

				const updated = await store.updateTarget(target.id, { cadenceMs: 2000, enabled: false });

				expect(updated).toMatchObject({ name: 'camera', sourceName: 'Camera', cadenceMs: 2000, enabled: false });
				await expect(store.getTarget(target.id)).resolves.toMatchObject({ cadenceMs: 2000, enabled: false });
			});

			it('should delete a target together with its artifacts', async () => {
				const target = await createCamera();
				await capture(target.id, 0);

				await expect(store.deleteTarget(target.id)).resolves.toBe(true);
				await expect(store.deleteTarget(target.id)).resolves.toBe(false);

				expect(await store.getTarget(target.id)).toBeUndefined();
				expect(await store.countArtifacts(target.id)).toBe(0);
			});
		});

		describe('Artifacts', () => {
			it('should list artifacts newest first by capture time', async () => {
				const target = await createCamera();
				await capture(target.id, 20);
				await capture(target.id, 10);
				await capture(target.id, 30);

				const artifacts = await store.listArtifacts(target.id);

				expect(artifacts.map(artifact => artifact.imageData)).toEqual(['frame-30', 'frame-20', 'frame-10']);
				expect(artifacts[0]).toMatchObject({ targetId: target.id, mimeType: 'image/png', sizeBytes: 7 });
				expect(artifacts[0].capturedAt).toEqual(new Date(BASE_TIME + 30_000));
			});

			it('should order same-millisecond captures by insertion, latest first', async () => {
				const target = await createCamera();
				const first = await capture(target.id, 5);
				const second = await capture(target.id, 5);

				const artifacts = await store.listArtifacts(target.id);

				expect(second).toBeGreaterThan(first);
				expect(artifacts.map(artifact => artifact.id)).toEqual([second, first]);
			});

			it('should honour the list limit', async () => {
				const target = await createCamera();
				for (let i = 0; i < 4; i++) {
					await capture(target.id, i);
				}

				const artifacts = await store.listArtifacts(target.id, 2);

				expect(artifacts.map(artifact => artifact.imageData)).toEqual(['frame-3', 'frame-2']);
			});

			it('should return the latest artifact', async () => {
				const target = await createCamera();
				await expect(store.getLatestArtifact(target.id)).resolves.toBeUndefined();

				await capture(target.id, 1);
				await capture(target.id, 2);

				await expect(store.getLatestArtifact(target.id)).resolves.toMatchObject({ imageData: 'frame-2' });
			});

			it('should refuse artifacts for unknown targets', async () => {
				await expect(capture(404, 0)).rejects.toThrow(StorageError);
			});

			it('should delete all but the newest artifacts', async () => {
				const target = await createCamera();
				for (const offset of [3, 14, 0, 9, 6, 12, 1, 10, 4, 13, 7, 2, 11, 5, 8]) {
					await capture(target.id, offset);
				}

				await expect(store.deleteOldest(target.id, 10)).resolves.toBe(5);

				const remaining = await store.listArtifacts(target.id);
				expect(remaining.map(artifact => artifact.imageData)).toEqual([
					'frame-14',
					'frame-13',
					'frame-12',
					'frame-11',
					'frame-10',
					'frame-9',
					'frame-8',
					'frame-7',
					'frame-6',
					'frame-5',
				]);
			});

			it('should leave short histories untouched', async () => {
				const target = await createCamera();
				await capture(target.id, 0);

				await expect(store.deleteOldest(target.id, 10)).resolves.toBe(0);
				await expect(store.deleteOldest(404, 10)).resolves.toBe(0);
				expect(await store.countArtifacts(target.id)).toBe(1);
			});

			it('should allow trimming to zero and reject negative counts', async () => {
				const target = await createCamera();
				await capture(target.id, 0);
				await capture(target.id, 1);

				await expect(store.deleteOldest(target.id, -1)).rejects.toThrow(RangeError);
				await expect(store.deleteOldest(target.id, 0)).resolves.toBe(2);
				expect(await store.countArtifacts(target.id)).toBe(0);
			});
		});

		describe('State', () => {
			it('should store and overwrite values', async () => {
				await expect(store.getState('last_successful_connection')).resolves.toBeUndefined();

				await store.setState('last_successful_connection', '2024-06-01T08:30:00.000Z');
				await store.setState('last_successful_connection', '2024-06-01T09:00:00.000Z');

				await expect(store.getState('last_successful_connection')).resolves.toBe('2024-06-01T09:00:00.000Z');
			});
		});
	});
}
