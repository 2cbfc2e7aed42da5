/**
 * In-Memory Backend Implementation
 *
 * Keeps targets, artifacts and state in Maps. Nothing survives the process.
 * Used by tests and by `--storage in-memory`.
 *
 * @module storage/backend/in-memory
 */

import { logger } from '../../logger/index.js';
import { BACKEND_TYPES, ERROR_MESSAGES, LOG_PREFIXES } from '../constants.js';
import { applyTargetUpdate, assertKeepCount, compareNewestFirst, withTargetDefaults } from './shared.js';
import {
	StorageConflictError,
	StorageError,
	type CaptureStore,
	type CaptureTarget,
	type CaptureTargetUpdate,
	type CapturedArtifact,
	type NewArtifact,
	type NewCaptureTarget,
} from './types.js';

export class InMemoryCaptureStore implements CaptureStore {
	private targets = new Map<number, CaptureTarget>();
	private artifacts = new Map<number, CapturedArtifact[]>();
	private state = new Map<string, string>();

	private nextTargetId = 1;
	private nextArtifactId = 1;
	private connected = false;
	private readonly log = logger.createChild({ component: 'storage' });

	async connect(): Promise<void> {
		if (this.connected) {
			return;
		}
		this.connected = true;
		this.log.debug(`${LOG_PREFIXES.MEMORY} Connected`);
	}

	async disconnect(): Promise<void> {
		if (!this.connected) {
			return;
		}
		this.connected = false;
		this.targets.clear();
		this.artifacts.clear();
		this.state.clear();
		this.log.debug(`${LOG_PREFIXES.MEMORY} Disconnected, data cleared`);
	}

	isConnected(): boolean {
		return this.connected;
	}

	getBackendType(): string {
		return BACKEND_TYPES.IN_MEMORY;
	}

	// Targets

	async listTargets(): Promise<CaptureTarget[]> {
		this.checkConnection();
		return Array.from(this.targets.values())
			.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
			.map(target => ({ ...target }));
	}

	async getTarget(id: number): Promise<CaptureTarget | undefined> {
		this.checkConnection();
		const target = this.targets.get(id);
		return target ? { ...target } : undefined;
	}

	async getTargetByName(name: string): Promise<CaptureTarget | undefined> {
		this.checkConnection();
		for (const target of this.targets.values()) {
			if (target.name === name) {
				return { ...target };
			}
		}
		return undefined;
	}

	async createTarget(target: NewCaptureTarget): Promise<CaptureTarget> {
		this.checkConnection();

		if (await this.getTargetByName(target.name)) {
			throw new StorageConflictError(`${ERROR_MESSAGES.DUPLICATE_TARGET_NAME}: ${target.name}`, 'createTarget');
		}

		const now = new Date();
		const created: CaptureTarget = {
			id: this.nextTargetId++,
			...withTargetDefaults(target),
			createdAt: now,
			updatedAt: now,
		};

		this.targets.set(created.id, created);
		this.artifacts.set(created.id, []);
		return { ...created };
	}

	async updateTarget(id: number, update: CaptureTargetUpdate): Promise<CaptureTarget | undefined> {
		this.checkConnection();

		const existing = this.targets.get(id);
		if (!existing) {
			return undefined;
		}

		const updated = applyTargetUpdate(existing, update);
		this.targets.set(id, updated);
		return { ...updated };
	}

	async deleteTarget(id: number): Promise<boolean> {
		this.checkConnection();
		this.artifacts.delete(id);
		return this.targets.delete(id);
	}

	// Artifacts

	async saveArtifact(artifact: NewArtifact): Promise<number> {
		this.checkConnection();

		const list = this.artifacts.get(artifact.targetId);
		if (!list) {
			throw new StorageError(`Unknown capture target: ${artifact.targetId}`, 'saveArtifact');
		}

		const id = this.nextArtifactId++;
		list.push({
			id,
			targetId: artifact.targetId,
			imageData: artifact.imageData,
			mimeType: artifact.mimeType,
			sizeBytes: artifact.sizeBytes,
			capturedAt: artifact.capturedAt ?? new Date(),
		});
		return id;
	}

	async getLatestArtifact(targetId: number): Promise<CapturedArtifact | undefined> {
		const [latest] = await this.listArtifacts(targetId, 1);
		return latest;
	}

	async listArtifacts(targetId: number, limit?: number): Promise<CapturedArtifact[]> {
		this.checkConnection();
		const sorted = [...(this.artifacts.get(targetId) ?? [])].sort(compareNewestFirst);
		return (limit === undefined ? sorted : sorted.slice(0, limit)).map(artifact => ({ ...artifact }));
	}

	async countArtifacts(targetId: number): Promise<number> {
		this.checkConnection();
		return this.artifacts.get(targetId)?.length ?? 0;
	}

	async deleteOldest(targetId: number, keep: number): Promise<number> {
		this.checkConnection();
		assertKeepCount(keep);

		const list = this.artifacts.get(targetId);
		if (!list || list.length <= keep) {
			return 0;
		}

		const retained = [...list].sort(compareNewestFirst).slice(0, keep);
		this.artifacts.set(targetId, retained);
		return list.length - retained.length;
	}

	// State

	async getState(key: string): Promise<string | undefined> {
		this.checkConnection();
		return this.state.get(key);
	}

	async setState(key: string, value: string): Promise<void> {
		this.checkConnection();
		this.state.set(key, value);
	}

	private checkConnection(): void {
		if (!this.connected) {
			throw new StorageError(ERROR_MESSAGES.NOT_CONNECTED, 'connection');
		}
	}
}
