/**
 * Storage Backend Types
 *
 * The persistence contract for capture targets, captured artifacts and
 * small pieces of application state, plus the errors backends throw.
 *
 * @module storage/backend/types
 */

import { ScenewatchError, type ErrorCode } from '../../errors.js';
import type { ImageFormat } from '../../remote/types.js';

/**
 * A registered periodic capture job
 */
export interface CaptureTarget {
	id: number;
	/** Unique display name */
	name: string;
	/** OBS scene or source to capture */
	sourceName: string;
	cadenceMs: number;
	imageFormat: ImageFormat;
	/** 0 = original size */
	imageWidth: number;
	imageHeight: number;
	/** Compression hint, 0-100 */
	quality: number;
	enabled: boolean;
	createdAt: Date;
	updatedAt: Date;
}

export interface NewCaptureTarget {
	name: string;
	sourceName: string;
	cadenceMs?: number;
	imageFormat?: ImageFormat;
	imageWidth?: number;
	imageHeight?: number;
	quality?: number;
	enabled?: boolean;
}

export type CaptureTargetUpdate = Partial<
	Pick<CaptureTarget, 'sourceName' | 'cadenceMs' | 'imageFormat' | 'imageWidth' | 'imageHeight' | 'quality' | 'enabled'>
>;

/**
 * One stored screenshot
 */
export interface CapturedArtifact {
	id: number;
	targetId: number;
	/** Base64 payload, no data-URI prefix */
	imageData: string;
	mimeType: string;
	sizeBytes: number;
	capturedAt: Date;
}

export interface NewArtifact {
	targetId: number;
	imageData: string;
	mimeType: string;
	sizeBytes: number;
	/** Defaults to now */
	capturedAt?: Date;
}

/**
 * Persistence for the capture subsystem.
 *
 * Artifacts are ordered newest first by `capturedAt`; artifacts captured in
 * the same millisecond are ordered by insertion, later first.
 */
export interface CaptureStore {
	connect(): Promise<void>;
	disconnect(): Promise<void>;
	isConnected(): boolean;
	getBackendType(): string;

	listTargets(): Promise<CaptureTarget[]>;
	getTarget(id: number): Promise<CaptureTarget | undefined>;
	getTargetByName(name: string): Promise<CaptureTarget | undefined>;
	/**
	 * @throws {StorageConflictError} when the name is taken
	 */
	createTarget(target: NewCaptureTarget): Promise<CaptureTarget>;
	/**
	 * @returns the updated target, or undefined if there is no such target
	 */
	updateTarget(id: number, update: CaptureTargetUpdate): Promise<CaptureTarget | undefined>;
	/**
	 * Remove the target and all of its artifacts
	 *
	 * @returns whether a target was removed
	 */
	deleteTarget(id: number): Promise<boolean>;

	saveArtifact(artifact: NewArtifact): Promise<number>;
	getLatestArtifact(targetId: number): Promise<CapturedArtifact | undefined>;
	listArtifacts(targetId: number, limit?: number): Promise<CapturedArtifact[]>;
	countArtifacts(targetId: number): Promise<number>;
	/**
	 * Delete all but the `keep` newest artifacts of a target
	 *
	 * @returns number of artifacts deleted
	 */
	deleteOldest(targetId: number, keep: number): Promise<number>;

	getState(key: string): Promise<string | undefined>;
	setState(key: string, value: string): Promise<void>;
}

/**
 * Storage Error
 *
 * Base class for backend failures. Carries the operation that failed.
 */
export class StorageError extends ScenewatchError {
	constructor(
		message: string,
		/** The operation that failed (e.g., 'saveArtifact', 'connection') */
		public readonly operation: string,
		cause?: unknown,
		code: ErrorCode = 'STORAGE_ERROR'
	) {
		super(message, code, true, cause);
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), operation: this.operation };
	}
}

/**
 * Thrown when a backend fails to open
 */
export class StorageConnectionError extends StorageError {
	constructor(
		message: string,
		/** The type of backend that failed to connect */
		public readonly backendType: string,
		cause?: unknown
	) {
		super(message, 'connection', cause, 'STORAGE_CONNECTION');
	}
}

/**
 * Thrown when a write would break a uniqueness rule
 */
export class StorageConflictError extends StorageError {
	constructor(message: string, operation: string) {
		super(message, operation, undefined, 'STORAGE_CONFLICT');
	}
}
