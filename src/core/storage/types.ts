/**
 * Storage Module Public Types
 *
 * @module storage
 */

export type {
	CaptureStore,
	CaptureTarget,
	CaptureTargetUpdate,
	CapturedArtifact,
	NewArtifact,
	NewCaptureTarget,
} from './backend/types.js';

export type { StoreConfig, InMemoryBackendConfig, SqliteBackendConfig, RetentionConfig } from './config.js';
