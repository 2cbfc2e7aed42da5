/**
 * Storage Module Public API
 *
 * Capture targets, captured artifacts and application state behind one
 * `CaptureStore` contract, with SQLite and in-memory backends.
 *
 * @module storage
 */

// Backends
export { SqliteCaptureStore } from './backend/sqlite.js';
export { InMemoryCaptureStore } from './backend/in-memory.js';

// Factory
export { createCaptureStore, connectCaptureStore } from './factory.js';

// Configuration
export { StoreConfigSchema, RetentionConfigSchema } from './config.js';

// Errors
export { StorageError, StorageConnectionError, StorageConflictError } from './backend/types.js';

// Constants
export {
	BACKEND_TYPES,
	ERROR_MESSAGES,
	RETENTION_DEFAULTS,
	STATE_KEYS,
	TARGET_DEFAULTS,
} from './constants.js';

export type * from './types.js';
