/**
 * Storage Module Constants
 *
 * @module storage/constants
 */

/**
 * Log prefixes for consistent logging across the storage module
 */
export const LOG_PREFIXES = {
	FACTORY: '[StorageFactory]',
	SQLITE: '[SqliteStore]',
	MEMORY: '[InMemoryStore]',
} as const;

/**
 * Error messages for the storage module
 */
export const ERROR_MESSAGES = {
	NOT_CONNECTED: 'Capture store is not connected',
	CONNECTION_FAILED: 'Failed to connect to capture store',
	INVALID_BACKEND_TYPE: 'Invalid backend type specified',
	DUPLICATE_TARGET_NAME: 'A capture target with this name already exists',
	INVALID_ROW: 'Stored row failed validation',
} as const;

/**
 * Backend type identifiers
 */
export const BACKEND_TYPES = {
	IN_MEMORY: 'in-memory',
	SQLITE: 'sqlite',
} as const;

/**
 * Values applied to new capture targets when the caller leaves them out
 */
export const TARGET_DEFAULTS = {
	CADENCE_MS: 5000,
	IMAGE_FORMAT: 'png',
	QUALITY: 80,
} as const;

/**
 * Keys of the application state table
 */
export const STATE_KEYS = {
	LAST_SUCCESSFUL_CONNECTION: 'last_successful_connection',
} as const;

export const DEFAULT_DATABASE_NAME = 'scenewatch.db';

/**
 * Retention policy defaults
 */
export const RETENTION_DEFAULTS = {
	MAX_HISTORY_PER_TARGET: 10,
	SWEEP_INTERVAL_MS: 60000, // 1 minute
} as const;
