/**
 * Storage Factory
 *
 * Builds and connects the capture store selected by configuration.
 *
 * @module storage/factory
 */

import { logger } from '../logger/index.js';
import { describeError } from '../errors.js';
import { StoreConfigSchema, type StoreConfig } from './config.js';
import { LOG_PREFIXES } from './constants.js';
import { InMemoryCaptureStore } from './backend/in-memory.js';
import { SqliteCaptureStore } from './backend/sqlite.js';
import type { CaptureStore } from './backend/types.js';

/**
 * Create a store for `config` without connecting it
 */
export function createCaptureStore(config: StoreConfig): CaptureStore {
	const validated = StoreConfigSchema.parse(config);

	switch (validated.type) {
		case 'in-memory':
			return new InMemoryCaptureStore();
		case 'sqlite':
			return new SqliteCaptureStore(validated);
	}
}

/**
 * Create and connect a store
 *
 * @throws {StorageConnectionError} If the backend cannot be opened
 *
 * @example
 * ```typescript
 * const store = await connectCaptureStore({ type: 'sqlite', path: './data/scenewatch.db' });
 * const targets = await store.listTargets();
 * await store.disconnect();
 * ```
 */
export async function connectCaptureStore(config: StoreConfig): Promise<CaptureStore> {
	const store = createCaptureStore(config);

	logger.debug(`${LOG_PREFIXES.FACTORY} Creating capture store`, { type: config.type });

	try {
		await store.connect();
	} catch (error) {
		logger.error(`${LOG_PREFIXES.FACTORY} Failed to create capture store`, {
			type: config.type,
			error: describeError(error),
		});
		throw error;
	}

	logger.info(`${LOG_PREFIXES.FACTORY} Capture store ready`, { type: store.getBackendType() });
	return store;
}
