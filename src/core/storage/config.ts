/**
 * Storage Configuration Module
 *
 * Zod schemas for the capture store backends.
 *
 * Supported backends:
 * - In-Memory: nothing survives a restart; for tests and dry runs
 * - SQLite: single-file database, the default
 *
 * @module storage/config
 */

import { z } from 'zod';
import { RETENTION_DEFAULTS } from './constants.js';

/**
 * In-Memory Backend Configuration
 *
 * @example
 * ```typescript
 * const config: InMemoryBackendConfig = { type: 'in-memory' };
 * ```
 */
const InMemoryBackendSchema = z
	.object({
		type: z.literal('in-memory'),
	})
	.strict();

export type InMemoryBackendConfig = z.infer<typeof InMemoryBackendSchema>;

/**
 * SQLite Backend Configuration
 *
 * `path` may name a database file, an existing directory (the database is
 * created inside it as `database`), or `:memory:`.
 *
 * @example
 * ```typescript
 * const config: SqliteBackendConfig = {
 *   type: 'sqlite',
 *   path: './data/scenewatch.db',
 * };
 * ```
 */
const SqliteBackendSchema = z
	.object({
		type: z.literal('sqlite'),

		path: z.string().min(1).describe('SQLite database file, directory, or :memory:'),

		/** Database filename used when `path` is a directory (default: scenewatch.db) */
		database: z.string().optional().describe('Database filename (default: scenewatch.db)'),
	})
	.strict();

export type SqliteBackendConfig = z.infer<typeof SqliteBackendSchema>;

export const StoreConfigSchema = z
	.discriminatedUnion('type', [InMemoryBackendSchema, SqliteBackendSchema], {
		errorMap: (issue, ctx) => {
			if (issue.code === z.ZodIssueCode.invalid_union_discriminator) {
				return { message: `Invalid backend type. Expected 'in-memory' or 'sqlite'.` };
			}
			return { message: ctx.defaultError };
		},
	})
	.describe('Backend configuration for the capture store');

export type StoreConfig = z.infer<typeof StoreConfigSchema>;

/**
 * Retention policy applied by the sweeper
 */
export const RetentionConfigSchema = z.object({
	maxHistoryPerTarget: z.number().int().positive().default(RETENTION_DEFAULTS.MAX_HISTORY_PER_TARGET),
	sweepIntervalMs: z.number().int().positive().default(RETENTION_DEFAULTS.SWEEP_INTERVAL_MS),
});

export type RetentionConfig = z.infer<typeof RetentionConfigSchema>;
