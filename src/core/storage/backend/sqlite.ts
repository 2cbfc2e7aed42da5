/**
 * SQLite Backend Implementation
 *
 * Persistent capture store on better-sqlite3. Timestamps are stored as epoch
 * milliseconds so that artifact ordering never depends on second-granularity
 * clocks.
 *
 * @module storage/backend/sqlite
 */

import Database from 'better-sqlite3';
import { mkdir } from 'fs/promises';
import { existsSync, statSync } from 'fs';
import { dirname, join, resolve } from 'path';
import type { SqliteBackendConfig } from '../config.js';
import { BACKEND_TYPES, DEFAULT_DATABASE_NAME, ERROR_MESSAGES, LOG_PREFIXES } from '../constants.js';
import { logger } from '../../logger/index.js';
import { describeError } from '../../errors.js';
import { isImageFormat } from '../../remote/types.js';
import { applyTargetUpdate, assertKeepCount, withTargetDefaults } from './shared.js';
import {
	StorageConflictError,
	StorageConnectionError,
	StorageError,
	type CaptureStore,
	type CaptureTarget,
	type CaptureTargetUpdate,
	type CapturedArtifact,
	type NewArtifact,
	type NewCaptureTarget,
} from './types.js';

interface TargetRow {
	id: number;
	name: string;
	source_name: string;
	cadence_ms: number;
	image_format: string;
	image_width: number;
	image_height: number;
	quality: number;
	enabled: number;
	created_at: number;
	updated_at: number;
}

interface ArtifactRow {
	id: number;
	target_id: number;
	image_data: string;
	mime_type: string;
	size_bytes: number;
	captured_at: number;
}

const TARGET_COLUMNS =
	'id, name, source_name, cadence_ms, image_format, image_width, image_height, quality, enabled, created_at, updated_at';
const ARTIFACT_COLUMNS = 'id, target_id, image_data, mime_type, size_bytes, captured_at';
const NEWEST_FIRST = 'ORDER BY captured_at DESC, id DESC';
const DB_EXTENSION = /\.(db|sqlite|sqlite3)$/i;

/**
 * SQLite Capture Store
 *
 * @example
 * ```typescript
 * const store = new SqliteCaptureStore({ type: 'sqlite', path: './data/scenewatch.db' });
 * await store.connect();
 * const target = await store.createTarget({ name: 'main', sourceName: 'Scene 1' });
 * ```
 */
export class SqliteCaptureStore implements CaptureStore {
	private readonly log = logger.createChild({ component: 'storage' });
	private db: Database.Database | undefined;
	private statements: Statements | undefined;
	private dbPath = '';

	constructor(private readonly config: SqliteBackendConfig) {}

	async connect(): Promise<void> {
		if (this.db) {
			return;
		}

		try {
			this.dbPath = this.resolvePath();

			if (this.dbPath !== ':memory:') {
				const dir = dirname(this.dbPath);
				if (!existsSync(dir)) {
					await mkdir(dir, { recursive: true });
					this.log.debug(`${LOG_PREFIXES.SQLITE} Created database directory`, { dir });
				}
			}

			const db = new Database(this.dbPath);
			db.pragma('journal_mode = WAL');
			db.pragma('synchronous = NORMAL');
			db.pragma('foreign_keys = ON');

			this.createTables(db);
			this.statements = prepareStatements(db);
			this.db = db;

			this.log.info(`${LOG_PREFIXES.SQLITE} Connected`, { path: this.dbPath });
		} catch (error) {
			this.log.error(`${LOG_PREFIXES.SQLITE} ${ERROR_MESSAGES.CONNECTION_FAILED}`, {
				path: this.dbPath,
				error: describeError(error),
			});
			throw new StorageConnectionError(
				`${ERROR_MESSAGES.CONNECTION_FAILED}: ${describeError(error)}`,
				BACKEND_TYPES.SQLITE,
				error
			);
		}
	}

	async disconnect(): Promise<void> {
		if (!this.db) {
			return;
		}

		const db = this.db;
		this.db = undefined;
		this.statements = undefined;
		db.close();
		this.log.info(`${LOG_PREFIXES.SQLITE} Disconnected`);
	}

	isConnected(): boolean {
		return this.db !== undefined;
	}

	getBackendType(): string {
		return BACKEND_TYPES.SQLITE;
	}

	getDatabasePath(): string {
		return this.dbPath;
	}

	// Targets

	async listTargets(): Promise<CaptureTarget[]> {
		return this.run('listTargets', s => s.listTargets.all().map(toTarget));
	}

	async getTarget(id: number): Promise<CaptureTarget | undefined> {
		return this.run('getTarget', s => {
			const row = s.getTarget.get(id);
			return row ? toTarget(row) : undefined;
		});
	}

	async getTargetByName(name: string): Promise<CaptureTarget | undefined> {
		return this.run('getTargetByName', s => {
			const row = s.getTargetByName.get(name);
			return row ? toTarget(row) : undefined;
		});
	}

	async createTarget(target: NewCaptureTarget): Promise<CaptureTarget> {
		const resolved = withTargetDefaults(target);
		const now = Date.now();

		return this.run('createTarget', s => {
			try {
				const result = s.insertTarget.run(
					resolved.name,
					resolved.sourceName,
					resolved.cadenceMs,
					resolved.imageFormat,
					resolved.imageWidth,
					resolved.imageHeight,
					resolved.quality,
					resolved.enabled ? 1 : 0,
					now,
					now
				);
				return {
					id: Number(result.lastInsertRowid),
					...resolved,
					createdAt: new Date(now),
					updatedAt: new Date(now),
				};
			} catch (error) {
				if (isUniqueViolation(error)) {
					throw new StorageConflictError(
						`${ERROR_MESSAGES.DUPLICATE_TARGET_NAME}: ${resolved.name}`,
						'createTarget'
					);
				}
				throw error;
			}
		});
	}

	async updateTarget(id: number, update: CaptureTargetUpdate): Promise<CaptureTarget | undefined> {
		return this.run('updateTarget', s => {
			const row = s.getTarget.get(id);
			if (!row) {
				return undefined;
			}

			const updated = applyTargetUpdate(toTarget(row), update);
			s.updateTarget.run(
				updated.sourceName,
				updated.cadenceMs,
				updated.imageFormat,
				updated.imageWidth,
				updated.imageHeight,
				updated.quality,
				updated.enabled ? 1 : 0,
				updated.updatedAt.getTime(),
				id
			);
			return updated;
		});
	}

	async deleteTarget(id: number): Promise<boolean> {
		// artifacts go with it through ON DELETE CASCADE
		return this.run('deleteTarget', s => s.deleteTarget.run(id).changes > 0);
	}

	// Artifacts

	async saveArtifact(artifact: NewArtifact): Promise<number> {
		const capturedAt = (artifact.capturedAt ?? new Date()).getTime();
		return this.run('saveArtifact', s =>
			Number(
				s.insertArtifact.run(
					artifact.targetId,
					artifact.imageData,
					artifact.mimeType,
					artifact.sizeBytes,
					capturedAt
				).lastInsertRowid
			)
		);
	}

	async getLatestArtifact(targetId: number): Promise<CapturedArtifact | undefined> {
		return this.run('getLatestArtifact', s => {
			const row = s.latestArtifact.get(targetId);
			return row ? toArtifact(row) : undefined;
		});
	}

	async listArtifacts(targetId: number, limit = -1): Promise<CapturedArtifact[]> {
		// LIMIT -1 means no limit in SQLite
		return this.run('listArtifacts', s => s.listArtifacts.all(targetId, limit).map(toArtifact));
	}

	async countArtifacts(targetId: number): Promise<number> {
		return this.run('countArtifacts', s => s.countArtifacts.get(targetId)?.count ?? 0);
	}

	async deleteOldest(targetId: number, keep: number): Promise<number> {
		assertKeepCount(keep);
		return this.run('deleteOldest', s => s.deleteOldest.run(targetId, targetId, keep).changes);
	}

	// State

	async getState(key: string): Promise<string | undefined> {
		return this.run('getState', s => s.getState.get(key)?.value);
	}

	async setState(key: string, value: string): Promise<void> {
		this.run('setState', s => {
			s.setState.run(key, value, Date.now());
		});
	}

	private resolvePath(): string {
		const configured = this.config.path;
		if (configured === ':memory:') {
			return configured;
		}

		const resolved = resolve(configured);
		const databaseName = this.config.database ?? DEFAULT_DATABASE_NAME;

		if (DB_EXTENSION.test(resolved)) {
			return resolved;
		}
		// trailing separator marks a directory that may not exist yet
		if (/[\\/]$/.test(configured)) {
			return join(resolved, databaseName);
		}
		if (existsSync(resolved) && statSync(resolved).isDirectory()) {
			return join(resolved, databaseName);
		}
		return resolved;
	}

	private createTables(db: Database.Database): void {
		db.exec(`
			CREATE TABLE IF NOT EXISTS capture_targets (
				id INTEGER PRIMARY KEY AUTOINCREMENT,
				name TEXT NOT NULL UNIQUE,
				source_name TEXT NOT NULL,
				cadence_ms INTEGER NOT NULL,
				image_format TEXT NOT NULL,
				image_width INTEGER NOT NULL DEFAULT 0,
				image_height INTEGER NOT NULL DEFAULT 0,
				quality INTEGER NOT NULL,
				enabled INTEGER NOT NULL DEFAULT 1,
				created_at INTEGER NOT NULL,
				updated_at INTEGER NOT NULL
			)
		`);

		db.exec(`
			CREATE TABLE IF NOT EXISTS captured_artifacts (
				id INTEGER PRIMARY KEY AUTOINCREMENT,
				target_id INTEGER NOT NULL REFERENCES capture_targets(id) ON DELETE CASCADE,
				image_data TEXT NOT NULL,
				mime_type TEXT NOT NULL,
				size_bytes INTEGER NOT NULL,
				captured_at INTEGER NOT NULL
			)
		`);

		db.exec(`
			CREATE TABLE IF NOT EXISTS app_state (
				key TEXT PRIMARY KEY,
				value TEXT NOT NULL,
				updated_at INTEGER NOT NULL
			)
		`);

		db.exec(
			'CREATE INDEX IF NOT EXISTS idx_artifacts_target_captured ON captured_artifacts(target_id, captured_at DESC, id DESC)'
		);
	}

	/**
	 * Run `operation` against the prepared statements, wrapping driver errors
	 */
	private run<T>(operation: string, fn: (statements: Statements) => T): T {
		const statements = this.statements;
		if (!statements) {
			throw new StorageError(ERROR_MESSAGES.NOT_CONNECTED, operation);
		}

		try {
			return fn(statements);
		} catch (error) {
			if (error instanceof StorageError) {
				throw error;
			}
			this.log.error(`${LOG_PREFIXES.SQLITE} ${operation} failed`, { error: describeError(error) });
			throw new StorageError(`SQLite ${operation} failed: ${describeError(error)}`, operation, error);
		}
	}
}

function prepareStatements(db: Database.Database) {
	return {
		listTargets: db.prepare<[], TargetRow>(
			`SELECT ${TARGET_COLUMNS} FROM capture_targets ORDER BY created_at DESC, id DESC`
		),
		getTarget: db.prepare<[number], TargetRow>(`SELECT ${TARGET_COLUMNS} FROM capture_targets WHERE id = ?`),
		getTargetByName: db.prepare<[string], TargetRow>(
			`SELECT ${TARGET_COLUMNS} FROM capture_targets WHERE name = ?`
		),
		insertTarget: db.prepare<[string, string, number, string, number, number, number, number, number, number]>(`
			INSERT INTO capture_targets
				(name, source_name, cadence_ms, image_format, image_width, image_height, quality, enabled, created_at, updated_at)
			VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
		`),
		updateTarget: db.prepare<[string, number, string, number, number, number, number, number, number]>(`
			UPDATE capture_targets
			SET source_name = ?, cadence_ms = ?, image_format = ?, image_width = ?, image_height = ?,
				quality = ?, enabled = ?, updated_at = ?
			WHERE id = ?
		`),
		deleteTarget: db.prepare<[number]>('DELETE FROM capture_targets WHERE id = ?'),
		insertArtifact: db.prepare<[number, string, string, number, number]>(`
			INSERT INTO captured_artifacts (target_id, image_data, mime_type, size_bytes, captured_at)
			VALUES (?, ?, ?, ?, ?)
		`),
		latestArtifact: db.prepare<[number], ArtifactRow>(
			`SELECT ${ARTIFACT_COLUMNS} FROM captured_artifacts WHERE target_id = ? ${NEWEST_FIRST} LIMIT 1`
		),
		listArtifacts: db.prepare<[number, number], ArtifactRow>(
			`SELECT ${ARTIFACT_COLUMNS} FROM captured_artifacts WHERE target_id = ? ${NEWEST_FIRST} LIMIT ?`
		),
		countArtifacts: db.prepare<[number], { count: number }>(
			'SELECT COUNT(*) AS count FROM captured_artifacts WHERE target_id = ?'
		),
		deleteOldest: db.prepare<[number, number, number]>(`
			DELETE FROM captured_artifacts
			WHERE target_id = ? AND id NOT IN (
				SELECT id FROM captured_artifacts
				WHERE target_id = ?
				${NEWEST_FIRST}
				LIMIT ?
			)
		`),
		getState: db.prepare<[string], { value: string }>('SELECT value FROM app_state WHERE key = ?'),
		setState: db.prepare<[string, string, number]>(`
			INSERT INTO app_state (key, value, updated_at) VALUES (?, ?, ?)
			ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
		`),
	};
}

type Statements = ReturnType<typeof prepareStatements>;

function toTarget(row: TargetRow): CaptureTarget {
	if (!isImageFormat(row.image_format)) {
		throw new StorageError(
			`${ERROR_MESSAGES.INVALID_ROW}: unknown image format '${row.image_format}' for target ${row.id}`,
			'readTarget'
		);
	}

	return {
		id: row.id,
		name: row.name,
		sourceName: row.source_name,
		cadenceMs: row.cadence_ms,
		imageFormat: row.image_format,
		imageWidth: row.image_width,
		imageHeight: row.image_height,
		quality: row.quality,
		enabled: row.enabled !== 0,
		createdAt: new Date(row.created_at),
		updatedAt: new Date(row.updated_at),
	};
}

function toArtifact(row: ArtifactRow): CapturedArtifact {
	return {
		id: row.id,
		targetId: row.target_id,
		imageData: row.image_data,
		mimeType: row.mime_type,
		sizeBytes: row.size_bytes,
		capturedAt: new Date(row.captured_at),
	};
}

function isUniqueViolation(error: unknown): boolean {
	return (
		error instanceof Error &&
		'code' in error &&
		(error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT')
	);
}
