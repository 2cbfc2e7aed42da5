import { config } from 'dotenv';
import { z } from 'zod';
import os from 'os';
import path from 'path';

// MCP hosts pass their settings through the process environment; a local
// .env file only fills in what they leave unset.
config({ override: false });

const booleanFlag = z
	.union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
	.transform(value => value === true || value === 'true' || value === '1');

export const DEFAULT_DB_PATH = path.join(os.homedir(), '.scenewatch', 'db.sqlite');

const envSchema = z.object({
	NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
	SCENEWATCH_LOG_LEVEL: z
		.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
		.default('info'),
	SCENEWATCH_LOG_FILE: z.string().optional(),
	REDACT_SECRETS: booleanFlag.default('true'),
	// OBS WebSocket connection
	OBS_HOST: z.string().min(1).default('localhost'),
	OBS_PORT: z.coerce.number().int().min(1).max(65535).default(4455),
	OBS_PASSWORD: z.string().optional(),
	SCENEWATCH_AUTO_RECONNECT: booleanFlag.default('true'),
	SCENEWATCH_HEALTH_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
	SCENEWATCH_STARTUP_ATTEMPTS: z.coerce.number().int().positive().default(3),
	SCENEWATCH_STARTUP_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
	// Storage
	SCENEWATCH_STORAGE_TYPE: z.enum(['sqlite', 'in-memory']).default('sqlite'),
	SCENEWATCH_DB: z.string().default(DEFAULT_DB_PATH),
	// Capture retention
	SCENEWATCH_MAX_HISTORY: z.coerce.number().int().positive().default(10),
	SCENEWATCH_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60000),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Read and validate the environment. Unset and empty variables fall back to
 * their defaults; invalid values throw a ZodError naming the offending keys.
 */
export function getEnv(source: NodeJS.ProcessEnv = process.env): Env {
	const present = Object.fromEntries(
		Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
	);
	return envSchema.parse(present);
}

/**
 * Non-throwing variant used during early startup, before the logger exists
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): boolean {
	const result = envSchema.safeParse(
		Object.fromEntries(Object.entries(source).filter(([, value]) => value !== undefined && value !== ''))
	);
	if (!result.success) {
		process.stderr.write(
			`[SCENEWATCH] ERROR: Environment validation failed: ${JSON.stringify(result.error.issues)}\n`
		);
	}
	return result.success;
}
