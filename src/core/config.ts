/**
 * Agent configuration
 *
 * CLI flags override the environment; the merged result is validated once
 * with zod before anything is constructed from it.
 */

import { z } from 'zod';
import { getEnv, type Env } from './env.js';
import { RetentionConfigSchema, StoreConfigSchema } from './storage/config.js';

export const AgentConfigSchema = z.object({
	connection: z.object({
		host: z.string().min(1),
		port: z.number().int().min(1).max(65535),
		password: z.string().optional(),
	}),
	autoReconnect: z.boolean(),
	healthCheckIntervalMs: z.number().int().positive(),
	maxConsecutiveFailures: z.number().int().positive().default(3),
	storage: StoreConfigSchema,
	retention: RetentionConfigSchema,
	startup: z.object({
		maxAttempts: z.number().int().positive(),
		delayMs: z.number().int().nonnegative(),
		/** Keep running and reconnect in the background if OBS is not up yet */
		waitForObs: z.boolean().default(false),
	}),
	logFile: z.string().optional(),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;

/**
 * Values the command line can override
 */
export interface AgentConfigOverrides {
	host?: string;
	port?: number;
	password?: string;
	db?: string;
	storage?: 'sqlite' | 'in-memory';
	maxHistory?: number;
	autoReconnect?: boolean;
	waitForObs?: boolean;
	logFile?: string;
}

export function loadAgentConfig(overrides: AgentConfigOverrides = {}, env: Env = getEnv()): AgentConfig {
	const storageType = overrides.storage ?? env.SCENEWATCH_STORAGE_TYPE;

	return AgentConfigSchema.parse({
		connection: {
			host: overrides.host ?? env.OBS_HOST,
			port: overrides.port ?? env.OBS_PORT,
			password: overrides.password ?? env.OBS_PASSWORD,
		},
		autoReconnect: overrides.autoReconnect ?? env.SCENEWATCH_AUTO_RECONNECT,
		healthCheckIntervalMs: env.SCENEWATCH_HEALTH_INTERVAL_MS,
		storage:
			storageType === 'in-memory'
				? { type: 'in-memory' }
				: { type: 'sqlite', path: overrides.db ?? env.SCENEWATCH_DB },
		retention: {
			maxHistoryPerTarget: overrides.maxHistory ?? env.SCENEWATCH_MAX_HISTORY,
			sweepIntervalMs: env.SCENEWATCH_SWEEP_INTERVAL_MS,
		},
		startup: {
			maxAttempts: env.SCENEWATCH_STARTUP_ATTEMPTS,
			delayMs: env.SCENEWATCH_STARTUP_DELAY_MS,
			waitForObs: overrides.waitForObs ?? false,
		},
		logFile: overrides.logFile ?? env.SCENEWATCH_LOG_FILE,
	});
}
