/**
 * Retention Sweeper - bounds per-target screenshot history
 */

import { sleep } from '../utils/index.js';
import { describeError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger/index.js';
import { RETENTION_DEFAULTS } from '../storage/constants.js';
import type { CaptureStore, CaptureTarget } from '../storage/backend/types.js';
import type { SweepResult } from './types.js';

export interface RetentionSweeperOptions {
	store: Pick<CaptureStore, 'listTargets' | 'deleteOldest'>;
	maxHistoryPerTarget?: number;
	intervalMs?: number;
	logger?: Logger;
}

export class RetentionSweeper {
	private readonly store: RetentionSweeperOptions['store'];
	private readonly maxHistoryPerTarget: number;
	private readonly intervalMs: number;
	private readonly logger: Logger;

	constructor(options: RetentionSweeperOptions) {
		this.store = options.store;
		this.maxHistoryPerTarget = options.maxHistoryPerTarget ?? RETENTION_DEFAULTS.MAX_HISTORY_PER_TARGET;
		this.intervalMs = options.intervalMs ?? RETENTION_DEFAULTS.SWEEP_INTERVAL_MS;
		this.logger = options.logger ?? rootLogger.createChild({ component: 'retention' });
	}

	/**
	 * Sweep every `intervalMs` until `signal` aborts
	 */
	async run(signal: AbortSignal): Promise<void> {
		this.logger.debug('Retention sweeper started', {
			intervalMs: this.intervalMs,
			maxHistoryPerTarget: this.maxHistoryPerTarget,
		});

		while (await sleep(this.intervalMs, signal)) {
			await this.sweepOnce();
		}

		this.logger.debug('Retention sweeper stopped');
	}

	/**
	 * Trim every target to its newest `maxHistoryPerTarget` artifacts
	 */
	async sweepOnce(): Promise<SweepResult> {
		let targets: CaptureTarget[];
		try {
			targets = await this.store.listTargets();
		} catch (error) {
			this.logger.error('Retention sweep skipped, could not list capture targets', {
				error: describeError(error),
			});
			return { targets: 0, deleted: 0, failures: 1 };
		}

		const result: SweepResult = { targets: 0, deleted: 0, failures: 0 };

		for (const target of targets) {
			try {
				const deleted = await this.store.deleteOldest(target.id, this.maxHistoryPerTarget);
				result.targets++;
				result.deleted += deleted;
				if (deleted > 0) {
					this.logger.debug('Trimmed screenshot history', { targetId: target.id, deleted });
				}
			} catch (error) {
				result.failures++;
				this.logger.error('Failed to trim screenshot history', {
					targetId: target.id,
					error: describeError(error),
				});
			}
		}

		if (result.deleted > 0 || result.failures > 0) {
			this.logger.verbose('Retention sweep finished', { ...result });
		}
		return result;
	}

	getMaxHistoryPerTarget(): number {
		return this.maxHistoryPerTarget;
	}
}
