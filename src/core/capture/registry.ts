/**
 * Capture Registry - owns one worker per enabled capture target
 *
 * Every worker and the retention sweeper run as tasks under the registry's
 * root scope. The worker map is only touched while holding the registry
 * lock; workers themselves never take it, and the lock is never held while
 * waiting for a worker to exit.
 */

import { AbortManager, AsyncLock, TaskGroup } from '../utils/index.js';
import { RegistryStateError, TargetExistsError, TargetNotFoundError, describeError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger/index.js';
import type { CaptureStore, CaptureTarget } from '../storage/backend/types.js';
import { CaptureWorker } from './worker.js';
import { RetentionSweeper } from './retention-sweeper.js';
import type { ScreenshotProvider, WorkerInfo } from './types.js';

export interface CaptureRegistryOptions {
	store: CaptureStore;
	provider: ScreenshotProvider;
	/** Artifacts kept per target after each sweep */
	maxHistoryPerTarget?: number;
	sweepIntervalMs?: number;
	logger?: Logger;
}

const SWEEPER_TASK = 'retention-sweeper';

export class CaptureRegistry {
	private readonly store: CaptureStore;
	private readonly provider: ScreenshotProvider;
	private readonly logger: Logger;
	private readonly sweeper: RetentionSweeper;

	private readonly lock = new AsyncLock();
	private readonly workers = new Map<number, CaptureWorker>();
	private readonly tasks: TaskGroup;
	private root?: AbortManager;
	private spawnCounter = 0;

	constructor(options: CaptureRegistryOptions) {
		this.store = options.store;
		this.provider = options.provider;
		this.logger = options.logger ?? rootLogger.createChild({ component: 'capture' });
		this.sweeper = new RetentionSweeper({
			store: options.store,
			maxHistoryPerTarget: options.maxHistoryPerTarget,
			intervalMs: options.sweepIntervalMs,
			logger: this.logger,
		});
		this.tasks = new TaskGroup({
			onTaskError: (taskId, error) => {
				this.logger.error('Capture task failed', { taskId, error: describeError(error) });
			},
		});
	}

	/**
	 * Load persisted targets, start a worker for each enabled one, then start
	 * the retention sweeper. Aborting `signal` stops everything like stop() does,
	 * except that stop() also waits.
	 */
	async start(signal?: AbortSignal): Promise<void> {
		await this.lock.withLock(async () => {
			if (this.liveRoot()) {
				throw new RegistryStateError('Capture registry is already running');
			}

			const targets = await this.store.listTargets();
			const root = new AbortManager({ parentSignal: signal });
			if (root.aborted) {
				this.logger.debug('Capture registry start cancelled', { reason: root.reason });
				return;
			}
			this.root = root;
			this.workers.clear();
			root.addCleanup(() => this.detach(root));

			for (const target of targets) {
				if (!target.enabled) {
					continue;
				}
				try {
					this.spawnWorker(target, root);
				} catch (error) {
					this.logger.error('Failed to start capture worker, skipping target', {
						targetId: target.id,
						name: target.name,
						error: describeError(error),
					});
				}
			}

			this.tasks.spawn(() => this.sweeper.run(root.signal), `${SWEEPER_TASK}-${++this.spawnCounter}`);
			this.logger.info('Capture registry started', {
				targets: targets.length,
				workers: this.workers.size,
			});
		});
	}

	/**
	 * Stop every worker and the sweeper, and wait for them to exit. Also waits
	 * for workers cancelled earlier that are still finishing a capture.
	 */
	async stop(): Promise<void> {
		await this.lock.withLock(async () => {
			const root = this.root;
			this.root = undefined;
			root?.abort('capture registry stopped');
			await this.tasks.waitForAll();
			this.workers.clear();
			if (root) {
				this.logger.info('Capture registry stopped');
			}
		});
	}

	async addTarget(target: CaptureTarget): Promise<void> {
		await this.lock.withLock(async () => {
			const root = this.requireRunning();
			if (this.workers.has(target.id)) {
				throw new TargetExistsError(target.id);
			}
			if (target.enabled) {
				this.spawnWorker(target, root);
			}
		});
	}

	/**
	 * Replace the target's worker with one built from `target`
	 */
	async updateTarget(target: CaptureTarget): Promise<void> {
		await this.lock.withLock(async () => {
			const root = this.requireRunning();
			this.cancelWorker(target.id, 'capture target updated');
			if (target.enabled) {
				this.spawnWorker(target, root);
			}
		});
	}

	/**
	 * Cancel the target's worker if it has one. A capture in flight is discarded.
	 */
	async removeTarget(targetId: number): Promise<void> {
		await this.lock.withLock(async () => {
			this.cancelWorker(targetId, 'capture target removed');
		});
	}

	/**
	 * Change a running worker's cadence without restarting it
	 */
	async updateCadence(targetId: number, cadenceMs: number): Promise<void> {
		await this.lock.withLock(async () => {
			this.requireRunning();
			const worker = this.workers.get(targetId);
			if (!worker) {
				throw new TargetNotFoundError(targetId);
			}
			if (!Number.isFinite(cadenceMs) || cadenceMs <= 0) {
				throw new RangeError(`Capture cadence must be a positive number of milliseconds, got ${cadenceMs}`);
			}
			worker.setCadence(cadenceMs);
		});
	}

	workerCount(): number {
		return this.workers.size;
	}

	isRunning(): boolean {
		return this.liveRoot() !== undefined;
	}

	hasWorker(targetId: number): boolean {
		return this.workers.has(targetId);
	}

	listWorkers(): WorkerInfo[] {
		return Array.from(this.workers.values(), worker => worker.getInfo());
	}

	getSweeper(): RetentionSweeper {
		return this.sweeper;
	}

	private requireRunning(): AbortManager {
		const root = this.liveRoot();
		if (!root) {
			throw new RegistryStateError('Capture registry is not running');
		}
		return root;
	}

	// root stays set after a parent abort until detach() has run
	private liveRoot(): AbortManager | undefined {
		return this.root && !this.root.aborted ? this.root : undefined;
	}

	/**
	 * Forget a root scope that was aborted from outside, through the signal given to start()
	 */
	private async detach(root: AbortManager): Promise<void> {
		await this.lock.withLock(async () => {
			if (this.root !== root) {
				return;
			}
			this.root = undefined;
			this.workers.clear();
			this.logger.info('Capture registry stopped', { reason: root.reason });
		});
	}

	private spawnWorker(target: CaptureTarget, root: AbortManager): void {
		const scope = root.createChild();
		let worker: CaptureWorker;
		try {
			worker = new CaptureWorker(target, { provider: this.provider, store: this.store, logger: this.logger }, scope);
		} catch (error) {
			scope.abort('invalid capture target');
			throw error;
		}

		this.workers.set(target.id, worker);
		this.tasks.spawn(() => worker.run(), `capture-${target.id}-${++this.spawnCounter}`);
		this.logger.debug('Capture worker scheduled', {
			targetId: target.id,
			name: target.name,
			cadenceMs: target.cadenceMs,
		});
	}

	private cancelWorker(targetId: number, reason: string): void {
		const worker = this.workers.get(targetId);
		if (!worker) {
			return;
		}

		this.workers.delete(targetId);
		worker.cancel(reason);
	}
}
