/**
 * Capture Worker - periodic screenshots for one target
 *
 * Captures once on start, then once per cadence until its scope aborts.
 * Ticks are fixed-rate: each deadline is the previous one plus the cadence,
 * so fetch latency does not accumulate, and ticks missed during a slow fetch
 * are dropped. The cadence can change while running; the wait already in
 * progress finishes at the old value and later waits use the new one.
 */

import { sleep, type AbortManager } from '../utils/index.js';
import { CaptureFailedError, PersistFailedError, describeError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger/index.js';
import type { CaptureTarget } from '../storage/backend/types.js';
import {
	base64Size,
	mimeTypeFor,
	screenshotRequestFor,
	type CaptureOutcome,
	type CaptureWorkerDeps,
	type CaptureWorkerStats,
	type WorkerInfo,
} from './types.js';

export class CaptureWorker {
	readonly targetId: number;
	private readonly target: CaptureTarget;
	private readonly deps: CaptureWorkerDeps;
	private readonly scope: AbortManager;
	private readonly logger: Logger;

	private cadenceMs: number;
	private loop?: Promise<void>;
	private stats: CaptureWorkerStats = {
		saved: 0,
		skipped: 0,
		captureFailures: 0,
		persistFailures: 0,
		discarded: 0,
	};

	constructor(target: CaptureTarget, deps: CaptureWorkerDeps, scope: AbortManager) {
		assertCadence(target.cadenceMs);
		this.target = target;
		this.targetId = target.id;
		this.cadenceMs = target.cadenceMs;
		this.deps = deps;
		this.scope = scope;
		this.logger = deps.logger ?? rootLogger.createChild({ component: 'capture-worker' });
	}

	/**
	 * Start the capture loop. Calling it again returns the same loop.
	 */
	run(): Promise<void> {
		if (!this.loop) {
			this.loop = this.runLoop();
		}
		return this.loop;
	}

	/**
	 * Abort the scope without waiting. A capture in flight is discarded when it returns.
	 */
	cancel(reason = 'capture worker stopped'): void {
		this.scope.abort(reason);
	}

	/**
	 * Abort the scope and wait for the loop to exit
	 */
	async stop(reason = 'capture worker stopped'): Promise<void> {
		this.cancel(reason);
		await this.loop;
	}

	isStopped(): boolean {
		return this.scope.aborted;
	}

	setCadence(ms: number): void {
		assertCadence(ms);
		if (ms !== this.cadenceMs) {
			this.logger.debug('Capture cadence changed', { targetId: this.targetId, from: this.cadenceMs, to: ms });
		}
		this.cadenceMs = ms;
	}

	getCadence(): number {
		return this.cadenceMs;
	}

	getInfo(): WorkerInfo {
		return {
			targetId: this.targetId,
			targetName: this.target.name,
			sourceName: this.target.sourceName,
			cadenceMs: this.cadenceMs,
			stats: { ...this.stats },
		};
	}

	/**
	 * One capture cycle. Never throws; failures are logged and reported in the outcome.
	 */
	async captureOnce(): Promise<CaptureOutcome> {
		if (!this.deps.provider.isConnected()) {
			this.stats.skipped++;
			return 'skipped';
		}

		let imageData: string;
		try {
			imageData = await this.deps.provider.takeSourceScreenshot(screenshotRequestFor(this.target));
		} catch (error) {
			this.stats.captureFailures++;
			const failure = new CaptureFailedError(this.targetId, error);
			this.logger.warn(failure.message, { targetId: this.targetId, source: this.target.sourceName });
			return 'capture_failed';
		}

		if (this.scope.aborted) {
			this.stats.discarded++;
			return 'discarded';
		}

		const capturedAt = new Date();
		try {
			await this.deps.store.saveArtifact({
				targetId: this.targetId,
				imageData,
				mimeType: mimeTypeFor(this.target.imageFormat),
				sizeBytes: base64Size(imageData),
				capturedAt,
			});
		} catch (error) {
			this.stats.persistFailures++;
			const failure = new PersistFailedError(this.targetId, error);
			this.logger.error(failure.message, { targetId: this.targetId });
			return 'persist_failed';
		}

		this.stats.saved++;
		this.stats.lastCaptureAt = capturedAt;
		return 'saved';
	}

	private async runLoop(): Promise<void> {
		this.logger.debug('Capture worker started', {
			targetId: this.targetId,
			source: this.target.sourceName,
			cadenceMs: this.cadenceMs,
		});

		let deadline = Date.now();
		try {
			while (!this.scope.aborted) {
				await this.captureOnce();
				deadline = nextDeadline(deadline, this.cadenceMs, Date.now());
				if (!(await sleep(deadline - Date.now(), this.scope.signal))) {
					break;
				}
			}
		} catch (error) {
			this.logger.error('Capture worker crashed', { targetId: this.targetId, error: describeError(error) });
			throw error;
		}

		this.logger.debug('Capture worker stopped', { targetId: this.targetId, reason: this.scope.reason });
	}
}

/**
 * First tick after `previous` on a `cadenceMs` grid that is still ahead of `now`
 */
export function nextDeadline(previous: number, cadenceMs: number, now: number): number {
	const missed = Math.max(0, Math.floor((now - previous) / cadenceMs));
	return previous + (missed + 1) * cadenceMs;
}

function assertCadence(ms: number): void {
	if (!Number.isFinite(ms) || ms <= 0) {
		throw new RangeError(`Capture cadence must be a positive number of milliseconds, got ${ms}`);
	}
}
