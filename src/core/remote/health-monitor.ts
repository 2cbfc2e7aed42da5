/**
 * Health Monitor - connection supervision
 *
 * One fixed-period tick covers both halves of supervision: while connected it
 * probes the session and demotes it on failure; while disconnected, and if
 * auto-reconnect is on, it attempts a reconnect. There is no backoff; a failed
 * attempt is simply retried on the next tick.
 */

import { sleep } from '../utils/index.js';
import { describeError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger/index.js';

/**
 * Health metrics
 */
export interface HealthMetrics {
	totalChecks: number;
	successfulChecks: number;
	failedChecks: number;
	consecutiveFailures: number;
	averageResponseTime: number;
	lastSuccessfulCheck?: Date;
	lastFailedCheck?: Date;
	reconnectAttempts: number;
	consecutiveReconnectFailures: number;
	lastReconnect?: Date;
}

/**
 * Health monitor configuration
 */
export interface HealthMonitorConfig {
	/** Interval between ticks in milliseconds */
	checkInterval: number;
	/** Consecutive failed reconnects before the outage is logged as an error */
	maxConsecutiveFailures: number;
}

/**
 * What the monitor supervises. Implemented by ConnectionManager.
 */
export interface HealthMonitorable<TSession> {
	/** The session a health check would probe, if one is open */
	currentSession(): TSession | undefined;
	shouldReconnect(): boolean;
	/** One liveness round trip; rejects if the session is unusable */
	probe(session: TSession): Promise<void>;
	/** Drop `session` if it is still the open one, so the next tick reconnects */
	markUnhealthy(session: TSession, cause: unknown): Promise<void>;
	connect(): Promise<void>;
}

export type HealthEventType = 'healthy' | 'unhealthy' | 'reconnected' | 'reconnect_failed';

export interface HealthEvent {
	type: HealthEventType;
	timestamp: Date;
	error?: unknown;
}

export type HealthEventListener = (event: HealthEvent) => void;

const RESPONSE_TIME_WINDOW = 50;

export class HealthMonitor<TSession> {
	private readonly config: HealthMonitorConfig;
	private readonly target: HealthMonitorable<TSession>;
	private readonly logger: Logger;

	private metrics: HealthMetrics = HealthMonitor.emptyMetrics();
	private responseTimes: number[] = [];
	private eventListeners = new Map<HealthEventType, HealthEventListener[]>();

	constructor(target: HealthMonitorable<TSession>, config: Partial<HealthMonitorConfig> = {}, logger?: Logger) {
		this.target = target;
		this.logger = logger ?? rootLogger.createChild({ component: 'health-monitor' });
		this.config = {
			checkInterval: 5000,
			maxConsecutiveFailures: 3,
			...config,
		};
	}

	/**
	 * Tick every `checkInterval` until `signal` aborts
	 */
	async run(signal: AbortSignal): Promise<void> {
		this.logger.debug('Supervision loop started', { intervalMs: this.config.checkInterval });

		while (await sleep(this.config.checkInterval, signal)) {
			try {
				await this.tick();
			} catch (error) {
				this.logger.error('Unexpected error in supervision tick', { error: describeError(error) });
			}
		}

		this.logger.debug('Supervision loop stopped');
	}

	/**
	 * One supervision step
	 */
	async tick(): Promise<void> {
		const session = this.target.currentSession();
		if (session !== undefined) {
			await this.checkHealth(session);
		} else if (this.target.shouldReconnect()) {
			await this.attemptReconnect();
		}
	}

	getMetrics(): HealthMetrics {
		return { ...this.metrics };
	}

	resetMetrics(): void {
		this.metrics = HealthMonitor.emptyMetrics();
		this.responseTimes = [];
	}

	/**
	 * Add event listener
	 *
	 * @returns a function that removes the listener
	 */
	on(eventType: HealthEventType, listener: HealthEventListener): () => void {
		const listeners = this.eventListeners.get(eventType) ?? [];
		listeners.push(listener);
		this.eventListeners.set(eventType, listeners);

		return () => {
			const index = listeners.indexOf(listener);
			if (index >= 0) {
				listeners.splice(index, 1);
			}
		};
	}

	private async checkHealth(session: TSession): Promise<void> {
		const startTime = Date.now();

		try {
			await this.target.probe(session);
			this.recordCheck(true, Date.now() - startTime);
			this.emit({ type: 'healthy', timestamp: new Date() });
		} catch (error) {
			this.recordCheck(false, Date.now() - startTime);
			this.logger.warn('OBS connection lost', { error: describeError(error) });
			await this.target.markUnhealthy(session, error);
			this.emit({ type: 'unhealthy', timestamp: new Date(), error });
		}
	}

	private async attemptReconnect(): Promise<void> {
		this.metrics.reconnectAttempts++;

		try {
			await this.target.connect();
			if (this.metrics.consecutiveReconnectFailures > 0) {
				this.logger.info('Reconnected to OBS', {
					failedAttempts: this.metrics.consecutiveReconnectFailures,
				});
			} else {
				this.logger.info('Reconnected to OBS');
			}
			this.metrics.consecutiveReconnectFailures = 0;
			this.metrics.lastReconnect = new Date();
			this.emit({ type: 'reconnected', timestamp: new Date() });
		} catch (error) {
			this.metrics.consecutiveReconnectFailures++;
			this.logger.warn('Auto-reconnect failed', {
				attempt: this.metrics.consecutiveReconnectFailures,
				error: describeError(error),
			});

			// once per outage
			if (this.metrics.consecutiveReconnectFailures === this.config.maxConsecutiveFailures) {
				this.logger.error('OBS unreachable, still retrying in the background', {
					failedAttempts: this.metrics.consecutiveReconnectFailures,
					intervalMs: this.config.checkInterval,
				});
			}

			this.emit({ type: 'reconnect_failed', timestamp: new Date(), error });
		}
	}

	private recordCheck(healthy: boolean, duration: number): void {
		this.metrics.totalChecks++;

		if (healthy) {
			this.metrics.successfulChecks++;
			this.metrics.consecutiveFailures = 0;
			this.metrics.lastSuccessfulCheck = new Date();
		} else {
			this.metrics.failedChecks++;
			this.metrics.consecutiveFailures++;
			this.metrics.lastFailedCheck = new Date();
		}

		this.responseTimes.push(duration);
		if (this.responseTimes.length > RESPONSE_TIME_WINDOW) {
			this.responseTimes = this.responseTimes.slice(-RESPONSE_TIME_WINDOW);
		}
		this.metrics.averageResponseTime =
			this.responseTimes.reduce((a, b) => a + b, 0) / this.responseTimes.length;
	}

	private emit(event: HealthEvent): void {
		for (const listener of this.eventListeners.get(event.type) ?? []) {
			try {
				listener(event);
			} catch (error) {
				this.logger.warn('Error in health event listener', { error: describeError(error) });
			}
		}
	}

	private static emptyMetrics(): HealthMetrics {
		return {
			totalChecks: 0,
			successfulChecks: 0,
			failedChecks: 0,
			consecutiveFailures: 0,
			averageResponseTime: 0,
			reconnectAttempts: 0,
			consecutiveReconnectFailures: 0,
		};
	}
}
