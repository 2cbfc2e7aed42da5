/**
 * Connection Manager - OBS connection lifecycle
 *
 * Owns the single remote session. `connected` is derived from the presence
 * of a session, and both only change while the connection lock is held, so
 * the two can never disagree.
 */

import { AbortManager, AsyncLock, TaskGroup } from '../utils/index.js';
import {
	ConnectionFailedError,
	NotConnectedError,
	ProbeFailedError,
	StatusProbeFailedError,
	describeError,
} from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger/index.js';
import { HealthMonitor, type HealthMonitorable, type HealthMetrics } from './health-monitor.js';
import {
	formatAddress,
	type ConnectionConfig,
	type ConnectionStatus,
	type RemoteDialer,
	type RemoteSession,
} from './types.js';

export interface ConnectionManagerOptions {
	dialer: RemoteDialer;
	config: ConnectionConfig;
	/** Reconnect in the background after the connection drops (default true) */
	autoReconnect?: boolean;
	/** Supervision tick period in milliseconds (default 5000) */
	healthCheckIntervalMs?: number;
	/** Failed reconnects in a row before an outage is reported at error level (default 3) */
	maxConsecutiveFailures?: number;
	logger?: Logger;
}

/**
 * Called for every newly opened session. `signal` aborts when that session
 * is released or the manager closes.
 */
export type SessionListener = (session: RemoteSession, signal: AbortSignal) => void;

interface ActiveSession {
	session: RemoteSession;
	scope: AbortManager;
}

const SUPERVISION_TASK = 'connection-supervision';

export class ConnectionManager implements HealthMonitorable<RemoteSession> {
	private readonly dialer: RemoteDialer;
	private readonly config: ConnectionConfig;
	private readonly address: string;
	private readonly logger: Logger;

	private readonly lock = new AsyncLock();
	private readonly root = new AbortManager();
	private readonly tasks: TaskGroup;
	private readonly monitor: HealthMonitor<RemoteSession>;

	private active?: ActiveSession;
	private autoReconnect: boolean;
	private closed = false;
	private sessionListeners: SessionListener[] = [];

	constructor(options: ConnectionManagerOptions) {
		this.dialer = options.dialer;
		this.config = options.config;
		this.address = formatAddress(options.config);
		this.autoReconnect = options.autoReconnect ?? true;
		this.logger = options.logger ?? rootLogger.createChild({ component: 'connection' });
		this.tasks = new TaskGroup({
			onTaskError: (taskId, error) => {
				this.logger.error('Background task failed', { taskId, error: describeError(error) });
			},
		});
		this.monitor = new HealthMonitor(
			this,
			{
				checkInterval: options.healthCheckIntervalMs ?? 5000,
				maxConsecutiveFailures: options.maxConsecutiveFailures ?? 3,
			},
			this.logger
		);
	}

	/**
	 * Open a session unless one is already open. Starts supervision on first success.
	 */
	async connect(): Promise<void> {
		await this.lock.withLock(async () => {
			if (this.closed) {
				throw new ConnectionFailedError(this.address, new Error('connection manager is closed'));
			}
			if (this.active) {
				return;
			}

			let session: RemoteSession;
			try {
				session = await this.dialer.dial(this.config);
			} catch (error) {
				throw new ConnectionFailedError(this.address, error);
			}

			const scope = this.root.createChild();
			this.active = { session, scope };
			this.logger.info('Connected to OBS', { address: this.address });
			this.notifySessionOpened(session, scope.signal);
		});

		this.startSupervision();
	}

	/**
	 * Release the session and stop background reconnection
	 */
	async disconnect(): Promise<void> {
		await this.lock.withLock(async () => {
			this.autoReconnect = false;
			await this.releaseSession('disconnect requested');
		});
	}

	/**
	 * Stop supervision and event delivery, wait for them to exit, then disconnect.
	 * The manager cannot be reconnected afterwards.
	 */
	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;

		this.root.abort('connection manager closed');
		const results = await this.tasks.waitForAll();
		for (const result of results) {
			if (result.status === 'rejected') {
				this.logger.warn('Task ended with an error during shutdown', {
					taskId: result.taskId,
					error: describeError(result.reason),
				});
			}
		}

		await this.disconnect();
		this.logger.info('Connection manager closed');
	}

	isConnected(): boolean {
		return this.active !== undefined;
	}

	isClosed(): boolean {
		return this.closed;
	}

	shouldReconnect(): boolean {
		return this.autoReconnect && !this.closed && this.active === undefined;
	}

	setAutoReconnect(enabled: boolean): void {
		this.autoReconnect = enabled;
	}

	isAutoReconnectEnabled(): boolean {
		return this.autoReconnect;
	}

	/**
	 * The live session, for command wrappers
	 */
	requireSession(): RemoteSession {
		if (!this.active) {
			throw new NotConnectedError('Not connected to OBS. Connect first.');
		}
		return this.active.session;
	}

	/**
	 * Connection state plus the remote version when connected. A failed version
	 * query rejects but leaves the connection state alone; supervision decides.
	 */
	async getStatus(): Promise<ConnectionStatus> {
		const active = this.active;
		const status: ConnectionStatus = {
			connected: active !== undefined,
			autoReconnect: this.autoReconnect,
			address: this.address,
		};

		if (!active) {
			return status;
		}

		try {
			return { ...status, version: await active.session.getVersion() };
		} catch (error) {
			throw new StatusProbeFailedError(error);
		}
	}

	currentSession(): RemoteSession | undefined {
		return this.active?.session;
	}

	async probe(session: RemoteSession): Promise<void> {
		try {
			await session.getVersion();
		} catch (error) {
			throw new ProbeFailedError(`OBS health check failed: ${describeError(error)}`, error);
		}
	}

	/**
	 * Release `session` after a failed health check. A session that was already
	 * replaced while the check was in flight is left alone.
	 */
	async markUnhealthy(session: RemoteSession, cause: unknown): Promise<void> {
		await this.lock.withLock(async () => {
			if (this.active?.session !== session) {
				this.logger.debug('Ignoring failed health check of a released session', {
					error: describeError(cause),
				});
				return;
			}
			await this.releaseSession(`health check failed: ${describeError(cause)}`);
		});
	}

	/**
	 * Start the supervision loop if it is not running. Normally triggered by
	 * the first successful connect; also used to wait for OBS in the background.
	 */
	startSupervision(): void {
		if (this.closed || this.tasks.has(SUPERVISION_TASK)) {
			return;
		}
		this.tasks.spawn(() => this.monitor.run(this.root.signal), SUPERVISION_TASK);
	}

	/**
	 * Subscribe to newly opened sessions
	 *
	 * @returns a function that unsubscribes
	 */
	onSessionOpened(listener: SessionListener): () => void {
		this.sessionListeners.push(listener);
		return () => {
			this.sessionListeners = this.sessionListeners.filter(existing => existing !== listener);
		};
	}

	getHealthMetrics(): HealthMetrics {
		return this.monitor.getMetrics();
	}

	/**
	 * Must be called with the lock held
	 */
	private async releaseSession(reason: string): Promise<void> {
		const active = this.active;
		if (!active) {
			return;
		}

		this.active = undefined;
		active.scope.abort(reason);

		try {
			await active.session.close();
		} catch (error) {
			this.logger.warn('Error while closing OBS session', { error: describeError(error) });
		}

		this.logger.info('Disconnected from OBS', { reason });
	}

	private notifySessionOpened(session: RemoteSession, signal: AbortSignal): void {
		for (const listener of this.sessionListeners) {
			try {
				listener(session, signal);
			} catch (error) {
				this.logger.error('Session listener failed', { error: describeError(error) });
			}
		}
	}
}
