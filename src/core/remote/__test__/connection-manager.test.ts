import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConnectionManager } from '../connection-manager.js';
import { ConnectionFailedError, NotConnectedError, StatusProbeFailedError } from '../../errors.js';
import { createLogger } from '../../logger/index.js';
import { FakeDialer, TEST_CONFIG, TEST_VERSION } from './fakes.js';

const INTERVAL = 5000;

describe('ConnectionManager', () => {
	let dialer: FakeDialer;
	let manager: ConnectionManager;

	const hasUsableSession = (): boolean => {
		try {
			manager.requireSession();
			return true;
		} catch {
			return false;
		}
	};

	beforeEach(() => {
		vi.useFakeTimers();
		dialer = new FakeDialer();
		manager = new ConnectionManager({
			dialer,
			config: TEST_CONFIG,
			healthCheckIntervalMs: INTERVAL,
			logger: createLogger({ silent: true }),
		});
	});

	afterEach(async () => {
		await manager.close();
		vi.useRealTimers();
	});

	describe('connect', () => {
		it('should open a session and report it in the status', async () => {
			await manager.connect();

			expect(manager.isConnected()).toBe(true);
			await expect(manager.getStatus()).resolves.toEqual({
				connected: true,
				autoReconnect: true,
				address: 'ws://localhost:4455',
				version: TEST_VERSION,
			});
		});

		it('should not open a second session when already connected', async () => {
			await manager.connect();
			const first = manager.requireSession();

			await expect(manager.connect()).resolves.toBeUndefined();

			expect(dialer.dialCount).toBe(1);
			expect(manager.requireSession()).toBe(first);
		});

		it('should reject with ConnectionFailedError when OBS is unreachable', async () => {
			dialer.reachable = false;

			const error = await manager.connect().catch((caught: unknown) => caught);

			expect(error).toBeInstanceOf(ConnectionFailedError);
			expect(error).toMatchObject({
				message: 'Failed to connect to ws://localhost:4455: connect ECONNREFUSED',
				address: 'ws://localhost:4455',
				code: 'CONNECTION_FAILED',
			});
			expect(manager.isConnected()).toBe(false);
		});

		it('should notify session listeners with a signal scoped to the session', async () => {
			const signals: AbortSignal[] = [];
			manager.onSessionOpened((_session, signal) => signals.push(signal));

			await manager.connect();
			expect(signals).toHaveLength(1);
			expect(signals[0].aborted).toBe(false);

			await manager.disconnect();
			expect(signals[0].aborted).toBe(true);
		});

		it('should stop notifying a listener after it unsubscribes', async () => {
			const listener = vi.fn();
			const unsubscribe = manager.onSessionOpened(listener);
			unsubscribe();

			await manager.connect();

			expect(listener).not.toHaveBeenCalled();
		});
	});

	describe('state consistency', () => {
		it('should never report connected without a usable session', async () => {
			const observations: boolean[] = [];
			const observe = () => observations.push(manager.isConnected() === hasUsableSession());

			observe();
			await Promise.all([
				manager.connect().then(observe),
				manager.disconnect().then(observe),
				manager.connect().then(observe),
				manager.disconnect().then(observe),
				manager.connect().then(observe),
			]);

			expect(observations).toEqual([true, true, true, true, true, true]);
			expect(manager.isConnected()).toBe(true);
			expect(hasUsableSession()).toBe(true);
		});

		it('should throw NotConnectedError from requireSession when disconnected', () => {
			expect(() => manager.requireSession()).toThrow(NotConnectedError);
			expect(() => manager.requireSession()).toThrow('Not connected to OBS. Connect first.');
		});
	});

	describe('disconnect', () => {
		it('should close the session and turn off auto-reconnect', async () => {
			await manager.connect();
			const session = dialer.lastSession;

			await manager.disconnect();
			await vi.advanceTimersByTimeAsync(INTERVAL * 3);

			expect(session?.closed).toBe(true);
			expect(manager.isConnected()).toBe(false);
			expect(manager.isAutoReconnectEnabled()).toBe(false);
			expect(dialer.dialCount).toBe(1);
		});

		it('should be a no-op when not connected', async () => {
			await expect(manager.disconnect()).resolves.toBeUndefined();
		});
	});

	describe('getStatus', () => {
		it('should report disconnected without querying OBS', async () => {
			await expect(manager.getStatus()).resolves.toEqual({
				connected: false,
				autoReconnect: true,
				address: 'ws://localhost:4455',
			});
		});

		it('should reject without touching the connection when the version query fails', async () => {
			await manager.connect();
			const session = dialer.lastSession;
			if (session) {
				session.versionError = new Error('socket hang up');
			}

			await expect(manager.getStatus()).rejects.toThrow(StatusProbeFailedError);
			await expect(manager.getStatus()).rejects.toThrow(
				'Connected but failed to get version (connection may be broken): socket hang up'
			);
			expect(manager.isConnected()).toBe(true);
		});
	});

	describe('supervision', () => {
		it('should keep a healthy session across ticks', async () => {
			await manager.connect();

			await vi.advanceTimersByTimeAsync(INTERVAL * 2);

			expect(manager.isConnected()).toBe(true);
			expect(manager.getHealthMetrics()).toMatchObject({ totalChecks: 2, successfulChecks: 2 });
		});

		it('should stay disconnected through failures until a reconnect succeeds', async () => {
			await manager.connect();
			const first = dialer.lastSession;
			if (first) {
				first.versionError = new Error('socket closed');
			}
			dialer.reachable = false;

			await vi.advanceTimersByTimeAsync(INTERVAL);
			expect(manager.isConnected()).toBe(false);
			expect(first?.closed).toBe(true);

			await vi.advanceTimersByTimeAsync(INTERVAL);
			expect(manager.isConnected()).toBe(false);
			await vi.advanceTimersByTimeAsync(INTERVAL);
			expect(manager.isConnected()).toBe(false);
			expect(manager.getHealthMetrics().consecutiveReconnectFailures).toBe(2);

			dialer.reachable = true;
			await vi.advanceTimersByTimeAsync(INTERVAL);

			expect(manager.isConnected()).toBe(true);
			expect(dialer.sessions).toHaveLength(2);
			expect(manager.requireSession()).toBe(dialer.sessions[1]);
			expect(manager.getHealthMetrics().consecutiveReconnectFailures).toBe(0);
		});

		it('should leave a newer session alone when an older health check fails late', async () => {
			await manager.connect();
			const first = dialer.lastSession;
			if (!first) {
				throw new Error('expected a session');
			}
			let answerProbe = (): void => {};
			first.versionGate = new Promise<void>(resolve => {
				answerProbe = resolve;
			});
			first.versionError = new Error('socket closed');

			await vi.advanceTimersByTimeAsync(INTERVAL);
			await manager.disconnect();
			manager.setAutoReconnect(true);
			await manager.connect();
			const second = dialer.lastSession;

			answerProbe();
			await vi.advanceTimersByTimeAsync(0);

			expect(second).not.toBe(first);
			expect(second?.closed).toBe(false);
			expect(manager.isConnected()).toBe(true);
			expect(manager.requireSession()).toBe(second);
			expect(dialer.sessions).toHaveLength(2);
		});

		it('should not reconnect when auto-reconnect is off', async () => {
			manager.setAutoReconnect(false);
			await manager.connect();
			const session = dialer.lastSession;
			if (session) {
				session.versionError = new Error('socket closed');
			}

			await vi.advanceTimersByTimeAsync(INTERVAL * 4);

			expect(manager.isConnected()).toBe(false);
			expect(dialer.dialCount).toBe(1);
		});

		it('should connect in the background once supervision is started without a session', async () => {
			dialer.reachable = false;
			await expect(manager.connect()).rejects.toThrow(ConnectionFailedError);

			manager.startSupervision();
			dialer.reachable = true;
			await vi.advanceTimersByTimeAsync(INTERVAL);

			expect(manager.isConnected()).toBe(true);
			expect(dialer.dialCount).toBe(2);
		});
	});

	describe('close', () => {
		it('should release the session and refuse further connects', async () => {
			await manager.connect();
			const session = dialer.lastSession;

			await manager.close();

			expect(session?.closed).toBe(true);
			expect(manager.isClosed()).toBe(true);
			expect(manager.shouldReconnect()).toBe(false);
			await expect(manager.connect()).rejects.toThrow(
				'Failed to connect to ws://localhost:4455: connection manager is closed'
			);
		});

		it('should be safe to call twice', async () => {
			await manager.connect();
			await manager.close();
			await expect(manager.close()).resolves.toBeUndefined();
		});
	});
});
