import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HealthMonitor, type HealthMonitorable } from '../health-monitor.js';
import { createLogger, type Logger } from '../../logger/index.js';

class FakeTarget implements HealthMonitorable<string> {
	session?: string = 'session-1';
	reconnect = true;
	probeError?: Error;
	connectError?: Error;
	readonly probed: string[] = [];
	readonly unhealthy: Array<{ session: string; cause: unknown }> = [];
	connectCalls = 0;

	currentSession(): string | undefined {
		return this.session;
	}

	shouldReconnect(): boolean {
		return this.session === undefined && this.reconnect;
	}

	async probe(session: string): Promise<void> {
		this.probed.push(session);
		if (this.probeError) {
			throw this.probeError;
		}
	}

	async markUnhealthy(session: string, cause: unknown): Promise<void> {
		this.unhealthy.push({ session, cause });
		if (this.session === session) {
			this.session = undefined;
		}
	}

	async connect(): Promise<void> {
		this.connectCalls++;
		if (this.connectError) {
			throw this.connectError;
		}
		this.session = `session-${this.connectCalls + 1}`;
	}
}

describe('HealthMonitor', () => {
	let target: FakeTarget;
	let logger: Logger;
	let monitor: HealthMonitor<string>;

	beforeEach(() => {
		target = new FakeTarget();
		logger = createLogger({ silent: true });
		monitor = new HealthMonitor(target, { checkInterval: 1000, maxConsecutiveFailures: 3 }, logger);
	});

	describe('tick', () => {
		it('should record a successful probe and emit healthy', async () => {
			const healthy = vi.fn();
			monitor.on('healthy', healthy);

			await monitor.tick();

			expect(target.probed).toEqual(['session-1']);
			expect(healthy).toHaveBeenCalledTimes(1);
			expect(monitor.getMetrics()).toMatchObject({
				totalChecks: 1,
				successfulChecks: 1,
				failedChecks: 0,
				consecutiveFailures: 0,
			});
			expect(monitor.getMetrics().lastSuccessfulCheck).toBeInstanceOf(Date);
		});

		it('should demote the connection when the probe fails', async () => {
			const failure = new Error('no response');
			target.probeError = failure;
			const unhealthy = vi.fn();
			monitor.on('unhealthy', unhealthy);

			await monitor.tick();

			expect(target.unhealthy).toEqual([{ session: 'session-1', cause: failure }]);
			expect(target.session).toBeUndefined();
			expect(unhealthy).toHaveBeenCalledWith(expect.objectContaining({ type: 'unhealthy', error: failure }));
			expect(monitor.getMetrics()).toMatchObject({ failedChecks: 1, consecutiveFailures: 1 });
		});

		it('should not reconnect when reconnection is not wanted', async () => {
			target.session = undefined;
			target.reconnect = false;

			await monitor.tick();

			expect(target.connectCalls).toBe(0);
			expect(monitor.getMetrics().reconnectAttempts).toBe(0);
		});

		it('should reconnect when disconnected and emit reconnected', async () => {
			target.session = undefined;
			const reconnected = vi.fn();
			monitor.on('reconnected', reconnected);

			await monitor.tick();

			expect(target.connectCalls).toBe(1);
			expect(target.session).toBe('session-2');
			expect(reconnected).toHaveBeenCalledTimes(1);
			expect(monitor.getMetrics()).toMatchObject({ reconnectAttempts: 1, consecutiveReconnectFailures: 0 });
		});

		it('should report a prolonged outage at error level exactly once', async () => {
			const errorSpy = vi.spyOn(logger, 'error');
			const warnSpy = vi.spyOn(logger, 'warn');
			target.session = undefined;
			target.connectError = new Error('connect ECONNREFUSED');

			for (let i = 0; i < 5; i++) {
				await monitor.tick();
			}

			expect(target.connectCalls).toBe(5);
			expect(warnSpy).toHaveBeenCalledTimes(5);
			expect(errorSpy).toHaveBeenCalledTimes(1);
			expect(errorSpy).toHaveBeenCalledWith('OBS unreachable, still retrying in the background', {
				failedAttempts: 3,
				intervalMs: 1000,
			});
			expect(monitor.getMetrics().consecutiveReconnectFailures).toBe(5);

			target.connectError = undefined;
			await monitor.tick();
			expect(monitor.getMetrics().consecutiveReconnectFailures).toBe(0);
		});
	});

	describe('run', () => {
		beforeEach(() => {
			vi.useFakeTimers();
		});

		afterEach(() => {
			vi.useRealTimers();
		});

		it('should tick once per interval until aborted', async () => {
			const healthy = vi.fn();
			monitor.on('healthy', healthy);
			const controller = new AbortController();

			const running = monitor.run(controller.signal);
			await vi.advanceTimersByTimeAsync(3500);
			expect(healthy).toHaveBeenCalledTimes(3);

			controller.abort();
			await running;
			await vi.advanceTimersByTimeAsync(5000);
			expect(healthy).toHaveBeenCalledTimes(3);
		});

		it('should keep ticking after a tick throws', async () => {
			const errorSpy = vi.spyOn(logger, 'error');
			const currentSession = vi
				.spyOn(target, 'currentSession')
				.mockImplementationOnce(() => {
					throw new Error('state unavailable');
				})
				.mockReturnValue('session-1');
			const controller = new AbortController();

			const running = monitor.run(controller.signal);
			await vi.advanceTimersByTimeAsync(2000);
			controller.abort();
			await running;

			expect(currentSession).toHaveBeenCalledTimes(2);
			expect(errorSpy).toHaveBeenCalledWith('Unexpected error in supervision tick', {
				error: 'state unavailable',
			});
			expect(monitor.getMetrics().successfulChecks).toBe(1);
		});
	});

	it('should stop calling a listener after it is removed', async () => {
		const healthy = vi.fn();
		const off = monitor.on('healthy', healthy);

		off();
		await monitor.tick();

		expect(healthy).not.toHaveBeenCalled();
	});

	it('should reset metrics', async () => {
		await monitor.tick();
		monitor.resetMetrics();

		expect(monitor.getMetrics()).toEqual({
			totalChecks: 0,
			successfulChecks: 0,
			failedChecks: 0,
			consecutiveFailures: 0,
			averageResponseTime: 0,
			reconnectAttempts: 0,
			consecutiveReconnectFailures: 0,
		});
	});
});
