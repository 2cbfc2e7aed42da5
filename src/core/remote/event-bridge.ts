/**
 * Event Bridge - delivers OBS scene events to a single observer
 *
 * Attaches to every session the connection manager opens. Each attachment
 * lives as long as its session, so a reconnect never leaves a stale listener
 * behind and never double-delivers.
 */

import { describeError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger/index.js';
import type { ConnectionManager } from './connection-manager.js';
import type { RemoteEvent, RemoteSession } from './types.js';

export interface SceneEventObserver {
	onCreated(sceneName: string): void;
	onRemoved(sceneName: string): void;
	onCurrentChanged(sceneName: string): void;
}

export interface EventBridgeStats {
	delivered: number;
	ignored: number;
	dropped: number;
}

export class EventBridge {
	private observer?: SceneEventObserver;
	private readonly logger: Logger;
	private detach?: () => void;
	private stats: EventBridgeStats = { delivered: 0, ignored: 0, dropped: 0 };

	constructor(logger?: Logger) {
		this.logger = logger ?? rootLogger.createChild({ component: 'event-bridge' });
	}

	setObserver(observer: SceneEventObserver | undefined): void {
		this.observer = observer;
	}

	/**
	 * Follow the sessions of `connection`. Call before the first connect so
	 * that no events are missed.
	 */
	attachTo(connection: ConnectionManager): void {
		this.detach?.();
		this.detach = connection.onSessionOpened((session, signal) => this.attachSession(session, signal));
	}

	detachFrom(): void {
		this.detach?.();
		this.detach = undefined;
	}

	attachSession(session: RemoteSession, signal: AbortSignal): void {
		this.logger.debug('Listening for scene events', { address: session.address });
		session.onEvent(event => this.dispatch(event), signal);
	}

	dispatch(event: RemoteEvent): void {
		const observer = this.observer;
		if (!observer) {
			this.stats.dropped++;
			return;
		}

		try {
			switch (event.kind) {
				case 'created':
					observer.onCreated(event.sceneName);
					break;
				case 'removed':
					observer.onRemoved(event.sceneName);
					break;
				case 'current-changed':
					observer.onCurrentChanged(event.sceneName);
					break;
				case 'unrecognized':
					this.stats.ignored++;
					return;
				default: {
					const exhaustive: never = event;
					return exhaustive;
				}
			}
			this.stats.delivered++;
		} catch (error) {
			this.logger.error('Scene event observer failed', { kind: event.kind, error: describeError(error) });
		}
	}

	getStats(): EventBridgeStats {
		return { ...this.stats };
	}
}
