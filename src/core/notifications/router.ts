/**
 * Notification Router - turns scene events into MCP change notifications
 */

import { describeError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger/index.js';
import type { SceneEventObserver } from '../remote/event-bridge.js';
import type { RemoteEvent } from '../remote/types.js';

export type ResourceKind = 'scene' | 'screenshot';

export type Notification = { kind: 'list_changed' } | { kind: 'resource_updated'; uri: string };

/**
 * Where notifications end up; the MCP server in production
 */
export interface NotificationSink {
	notifyListChanged(): Promise<void>;
	notifyUpdated(uri: string): Promise<void>;
}

export const RESOURCE_SCHEME = 'obs';

/**
 * `obs://<kind>/<name>`, with `name` inserted as is
 */
export function resourceUri(kind: ResourceKind, name: string): string {
	return `${RESOURCE_SCHEME}://${kind}/${name}`;
}

export function classify(event: RemoteEvent): Notification | undefined {
	switch (event.kind) {
		case 'created':
		case 'removed':
			return { kind: 'list_changed' };
		case 'current-changed':
			return { kind: 'resource_updated', uri: resourceUri('scene', event.sceneName) };
		case 'unrecognized':
			return undefined;
	}
}

export class NotificationRouter implements SceneEventObserver {
	private readonly sink: NotificationSink;
	private readonly logger: Logger;

	constructor(sink: NotificationSink, logger?: Logger) {
		this.sink = sink;
		this.logger = logger ?? rootLogger.createChild({ component: 'notifications' });
	}

	onCreated(sceneName: string): void {
		this.route({ kind: 'created', sceneName });
	}

	onRemoved(sceneName: string): void {
		this.route({ kind: 'removed', sceneName });
	}

	onCurrentChanged(sceneName: string): void {
		this.route({ kind: 'current-changed', sceneName });
	}

	/**
	 * Forward the classification of `event` to the sink. Returns once the sink
	 * call has settled; failures are logged, never rethrown.
	 */
	async deliver(event: RemoteEvent): Promise<void> {
		const notification = classify(event);
		if (!notification) {
			return;
		}

		try {
			if (notification.kind === 'list_changed') {
				await this.sink.notifyListChanged();
			} else {
				await this.sink.notifyUpdated(notification.uri);
			}
			this.logger.debug('Notification sent', { ...notification, scene: sceneNameOf(event) });
		} catch (error) {
			this.logger.warn('Failed to send notification', {
				...notification,
				error: describeError(error),
			});
		}
	}

	private route(event: RemoteEvent): void {
		void this.deliver(event);
	}
}

const sceneNameOf = (event: RemoteEvent): string | undefined =>
	event.kind === 'unrecognized' ? undefined : event.sceneName;
