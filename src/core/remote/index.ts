export { ConnectionManager } from './connection-manager.js';
export { HealthMonitor } from './health-monitor.js';
export { EventBridge } from './event-bridge.js';
export { RemoteCommands } from './commands.js';
export { ObsDialer, ObsSession, stripDataUri } from './obs-session.js';
export { formatAddress, isImageFormat, IMAGE_FORMATS } from './types.js';

export type { ConnectionManagerOptions, SessionListener } from './connection-manager.js';
export type {
	HealthMetrics,
	HealthMonitorConfig,
	HealthMonitorable,
	HealthEvent,
	HealthEventType,
	HealthEventListener,
} from './health-monitor.js';
export type { SceneEventObserver, EventBridgeStats } from './event-bridge.js';
export type {
	ConnectionConfig,
	ConnectionStatus,
	ImageFormat,
	InputVolume,
	RemoteDialer,
	RemoteEvent,
	RemoteEventListener,
	RemoteSession,
	RemoteVersion,
	SceneInfo,
	SceneList,
	ScreenshotRequest,
} from './types.js';
