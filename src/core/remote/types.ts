/**
 * Remote session contracts
 *
 * The connection layer only ever talks to OBS through these interfaces. The
 * obs-websocket implementation lives in obs-session.ts; tests supply fakes.
 */

export interface ConnectionConfig {
	host: string;
	port: number;
	password?: string;
}

export interface RemoteVersion {
	obsVersion: string;
	obsWebSocketVersion: string;
	platform: string;
	rpcVersion: number;
}

export const IMAGE_FORMATS = ['png', 'jpg', 'jpeg', 'webp', 'bmp'] as const;

export type ImageFormat = (typeof IMAGE_FORMATS)[number];

export const isImageFormat = (value: string): value is ImageFormat =>
	IMAGE_FORMATS.some(format => format === value);

export interface ScreenshotRequest {
	sourceName: string;
	imageFormat: ImageFormat;
	/** 0 keeps the source's own size */
	imageWidth?: number;
	imageHeight?: number;
	/** 0-100 compression hint */
	quality?: number;
}

export interface SceneInfo {
	name: string;
	index: number;
}

export interface SceneList {
	currentProgramSceneName: string;
	scenes: SceneInfo[];
}

export interface InputVolume {
	inputName: string;
	volumeMul: number;
	volumeDb: number;
}

/**
 * Push events the agent reacts to. Anything else arrives as `unrecognized`.
 */
export type RemoteEvent =
	| { kind: 'created'; sceneName: string }
	| { kind: 'removed'; sceneName: string }
	| { kind: 'current-changed'; sceneName: string }
	| { kind: 'unrecognized'; eventType: string };

export type RemoteEventListener = (event: RemoteEvent) => void;

/**
 * One open, authenticated connection to OBS.
 */
export interface RemoteSession {
	readonly address: string;

	getVersion(): Promise<RemoteVersion>;
	/**
	 * @returns base64 image data without the data-URI prefix
	 */
	takeScreenshot(request: ScreenshotRequest): Promise<string>;
	listScenes(): Promise<SceneList>;
	setCurrentScene(sceneName: string): Promise<void>;

	startRecording(): Promise<void>;
	stopRecording(): Promise<void>;
	pauseRecording(): Promise<void>;
	resumeRecording(): Promise<void>;
	startStreaming(): Promise<void>;
	stopStreaming(): Promise<void>;

	getInputVolume(inputName: string): Promise<InputVolume>;
	setInputVolume(inputName: string, volumeMul: number): Promise<void>;

	/**
	 * Deliver push events to `listener` until `signal` aborts
	 */
	onEvent(listener: RemoteEventListener, signal: AbortSignal): void;

	close(): Promise<void>;
}

export interface RemoteDialer {
	dial(config: ConnectionConfig): Promise<RemoteSession>;
}

export interface ConnectionStatus {
	connected: boolean;
	autoReconnect: boolean;
	address: string;
	version?: RemoteVersion;
}

export const formatAddress = (config: ConnectionConfig): string => `ws://${config.host}:${config.port}`;
