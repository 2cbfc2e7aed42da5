import {
	formatAddress,
	type ConnectionConfig,
	type InputVolume,
	type RemoteDialer,
	type RemoteEvent,
	type RemoteEventListener,
	type RemoteSession,
	type RemoteVersion,
	type SceneList,
	type ScreenshotRequest,
} from '../types.js';

export const TEST_CONFIG: ConnectionConfig = { host: 'localhost', port: 4455, password: 'test-secret' };

export const TEST_VERSION: RemoteVersion = {
	obsVersion: '30.0.0',
	obsWebSocketVersion: '5.3.0',
	platform: 'linux',
	rpcVersion: 1,
};

/**
 * In-process RemoteSession. Flip the `*Error` fields to make calls fail.
 */
export class FakeSession implements RemoteSession {
	readonly address: string;
	closed = false;
	/** getVersion waits for this before answering */
	versionGate?: Promise<void>;
	versionError?: Error;
	screenshotError?: Error;
	screenshotData = 'aGVsbG8=';
	scenes: SceneList = {
		currentProgramSceneName: 'Main',
		scenes: [
			{ name: 'Main', index: 0 },
			{ name: 'BRB', index: 1 },
		],
	};
	readonly calls: string[] = [];
	readonly volumes = new Map<string, number>();
	private listeners = new Set<RemoteEventListener>();

	constructor(address = formatAddress(TEST_CONFIG)) {
		this.address = address;
	}

	async getVersion(): Promise<RemoteVersion> {
		this.calls.push('getVersion');
		if (this.versionGate) {
			await this.versionGate;
		}
		if (this.versionError) {
			throw this.versionError;
		}
		return TEST_VERSION;
	}

	async takeScreenshot(request: ScreenshotRequest): Promise<string> {
		this.calls.push(`takeScreenshot:${request.sourceName}`);
		if (this.screenshotError) {
			throw this.screenshotError;
		}
		return this.screenshotData;
	}

	async listScenes(): Promise<SceneList> {
		this.calls.push('listScenes');
		return this.scenes;
	}

	async setCurrentScene(sceneName: string): Promise<void> {
		this.calls.push(`setCurrentScene:${sceneName}`);
		this.scenes = { ...this.scenes, currentProgramSceneName: sceneName };
	}

	async startRecording(): Promise<void> {
		this.calls.push('startRecording');
	}

	async stopRecording(): Promise<void> {
		this.calls.push('stopRecording');
	}

	async pauseRecording(): Promise<void> {
		this.calls.push('pauseRecording');
	}

	async resumeRecording(): Promise<void> {
		this.calls.push('resumeRecording');
	}

	async startStreaming(): Promise<void> {
		this.calls.push('startStreaming');
	}

	async stopStreaming(): Promise<void> {
		this.calls.push('stopStreaming');
	}

	async getInputVolume(inputName: string): Promise<InputVolume> {
		this.calls.push(`getInputVolume:${inputName}`);
		const volumeMul = this.volumes.get(inputName) ?? 1;
		return { inputName, volumeMul, volumeDb: volumeMul === 0 ? -100 : 20 * Math.log10(volumeMul) };
	}

	async setInputVolume(inputName: string, volumeMul: number): Promise<void> {
		this.calls.push(`setInputVolume:${inputName}`);
		this.volumes.set(inputName, volumeMul);
	}

	onEvent(listener: RemoteEventListener, signal: AbortSignal): void {
		if (signal.aborted) {
			return;
		}
		this.listeners.add(listener);
		signal.addEventListener('abort', () => this.listeners.delete(listener), { once: true });
	}

	/**
	 * Push an event to every live listener
	 */
	emit(event: RemoteEvent): void {
		for (const listener of this.listeners) {
			listener(event);
		}
	}

	listenerCount(): number {
		return this.listeners.size;
	}

	async close(): Promise<void> {
		this.calls.push('close');
		this.closed = true;
	}
}

/**
 * Hands out FakeSessions while `reachable` is true
 */
export class FakeDialer implements RemoteDialer {
	reachable = true;
	dialCount = 0;
	readonly sessions: FakeSession[] = [];

	async dial(config: ConnectionConfig): Promise<RemoteSession> {
		this.dialCount++;
		if (!this.reachable) {
			throw new Error('connect ECONNREFUSED');
		}
		const session = new FakeSession(formatAddress(config));
		this.sessions.push(session);
		return session;
	}

	get lastSession(): FakeSession | undefined {
		return this.sessions[this.sessions.length - 1];
	}
}
