import type { ConnectionManager } from './connection-manager.js';
import type { InputVolume, RemoteVersion, SceneList, ScreenshotRequest } from './types.js';

/**
 * Typed OBS commands. Every call resolves the live session first and
 * rejects with NotConnectedError when there is none.
 */
export class RemoteCommands {
	constructor(private readonly connection: ConnectionManager) {}

	isConnected(): boolean {
		return this.connection.isConnected();
	}

	async getVersion(): Promise<RemoteVersion> {
		return this.connection.requireSession().getVersion();
	}

	async listScenes(): Promise<SceneList> {
		return this.connection.requireSession().listScenes();
	}

	async setCurrentScene(sceneName: string): Promise<void> {
		return this.connection.requireSession().setCurrentScene(sceneName);
	}

	async startRecording(): Promise<void> {
		return this.connection.requireSession().startRecording();
	}

	async stopRecording(): Promise<void> {
		return this.connection.requireSession().stopRecording();
	}

	async pauseRecording(): Promise<void> {
		return this.connection.requireSession().pauseRecording();
	}

	async resumeRecording(): Promise<void> {
		return this.connection.requireSession().resumeRecording();
	}

	async startStreaming(): Promise<void> {
		return this.connection.requireSession().startStreaming();
	}

	async stopStreaming(): Promise<void> {
		return this.connection.requireSession().stopStreaming();
	}

	async getInputVolume(inputName: string): Promise<InputVolume> {
		return this.connection.requireSession().getInputVolume(inputName);
	}

	/**
	 * @param volumeMul - linear multiplier, 0 is silence and 1 is unity gain
	 */
	async setInputVolume(inputName: string, volumeMul: number): Promise<void> {
		if (!Number.isFinite(volumeMul) || volumeMul < 0) {
			throw new RangeError(`Volume multiplier must be a non-negative number, got ${volumeMul}`);
		}
		await this.connection.requireSession().setInputVolume(inputName, volumeMul);
	}

	async takeSourceScreenshot(request: ScreenshotRequest): Promise<string> {
		return this.connection.requireSession().takeScreenshot(request);
	}
}
