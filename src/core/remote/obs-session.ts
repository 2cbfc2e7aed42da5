import OBSWebSocket, { EventSubscription } from 'obs-websocket-js';
import { z } from 'zod';
import { logger } from '../logger/index.js';
import { describeError } from '../errors.js';
import {
	formatAddress,
	type ConnectionConfig,
	type InputVolume,
	type RemoteDialer,
	type RemoteEventListener,
	type RemoteSession,
	type RemoteVersion,
	type SceneList,
	type ScreenshotRequest,
} from './types.js';

const SceneListSchema = z.array(
	z.object({
		sceneName: z.string(),
		sceneIndex: z.number(),
	})
);

/**
 * OBS returns screenshots as `data:image/png;base64,...`; keep only the payload
 */
export function stripDataUri(imageData: string): string {
	const comma = imageData.indexOf(',');
	return imageData.startsWith('data:') && comma >= 0 ? imageData.slice(comma + 1) : imageData;
}

/**
 * RemoteSession over obs-websocket v5
 */
export class ObsSession implements RemoteSession {
	readonly address: string;
	private readonly obs: OBSWebSocket;
	private readonly log = logger.createChild({ component: 'obs-session' });

	constructor(obs: OBSWebSocket, address: string) {
		this.obs = obs;
		this.address = address;
	}

	async getVersion(): Promise<RemoteVersion> {
		const response = await this.obs.call('GetVersion');
		return {
			obsVersion: response.obsVersion,
			obsWebSocketVersion: response.obsWebSocketVersion,
			platform: response.platform,
			rpcVersion: response.rpcVersion,
		};
	}

	async takeScreenshot(request: ScreenshotRequest): Promise<string> {
		const response = await this.obs.call('GetSourceScreenshot', {
			sourceName: request.sourceName,
			imageFormat: request.imageFormat,
			...(request.imageWidth ? { imageWidth: request.imageWidth } : {}),
			...(request.imageHeight ? { imageHeight: request.imageHeight } : {}),
			...(request.quality !== undefined ? { imageCompressionQuality: request.quality } : {}),
		});
		return stripDataUri(response.imageData);
	}

	async listScenes(): Promise<SceneList> {
		const response = await this.obs.call('GetSceneList');
		const scenes = SceneListSchema.parse(response.scenes);
		return {
			currentProgramSceneName: response.currentProgramSceneName,
			scenes: scenes.map(scene => ({ name: scene.sceneName, index: scene.sceneIndex })),
		};
	}

	async setCurrentScene(sceneName: string): Promise<void> {
		await this.obs.call('SetCurrentProgramScene', { sceneName });
	}

	async startRecording(): Promise<void> {
		await this.obs.call('StartRecord');
	}

	async stopRecording(): Promise<void> {
		await this.obs.call('StopRecord');
	}

	async pauseRecording(): Promise<void> {
		await this.obs.call('PauseRecord');
	}

	async resumeRecording(): Promise<void> {
		await this.obs.call('ResumeRecord');
	}

	async startStreaming(): Promise<void> {
		await this.obs.call('StartStream');
	}

	async stopStreaming(): Promise<void> {
		await this.obs.call('StopStream');
	}

	async getInputVolume(inputName: string): Promise<InputVolume> {
		const response = await this.obs.call('GetInputVolume', { inputName });
		return { inputName, volumeMul: response.inputVolumeMul, volumeDb: response.inputVolumeDb };
	}

	async setInputVolume(inputName: string, volumeMul: number): Promise<void> {
		await this.obs.call('SetInputVolume', { inputName, inputVolumeMul: volumeMul });
	}

	onEvent(listener: RemoteEventListener, signal: AbortSignal): void {
		if (signal.aborted) return;

		const onCreated = (data: { sceneName: string }) => listener({ kind: 'created', sceneName: data.sceneName });
		const onRemoved = (data: { sceneName: string }) => listener({ kind: 'removed', sceneName: data.sceneName });
		const onCurrentChanged = (data: { sceneName: string }) =>
			listener({ kind: 'current-changed', sceneName: data.sceneName });
		const onNameChanged = () => listener({ kind: 'unrecognized', eventType: 'SceneNameChanged' });
		const onListChanged = () => listener({ kind: 'unrecognized', eventType: 'SceneListChanged' });

		this.obs.on('SceneCreated', onCreated);
		this.obs.on('SceneRemoved', onRemoved);
		this.obs.on('CurrentProgramSceneChanged', onCurrentChanged);
		this.obs.on('SceneNameChanged', onNameChanged);
		this.obs.on('SceneListChanged', onListChanged);

		signal.addEventListener(
			'abort',
			() => {
				this.obs.off('SceneCreated', onCreated);
				this.obs.off('SceneRemoved', onRemoved);
				this.obs.off('CurrentProgramSceneChanged', onCurrentChanged);
				this.obs.off('SceneNameChanged', onNameChanged);
				this.obs.off('SceneListChanged', onListChanged);
			},
			{ once: true }
		);
	}

	async close(): Promise<void> {
		this.log.debug('Closing OBS session', { address: this.address });
		await this.obs.disconnect();
	}
}

/**
 * Opens obs-websocket connections subscribed to scene events
 */
export class ObsDialer implements RemoteDialer {
	async dial(config: ConnectionConfig): Promise<RemoteSession> {
		const address = formatAddress(config);
		const obs = new OBSWebSocket();

		try {
			await obs.connect(address, config.password, { eventSubscriptions: EventSubscription.Scenes });
		} catch (error) {
			// connect can leave a half-open socket behind on auth failures
			await obs.disconnect().catch(closeError => {
				logger.debug('Discarding half-open OBS socket failed', {
					address,
					error: describeError(closeError),
				});
			});
			throw error;
		}

		return new ObsSession(obs, address);
	}
}
