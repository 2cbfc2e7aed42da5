import type { ScreenshotRequest } from '../../remote/types.js';
import type { CaptureTarget } from '../../storage/backend/types.js';
import type { ScreenshotProvider } from '../types.js';

export const PNG_DATA = 'aGVsbG8=';

export function makeTarget(overrides: Partial<CaptureTarget> = {}): CaptureTarget {
	const now = new Date();
	return {
		id: 1,
		name: 'webcam',
		sourceName: 'Webcam',
		cadenceMs: 1000,
		imageFormat: 'png',
		imageWidth: 0,
		imageHeight: 0,
		quality: 80,
		enabled: true,
		createdAt: now,
		updatedAt: now,
		...overrides,
	};
}

/**
 * Records the fake-clock time of every screenshot request
 */
export class FakeProvider implements ScreenshotProvider {
	connected = true;
	/** 1-based call numbers that fail */
	readonly failOn = new Set<number>();
	/** Sources whose screenshots stay pending until release() */
	readonly held = new Set<string>();
	latencyMs = 0;
	readonly requests: ScreenshotRequest[] = [];
	readonly times: number[] = [];
	private waiting: Array<() => void> = [];

	isConnected(): boolean {
		return this.connected;
	}

	release(): void {
		const waiting = this.waiting;
		this.waiting = [];
		for (const resolve of waiting) {
			resolve();
		}
	}

	async takeSourceScreenshot(request: ScreenshotRequest): Promise<string> {
		this.requests.push(request);
		this.times.push(Date.now());
		const call = this.requests.length;
		if (this.held.has(request.sourceName)) {
			await new Promise<void>(resolve => this.waiting.push(resolve));
		}
		if (this.latencyMs > 0) {
			await new Promise<void>(resolve => setTimeout(resolve, this.latencyMs));
		}
		if (this.failOn.has(call)) {
			throw new Error('Source not found');
		}
		return PNG_DATA;
	}
}
