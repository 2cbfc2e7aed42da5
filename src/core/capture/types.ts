import type { ImageFormat, ScreenshotRequest } from '../remote/types.js';
import type { CaptureStore, CaptureTarget } from '../storage/backend/types.js';
import type { Logger } from '../logger/index.js';

/**
 * Where workers get screenshots from. RemoteCommands in production.
 */
export interface ScreenshotProvider {
	isConnected(): boolean;
	takeSourceScreenshot(request: ScreenshotRequest): Promise<string>;
}

export interface CaptureWorkerDeps {
	provider: ScreenshotProvider;
	store: Pick<CaptureStore, 'saveArtifact'>;
	logger?: Logger;
}

/**
 * What one capture cycle did
 */
export type CaptureOutcome = 'saved' | 'skipped' | 'capture_failed' | 'discarded' | 'persist_failed';

export interface CaptureWorkerStats {
	saved: number;
	skipped: number;
	captureFailures: number;
	persistFailures: number;
	discarded: number;
	lastCaptureAt?: Date;
}

export interface WorkerInfo {
	targetId: number;
	targetName: string;
	sourceName: string;
	cadenceMs: number;
	stats: CaptureWorkerStats;
}

export interface SweepResult {
	/** Targets whose history was trimmed successfully */
	targets: number;
	/** Artifacts deleted across all targets */
	deleted: number;
	/** Targets that failed, or 1 when the target list itself could not be read */
	failures: number;
}

export function mimeTypeFor(format: ImageFormat): string {
	switch (format) {
		case 'jpg':
		case 'jpeg':
			return 'image/jpeg';
		case 'webp':
			return 'image/webp';
		case 'bmp':
			return 'image/bmp';
		default:
			return 'image/png';
	}
}

/**
 * Approximate decoded size of a base64 payload
 */
export function base64Size(imageData: string): number {
	return Math.floor((imageData.length * 3) / 4);
}

export function screenshotRequestFor(target: CaptureTarget): ScreenshotRequest {
	return {
		sourceName: target.sourceName,
		imageFormat: target.imageFormat,
		imageWidth: target.imageWidth,
		imageHeight: target.imageHeight,
		quality: target.quality,
	};
}
