export { CaptureRegistry } from './registry.js';
export { CaptureWorker } from './worker.js';
export { RetentionSweeper } from './retention-sweeper.js';
export { mimeTypeFor, base64Size, screenshotRequestFor } from './types.js';

export type { CaptureRegistryOptions } from './registry.js';
export type { RetentionSweeperOptions } from './retention-sweeper.js';
export type {
	CaptureOutcome,
	CaptureWorkerDeps,
	CaptureWorkerStats,
	ScreenshotProvider,
	SweepResult,
	WorkerInfo,
} from './types.js';
