import { TARGET_DEFAULTS } from '../constants.js';
import type { CaptureTarget, CaptureTargetUpdate, CapturedArtifact, NewCaptureTarget } from './types.js';

export type ResolvedNewTarget = Required<NewCaptureTarget>;

/**
 * Fill in omitted fields. Non-positive cadence and quality count as omitted.
 */
export function withTargetDefaults(target: NewCaptureTarget): ResolvedNewTarget {
	return {
		name: target.name,
		sourceName: target.sourceName,
		cadenceMs: target.cadenceMs && target.cadenceMs > 0 ? target.cadenceMs : TARGET_DEFAULTS.CADENCE_MS,
		imageFormat: target.imageFormat ?? TARGET_DEFAULTS.IMAGE_FORMAT,
		imageWidth: target.imageWidth ?? 0,
		imageHeight: target.imageHeight ?? 0,
		quality: target.quality && target.quality > 0 ? target.quality : TARGET_DEFAULTS.QUALITY,
		enabled: target.enabled ?? true,
	};
}

/**
 * Newest first; same-millisecond captures fall back to id, higher first
 */
export function compareNewestFirst(a: CapturedArtifact, b: CapturedArtifact): number {
	return b.capturedAt.getTime() - a.capturedAt.getTime() || b.id - a.id;
}

export function assertKeepCount(keep: number): void {
	if (!Number.isInteger(keep) || keep < 0) {
		throw new RangeError(`keep must be a non-negative integer, got ${keep}`);
	}
}

/**
 * Merge an update into a stored target; undefined fields keep their value
 */
export function applyTargetUpdate(existing: CaptureTarget, update: CaptureTargetUpdate): CaptureTarget {
	return {
		...existing,
		sourceName: update.sourceName ?? existing.sourceName,
		cadenceMs: update.cadenceMs ?? existing.cadenceMs,
		imageFormat: update.imageFormat ?? existing.imageFormat,
		imageWidth: update.imageWidth ?? existing.imageWidth,
		imageHeight: update.imageHeight ?? existing.imageHeight,
		quality: update.quality ?? existing.quality,
		enabled: update.enabled ?? existing.enabled,
		updatedAt: new Date(),
	};
}
