/**
 * Error taxonomy shared by the connection, capture and storage layers.
 *
 * Background loops log these and keep going; foreground calls reject with them.
 */

export type ErrorCode =
	| 'CONNECTION_FAILED'
	| 'NOT_CONNECTED'
	| 'PROBE_FAILED'
	| 'CAPTURE_FAILED'
	| 'PERSIST_FAILED'
	| 'TARGET_NOT_FOUND'
	| 'TARGET_EXISTS'
	| 'REGISTRY_STATE'
	| 'STORAGE_ERROR'
	| 'STORAGE_CONNECTION'
	| 'STORAGE_CONFLICT';

export const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Base class for every scenewatch error
 */
export abstract class ScenewatchError extends Error {
	public readonly code: ErrorCode;
	public readonly recoverable: boolean;
	public readonly timestamp: Date;

	constructor(message: string, code: ErrorCode, recoverable: boolean, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = this.constructor.name;
		this.code = code;
		this.recoverable = recoverable;
		this.timestamp = new Date();

		// Ensure the prototype chain is correct
		Object.setPrototypeOf(this, new.target.prototype);
	}

	/**
	 * Convert error to a serializable object
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			recoverable: this.recoverable,
			timestamp: this.timestamp.toISOString(),
			...(this.cause === undefined ? {} : { cause: describeError(this.cause) }),
		};
	}
}

/**
 * Dialing the remote failed. The manager holds no session afterwards.
 */
export class ConnectionFailedError extends ScenewatchError {
	public readonly address: string;
	public readonly attempt: number;

	constructor(address: string, cause?: unknown, attempt = 1) {
		super(`Failed to connect to ${address}: ${describeError(cause)}`, 'CONNECTION_FAILED', true, cause);
		this.address = address;
		this.attempt = attempt;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), address: this.address, attempt: this.attempt };
	}
}

export class NotConnectedError extends ScenewatchError {
	constructor(message = 'Not connected to OBS') {
		super(message, 'NOT_CONNECTED', true);
	}
}

/**
 * A liveness round trip on an open session failed
 */
export class ProbeFailedError extends ScenewatchError {
	constructor(message: string, cause?: unknown) {
		super(message, 'PROBE_FAILED', true, cause);
	}
}

/**
 * Raised by getStatus when the version query fails on a session believed to be live
 */
export class StatusProbeFailedError extends ProbeFailedError {
	constructor(cause?: unknown) {
		super(`Connected but failed to get version (connection may be broken): ${describeError(cause)}`, cause);
	}
}

export class CaptureFailedError extends ScenewatchError {
	public readonly targetId: number;

	constructor(targetId: number, cause?: unknown) {
		super(`Screenshot failed for target ${targetId}: ${describeError(cause)}`, 'CAPTURE_FAILED', true, cause);
		this.targetId = targetId;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), targetId: this.targetId };
	}
}

export class PersistFailedError extends ScenewatchError {
	public readonly targetId: number;

	constructor(targetId: number, cause?: unknown) {
		super(`Failed to save screenshot for target ${targetId}: ${describeError(cause)}`, 'PERSIST_FAILED', true, cause);
		this.targetId = targetId;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), targetId: this.targetId };
	}
}

export class TargetNotFoundError extends ScenewatchError {
	public readonly targetId: number;

	constructor(targetId: number) {
		super(`Capture target not found: ${targetId}`, 'TARGET_NOT_FOUND', false);
		this.targetId = targetId;
	}
}

export class TargetExistsError extends ScenewatchError {
	public readonly targetId: number;

	constructor(targetId: number) {
		super(`Capture target already registered: ${targetId}`, 'TARGET_EXISTS', false);
		this.targetId = targetId;
	}
}

export class RegistryStateError extends ScenewatchError {
	constructor(message: string) {
		super(message, 'REGISTRY_STATE', false);
	}
}

export const isScenewatchError = (error: unknown): error is ScenewatchError =>
	error instanceof ScenewatchError;
