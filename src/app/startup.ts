import {
	ConnectionFailedError,
	describeError,
	logger as rootLogger,
	sleep,
	type ConnectionManager,
	type Logger,
} from '../core/index.js';

export interface ConnectWithRetryOptions {
	/** Attempts before giving up (default 3) */
	maxAttempts?: number;
	/** Fixed pause between attempts (default 2000 ms) */
	delayMs?: number;
	signal?: AbortSignal;
	logger?: Logger;
}

/**
 * Initial connection with a bounded number of attempts. Rejects with the last
 * ConnectionFailedError, numbered with the attempt it came from.
 */
export async function connectWithRetry(
	connection: Pick<ConnectionManager, 'connect'>,
	options: ConnectWithRetryOptions = {}
): Promise<void> {
	const maxAttempts = options.maxAttempts ?? 3;
	const delayMs = options.delayMs ?? 2000;
	const logger = options.logger ?? rootLogger.createChild({ component: 'startup' });

	let lastError: ConnectionFailedError | undefined;

	for (let attempt = 1; attempt <= maxAttempts; attempt++) {
		try {
			await connection.connect();
			return;
		} catch (error) {
			if (!(error instanceof ConnectionFailedError)) {
				throw error;
			}
			lastError = new ConnectionFailedError(error.address, error.cause, attempt);
			logger.warn(`Connection attempt ${attempt}/${maxAttempts} failed`, {
				error: describeError(error.cause),
			});
		}

		if (attempt < maxAttempts && !(await sleep(delayMs, options.signal))) {
			break;
		}
	}

	throw lastError ?? new ConnectionFailedError('OBS', new Error('no connection attempts were made'), 0);
}
