/**
 * Wait for `ms` milliseconds or until `signal` aborts, whichever comes first.
 *
 * @returns true if the full delay elapsed, false if the signal aborted
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
	return new Promise<boolean>(resolve => {
		if (signal?.aborted) {
			resolve(false);
			return;
		}

		const onAbort = () => {
			clearTimeout(timer);
			resolve(false);
		};

		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve(true);
		}, ms);

		signal?.addEventListener('abort', onAbort, { once: true });
	});
}
