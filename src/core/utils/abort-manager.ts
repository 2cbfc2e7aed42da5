/**
 * AbortManager - hierarchical cancellation scopes
 *
 * Wraps AbortController with parent/child linkage and cleanup callbacks.
 * The agent roots one manager per long-lived component; every background
 * loop runs under a child scope so that aborting the root reaches all of them.
 */

import { logger } from '../logger/index.js';

export type CleanupCallback = () => void | Promise<void>;

export interface AbortManagerConfig {
	/** Parent signal; aborting it aborts this manager */
	parentSignal?: AbortSignal;
}

export class AbortManager {
	private controller = new AbortController();
	private cleanupCallbacks: CleanupCallback[] = [];
	private childManagers = new Set<AbortManager>();
	private parentManager?: AbortManager;
	private abortReason?: string;

	constructor(config: AbortManagerConfig = {}) {
		if (config.parentSignal) {
			this.linkWithParentSignal(config.parentSignal);
		}
	}

	get signal(): AbortSignal {
		return this.controller.signal;
	}

	get aborted(): boolean {
		return this.controller.signal.aborted;
	}

	get reason(): string | undefined {
		return this.abortReason;
	}

	/**
	 * Abort this scope and every child scope, then run cleanup callbacks
	 */
	abort(reason = 'aborted'): void {
		if (this.aborted) {
			return;
		}

		this.abortReason = reason;
		this.controller.abort(reason);

		for (const child of this.childManagers) {
			child.abort(reason);
		}
		this.childManagers.clear();

		if (this.parentManager) {
			this.parentManager.childManagers.delete(this);
		}

		this.runCleanupCallbacks();
	}

	/**
	 * Register a callback that runs once when this scope is aborted.
	 * Runs immediately if the scope is already aborted.
	 *
	 * @returns a function that unregisters the callback
	 */
	addCleanup(callback: CleanupCallback): () => void {
		if (this.aborted) {
			this.runSingleCleanup(callback);
			return () => {};
		}

		this.cleanupCallbacks.push(callback);

		return () => {
			const index = this.cleanupCallbacks.indexOf(callback);
			if (index >= 0) {
				this.cleanupCallbacks.splice(index, 1);
			}
		};
	}

	/**
	 * Create a child scope that is aborted together with this one
	 */
	createChild(): AbortManager {
		const child = new AbortManager({ parentSignal: this.signal });
		if (!this.aborted) {
			child.parentManager = this;
			this.childManagers.add(child);
		}
		return child;
	}

	getChildCount(): number {
		return this.childManagers.size;
	}

	private linkWithParentSignal(parentSignal: AbortSignal): void {
		if (parentSignal.aborted) {
			this.abort(String(parentSignal.reason ?? 'parent aborted'));
			return;
		}

		const onParentAbort = () => this.abort(String(parentSignal.reason ?? 'parent aborted'));
		parentSignal.addEventListener('abort', onParentAbort, { once: true });
		this.addCleanup(() => parentSignal.removeEventListener('abort', onParentAbort));
	}

	private runCleanupCallbacks(): void {
		const callbacks = this.cleanupCallbacks;
		this.cleanupCallbacks = [];

		for (const callback of callbacks) {
			this.runSingleCleanup(callback);
		}
	}

	private runSingleCleanup(callback: CleanupCallback): void {
		try {
			const result = callback();
			if (result instanceof Promise) {
				result.catch(error => {
					logger.error('Error in async abort cleanup callback', {
						error: error instanceof Error ? error.message : String(error),
					});
				});
			}
		} catch (error) {
			logger.error('Error in abort cleanup callback', {
				error: error instanceof Error ? error.message : String(error),
			});
		}
	}
}
