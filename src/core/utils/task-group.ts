/**
 * TaskGroup - structured background task tracking
 *
 * Every background loop of the agent (supervision, retention sweep, one
 * per capture worker) is spawned into a TaskGroup so shutdown can wait for
 * all of them to observe cancellation and return.
 */

export interface TaskResult {
	taskId: string;
	status: 'fulfilled' | 'rejected';
	reason?: unknown;
}

export interface TaskGroupConfig {
	/** Invoked when a task rejects; background loops are expected not to */
	onTaskError?: (taskId: string, error: unknown) => void;
}

export class TaskGroup {
	private tasks = new Map<string, Promise<void>>();
	private taskCounter = 0;
	private readonly config: TaskGroupConfig;

	constructor(config: TaskGroupConfig = {}) {
		this.config = config;
	}

	/**
	 * Start `taskFn` without awaiting it. The task is forgotten once it settles.
	 *
	 * @returns the task id
	 */
	spawn(taskFn: () => Promise<void>, taskId?: string): string {
		const id = taskId ?? `task-${++this.taskCounter}`;

		if (this.tasks.has(id)) {
			throw new Error(`Task with ID '${id}' already exists`);
		}

		const task = Promise.resolve()
			.then(taskFn)
			.catch(error => {
				this.config.onTaskError?.(id, error);
				throw error;
			})
			.finally(() => {
				if (this.tasks.get(id) === task) {
					this.tasks.delete(id);
				}
			});

		// Rejections are surfaced through onTaskError and waitForAll
		task.catch(() => undefined);

		this.tasks.set(id, task);
		return id;
	}

	/**
	 * Wait until every task currently in the group has settled.
	 * Tasks spawned while waiting are waited for as well.
	 */
	async waitForAll(): Promise<TaskResult[]> {
		const results: TaskResult[] = [];

		while (this.tasks.size > 0) {
			const entries = Array.from(this.tasks.entries());
			const settled = await Promise.allSettled(entries.map(([, task]) => task));

			settled.forEach((outcome, index) => {
				const taskId = entries[index][0];
				results.push(
					outcome.status === 'fulfilled'
						? { taskId, status: 'fulfilled' }
						: { taskId, status: 'rejected', reason: outcome.reason }
				);
			});
		}

		return results;
	}

	has(taskId: string): boolean {
		return this.tasks.has(taskId);
	}

	getActiveTaskCount(): number {
		return this.tasks.size;
	}

	getTaskIds(): string[] {
		return Array.from(this.tasks.keys());
	}
}
