/**
 * Async coordination primitives shared by the connection and capture subsystems
 */

export { AsyncLock } from './async-lock.js';
export { AbortManager } from './abort-manager.js';
export { TaskGroup } from './task-group.js';
export { sleep } from './sleep.js';

export type { AbortManagerConfig, CleanupCallback } from './abort-manager.js';
export type { TaskGroupConfig, TaskResult } from './task-group.js';
