export { TaskManager, shortId } from './task-manager.js';
export type { TaskManagerOptions, RawTaskOptions, RawTaskFilter, AddResult, TaskStats } from './task-manager.js';
