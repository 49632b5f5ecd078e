export { TaskStatus, TaskStatusName, isTaskStatus, parseStatus, statusLabel } from './task-status.js';
export { Priority, PriorityName, DEFAULT_PRIORITY, isPriority, parsePriority } from './priority.js';
export type { TaskId, Task, TaskDraft, TaskCollection } from './task.js';
export type { TaskResult, DataResult, FailedResult } from './results.js';
export { isSuccess, isError } from './results.js';
