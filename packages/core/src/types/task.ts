import type { TaskStatus } from './task-status.js';
import type { Priority } from './priority.js';

export type TaskId = string;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string;
  readonly priority: Priority;
  readonly status: TaskStatus;
  readonly tags: readonly string[];
  readonly dueDate: string | null; // ISO string
  readonly createdAt: string; // ISO string
  readonly updatedAt: string; // ISO string
  /** Set when the task transitions into Done, cleared when it is reopened */
  readonly completedAt: string | null;
  /** Completion stamp of the last time the task was reopened from Done */
  readonly previousCompletedAt: string | null;
}

/** Structured, unsaved task fields from the text parser or CLI options */
export interface TaskDraft {
  readonly title: string;
  readonly description?: string;
  readonly priority?: Priority;
  readonly dueDate?: string | null;
  readonly tags?: readonly string[];
}

/** Keyed by id, iteration follows insertion order */
export type TaskCollection = Map<TaskId, Task>;
