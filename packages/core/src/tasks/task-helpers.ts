import { randomUUID } from 'node:crypto';
import type { Task, TaskDraft, TaskId } from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import { DEFAULT_PRIORITY, isPriority, type Priority } from '../types/priority.js';
import { ErrorCode, TaskrankError } from '../errors.js';

/** Generate a new task id */
export function generateId(): TaskId {
  return randomUUID();
}

/** Trim, lowercase, drop empties, collapse duplicates (first occurrence wins) */
export function normalizeTags(tags: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const tag of tags) {
    const t = tag.trim().toLowerCase();
    if (t) seen.add(t);
  }
  return [...seen];
}

/** updatedAt never falls behind createdAt, even if the clock moved backwards */
function touch(task: Task, now: Date): string {
  const iso = now.toISOString();
  return iso < task.createdAt ? task.createdAt : iso;
}

/** Create a new Task from a draft. Never sets completedAt. */
export function newTask(draft: TaskDraft, now: Date = new Date()): Task {
  const title = draft.title.trim();
  if (!title) {
    throw new TaskrankError(ErrorCode.InvalidTitle, 'Task title cannot be empty');
  }
  const priority = draft.priority ?? DEFAULT_PRIORITY;
  if (!isPriority(priority)) {
    throw new TaskrankError(ErrorCode.InvalidPriority, `Invalid priority: ${String(priority)}`);
  }

  const createdAt = now.toISOString();
  return {
    id: generateId(),
    title,
    description: draft.description?.trim() ?? '',
    priority,
    status: TaskStatus.Todo,
    tags: normalizeTags(draft.tags ?? []),
    dueDate: draft.dueDate ?? null,
    createdAt,
    updatedAt: createdAt,
    completedAt: null,
    previousCompletedAt: null,
  };
}

/**
 * Return a copy of the task marked Done with completedAt stamped.
 * Already-Done tasks come back unchanged, so the first completion time survives.
 */
export function markDone(task: Task, now: Date = new Date()): Task {
  if (task.status === TaskStatus.Done) return task;
  const updatedAt = touch(task, now);
  return {
    ...task,
    status: TaskStatus.Done,
    completedAt: updatedAt,
    updatedAt,
  };
}

/**
 * Return a copy of the task with a new status.
 * Done goes through markDone; leaving Done moves completedAt to previousCompletedAt.
 */
export function withStatus(task: Task, status: TaskStatus, now: Date = new Date()): Task {
  if (status === TaskStatus.Done) return markDone(task, now);

  const reopening = task.status === TaskStatus.Done;
  return {
    ...task,
    status,
    completedAt: null,
    previousCompletedAt: reopening ? task.completedAt : task.previousCompletedAt,
    updatedAt: touch(task, now),
  };
}

/** Return a copy of the task with a new priority; rejects values outside the closed set */
export function withPriority(task: Task, priority: Priority, now: Date = new Date()): Task {
  if (!isPriority(priority)) {
    throw new TaskrankError(ErrorCode.InvalidPriority, `Invalid priority: ${String(priority)}`);
  }
  return { ...task, priority, updatedAt: touch(task, now) };
}

/** Return a copy of the task with a new (or cleared) due date */
export function withDueDate(task: Task, dueDate: string | null, now: Date = new Date()): Task {
  return { ...task, dueDate, updatedAt: touch(task, now) };
}

export function withTags(task: Task, tags: Iterable<string>, now: Date = new Date()): Task {
  return { ...task, tags: normalizeTags(tags), updatedAt: touch(task, now) };
}

/** Null when the tag is already present */
export function addTag(task: Task, tag: string, now: Date = new Date()): Task | null {
  const [normalized] = normalizeTags([tag]);
  if (normalized === undefined || task.tags.includes(normalized)) return null;
  return withTags(task, [...task.tags, normalized], now);
}

/** Null when the tag is not present */
export function removeTag(task: Task, tag: string, now: Date = new Date()): Task | null {
  const [normalized] = normalizeTags([tag]);
  if (normalized === undefined || !task.tags.includes(normalized)) return null;
  return withTags(task, task.tags.filter(t => t !== normalized), now);
}

/** Past its due date and not Done */
export function isOverdue(task: Task, now: Date = new Date()): boolean {
  if (!task.dueDate || task.status === TaskStatus.Done) return false;
  return Date.parse(task.dueDate) < now.getTime();
}
