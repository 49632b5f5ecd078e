import type { Task } from '../src/types/task.js';
import { TaskStatus } from '../src/types/task-status.js';
import { Priority } from '../src/types/priority.js';

export const NOW = new Date('2026-03-10T12:00:00.000Z');

export const HOUR_MS = 3_600_000;
export const DAY_MS = 24 * HOUR_MS;

export function at(offsetMs: number, base: Date = NOW): Date {
  return new Date(base.getTime() + offsetMs);
}

export function iso(offsetMs: number, base: Date = NOW): string {
  return at(offsetMs, base).toISOString();
}

/** A Todo, Medium priority task created and last updated at NOW */
export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 'task-1',
    title: 'Write report',
    description: '',
    priority: Priority.Medium,
    status: TaskStatus.Todo,
    tags: [],
    dueDate: null,
    createdAt: NOW.toISOString(),
    updatedAt: NOW.toISOString(),
    completedAt: null,
    previousCompletedAt: null,
    ...overrides,
  };
}
