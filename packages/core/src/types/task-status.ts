/** Values double as the on-disk representation */
export const TaskStatus = {
  Todo: 'todo',
  InProgress: 'in_progress',
  Review: 'review',
  Done: 'done',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

/** Reverse mapping for display purposes */
export const TaskStatusName: Record<TaskStatus, string> = {
  [TaskStatus.Todo]: 'Todo',
  [TaskStatus.InProgress]: 'InProgress',
  [TaskStatus.Review]: 'Review',
  [TaskStatus.Done]: 'Done',
};

const STATUS_VALUES: readonly string[] = Object.values(TaskStatus);

export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string' && STATUS_VALUES.includes(value);
}

/** Parse external input into a TaskStatus, or null when it is not in the closed set */
export function parseStatus(input: string): TaskStatus | null {
  switch (input.trim().toLowerCase()) {
    case 'todo': case 'to-do': return TaskStatus.Todo;
    case 'in_progress': case 'in-progress': case 'inprogress': case 'wip': return TaskStatus.InProgress;
    case 'review': return TaskStatus.Review;
    case 'done': case 'complete': case 'completed': return TaskStatus.Done;
    default: return null;
  }
}

/** Status label for messages */
export function statusLabel(status: TaskStatus): string {
  switch (status) {
    case TaskStatus.Todo: return 'todo';
    case TaskStatus.InProgress: return 'in-progress';
    case TaskStatus.Review: return 'review';
    case TaskStatus.Done: return 'done';
  }
}
