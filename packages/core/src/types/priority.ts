export const Priority = {
  Low: 1,
  Medium: 2,
  High: 3,
  Urgent: 4,
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PriorityName: Record<Priority, string> = {
  [Priority.Low]: 'Low',
  [Priority.Medium]: 'Medium',
  [Priority.High]: 'High',
  [Priority.Urgent]: 'Urgent',
};

export const DEFAULT_PRIORITY: Priority = Priority.Medium;

const PRIORITY_VALUES: readonly number[] = Object.values(Priority);

/** True for the integer weights of the closed priority set (also the on-disk form) */
export function isPriority(value: unknown): value is Priority {
  return typeof value === 'number' && PRIORITY_VALUES.includes(value);
}

/**
 * Parse external input into a Priority.
 * Accepts the weight (1-4) or the name, case-insensitive.
 */
export function parsePriority(input: string): Priority | null {
  switch (input.trim().toLowerCase()) {
    case '1': case 'low': return Priority.Low;
    case '2': case 'medium': case 'med': return Priority.Medium;
    case '3': case 'high': return Priority.High;
    case '4': case 'urgent': return Priority.Urgent;
    default: return null;
  }
}
