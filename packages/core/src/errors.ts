/**
 * Typed errors for the store and configuration layers.
 * Domain failures inside the manager are reported as TaskResult variants instead.
 */

export const ErrorCode = {
  InvalidPriority: 'INVALID_PRIORITY',
  InvalidStatus: 'INVALID_STATUS',
  InvalidDate: 'INVALID_DATE',
  InvalidTitle: 'INVALID_TITLE',
  TaskNotFound: 'TASK_NOT_FOUND',
  CorruptStore: 'CORRUPT_STORE',
  WriteFailed: 'WRITE_FAILED',
  ConfigError: 'CONFIG_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Process exit code per error, used by the CLI */
export const EXIT_CODES: Record<ErrorCode, number> = {
  [ErrorCode.InvalidPriority]: 2,
  [ErrorCode.InvalidStatus]: 2,
  [ErrorCode.InvalidDate]: 2,
  [ErrorCode.InvalidTitle]: 2,
  [ErrorCode.TaskNotFound]: 4,
  [ErrorCode.CorruptStore]: 5,
  [ErrorCode.WriteFailed]: 6,
  [ErrorCode.ConfigError]: 7,
};

export class TaskrankError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'TaskrankError';
    this.code = code;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

export function isTaskrankError(err: unknown, code?: ErrorCode): err is TaskrankError {
  return err instanceof TaskrankError && (code === undefined || err.code === code);
}

/** Message of any thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
