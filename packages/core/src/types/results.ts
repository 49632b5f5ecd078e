export type TaskResult =
  | { readonly type: 'success'; readonly message: string }
  | { readonly type: 'no-change'; readonly message: string }
  | { readonly type: 'not-found'; readonly taskId: string }
  | { readonly type: 'invalid-status'; readonly value: string }
  | { readonly type: 'invalid-priority'; readonly value: string }
  | { readonly type: 'invalid-date'; readonly value: string }
  | { readonly type: 'invalid-title'; readonly message: string }
  | { readonly type: 'invalid-tag'; readonly value: string }
  | { readonly type: 'write-failed'; readonly message: string };

export type DataResult<T> =
  | { readonly type: 'success'; readonly data: T; readonly message: string }
  | Exclude<TaskResult, { readonly type: 'success' }>;

export type FailedResult = Exclude<TaskResult, { readonly type: 'success' } | { readonly type: 'no-change' }>;

// Helper functions
export function isSuccess(r: TaskResult): r is { type: 'success'; message: string } {
  return r.type === 'success';
}

/** Anything other than success or no-change */
export function isError(r: TaskResult | DataResult<unknown>): r is FailedResult {
  return r.type !== 'success' && r.type !== 'no-change';
}
