export interface TaskError {
  readonly code: string;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

/**
 * Explicit result of a fallible task step. Transient failures are reported
 * through this shape; thrown errors are reserved for broken invariants.
 */
export type TaskOutcome<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: TaskError };

export function taskSuccess<T>(value: T): TaskOutcome<T> {
  return { success: true, value };
}

export function taskFailure<T = never>(
  code: string,
  message: string,
  details?: Readonly<Record<string, unknown>>,
): TaskOutcome<T> {
  return {
    success: false,
    error: details === undefined ? { code, message } : { code, message, details },
  };
}

export const TASK_OK: TaskOutcome<undefined> = Object.freeze({
  success: true,
  value: undefined,
});

/**
 * What a task asks its system to do after a run.
 */
export type TaskRunResult<TData> =
  | { readonly status: 'running' }
  | { readonly status: 'success' }
  | { readonly status: 'replace'; readonly replacement: TData };

export const RUNNING = Object.freeze({ status: 'running' } as const);
export const SUCCESS = Object.freeze({ status: 'success' } as const);

export function replaceWith<TData>(replacement: TData): TaskRunResult<TData> {
  return { status: 'replace', replacement };
}
