import type { Task } from './task.js';
import type { ValidationIssue } from '../validation/validators.js';

/** Outcome of a repository mutation. Remote failures are thrown, never returned. */
export type TaskResult =
  | { readonly type: 'success'; readonly message: string }
  | { readonly type: 'not-found'; readonly taskId: string }
  | { readonly type: 'no-change'; readonly message: string }
  | { readonly type: 'invalid'; readonly issue: ValidationIssue }
  | { readonly type: 'error'; readonly message: string };

export type DataResult<T> =
  | { readonly type: 'success'; readonly data: T; readonly message: string }
  | { readonly type: 'not-found'; readonly taskId: string }
  | { readonly type: 'no-change'; readonly message: string }
  | { readonly type: 'invalid'; readonly issue: ValidationIssue }
  | { readonly type: 'error'; readonly message: string };

export interface TaskChange {
  readonly task: Task;
  readonly warnings: readonly string[];
}
