import type { TaskStatus } from './task-status.js';
import type { Priority } from './priority.js';

export type TaskId = string;

/** A project or category as seen from a task: the stored id plus its resolved display name */
export interface Reference {
  readonly id: string;
  readonly name: string;
}

export interface Task {
  readonly id: TaskId;
  readonly name: string;
  readonly createDate: string | null; // yyyy-MM-dd
  readonly deadline: string; // yyyy-MM-dd
  readonly completeDate: string | null; // yyyy-MM-dd, set once on completion
  readonly status: TaskStatus;
  readonly priority: Priority | null;
  readonly category: Reference;
  readonly project: Reference;
  readonly notes: string;
}

export interface NewTaskInput {
  readonly name: string;
  readonly deadline: string;
  readonly priority: string;
  readonly categoryId: string;
  readonly projectId: string;
  readonly notes?: string;
  /** Defaults to the current date */
  readonly createDate?: string;
}

export type TaskField = 'name' | 'deadline' | 'priority' | 'notes' | 'status' | 'category' | 'project';

/** One field change, value as entered by the user */
export type FieldUpdate =
  | { readonly field: 'name'; readonly value: string }
  | { readonly field: 'deadline'; readonly value: string }
  | { readonly field: 'priority'; readonly value: string }
  | { readonly field: 'notes'; readonly value: string }
  | { readonly field: 'status'; readonly value: string }
  | { readonly field: 'category'; readonly value: string }
  | { readonly field: 'project'; readonly value: string };

export const TASK_FIELDS: readonly TaskField[] = [
  'name', 'deadline', 'priority', 'notes', 'status', 'category', 'project',
];
