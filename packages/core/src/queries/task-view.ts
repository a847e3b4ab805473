/**
 * Pure views over loaded tasks: the active set, sorting, filtering and counts.
 */

import type { Task } from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import type { Priority } from '../types/priority.js';
import { PriorityRank, EMPTY_PRIORITY_RANK } from '../types/priority.js';

export type SortKey = 'priority' | 'deadline' | 'status' | 'project' | 'name';

export const SORT_KEYS: readonly SortKey[] = ['priority', 'deadline', 'status', 'project', 'name'];

export interface TaskFilter {
  readonly projectId?: string;
  readonly categoryId?: string;
  readonly priority?: Priority;
}

export type TaskStats = Record<TaskStatus, number> & { readonly total: number };

export function isSortKey(value: string): value is SortKey {
  return (SORT_KEYS as readonly string[]).includes(value);
}

/** Tasks not archived */
export function activeTasks(tasks: readonly Task[]): Task[] {
  return tasks.filter(t => t.status !== TaskStatus.Deleted);
}

function priorityRank(task: Task): number {
  return task.priority ? PriorityRank[task.priority] : EMPTY_PRIORITY_RANK;
}

function byText(pick: (t: Task) => string): (a: Task, b: Task) => number {
  return (a, b) => pick(a).toLowerCase().localeCompare(pick(b).toLowerCase());
}

const COMPARATORS: Record<SortKey, (a: Task, b: Task) => number> = {
  priority: (a, b) => priorityRank(a) - priorityRank(b),
  // blank deadlines sort first
  deadline: (a, b) => (a.deadline < b.deadline ? -1 : a.deadline > b.deadline ? 1 : 0),
  status: byText(t => t.status),
  project: byText(t => t.project.name),
  name: byText(t => t.name),
};

/** Stable sort by one key; returns a new array */
export function sortTasks(tasks: readonly Task[], key: SortKey): Task[] {
  return [...tasks].sort(COMPARATORS[key]);
}

export function filterTasks(tasks: readonly Task[], filter: TaskFilter): Task[] {
  return tasks.filter(t =>
    (filter.projectId === undefined || t.project.id === filter.projectId)
    && (filter.categoryId === undefined || t.category.id === filter.categoryId)
    && (filter.priority === undefined || t.priority === filter.priority));
}

/** Deadline strictly before today and not yet completed */
export function isOverdue(task: Task, today: string): boolean {
  return task.deadline !== '' && task.deadline < today && task.status !== TaskStatus.Completed;
}

export function getStats(tasks: readonly Task[]): TaskStats {
  const counts: Record<TaskStatus, number> = {
    [TaskStatus.Pending]: 0,
    [TaskStatus.InProgress]: 0,
    [TaskStatus.Completed]: 0,
    [TaskStatus.Deleted]: 0,
  };
  for (const t of tasks) counts[t.status]++;
  return { ...counts, total: tasks.length };
}
