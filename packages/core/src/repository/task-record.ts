/**
 * Task records and their sheet rows. Records are immutable; every lifecycle
 * step returns a new Task.
 */

import type { Task, TaskId } from '../types/task.js';
import { TaskStatus, isTaskStatus } from '../types/task-status.js';
import { Priority, PRIORITIES } from '../types/priority.js';
import { logger } from '../logger.js';

export const TASK_HEADER: readonly string[] = [
  'id', 'name', 'create_date', 'deadline', 'complete_date',
  'status', 'priority', 'category_id', 'project_id', 'notes',
];

/** 1-based sheet column of each task field */
export const TaskColumn = {
  Id: 1,
  Name: 2,
  CreateDate: 3,
  Deadline: 4,
  CompleteDate: 5,
  Status: 6,
  Priority: 7,
  Category: 8,
  Project: 9,
  Notes: 10,
} as const;

export type TaskColumn = (typeof TaskColumn)[keyof typeof TaskColumn];

export const ARCHIVE_HEADER: readonly string[] = [...TASK_HEADER, 'deleted_date'];

export const UNKNOWN_CATEGORY = 'Unknown Category';
export const UNKNOWN_PROJECT = 'none';

/** Display names for reference ids; always answers, falling back to a sentinel */
export interface ReferenceLookup {
  categoryName(id: string): string;
  projectName(id: string): string;
}

/** Cell value at a 1-based column; short rows read as blank */
export function cellAt(cells: readonly string[], column: TaskColumn): string {
  return cells[column - 1] ?? '';
}

export function rowTaskId(cells: readonly string[]): TaskId {
  return cellAt(cells, TaskColumn.Id).trim();
}

/** Lenient status read: matches case-insensitively, blank or unknown text loads as Pending */
export function parseStatusCell(value: string): TaskStatus {
  const trimmed = value.trim();
  if (isTaskStatus(trimmed)) return trimmed;
  const match = Object.values(TaskStatus).find(s => s.toLowerCase() === trimmed.toLowerCase());
  if (match) return match;
  if (trimmed) logger.warn({ status: trimmed }, 'Unknown task status, reading it as Pending');
  return TaskStatus.Pending;
}

/** Lenient priority read: blank or unknown text loads as no priority */
export function parsePriorityCell(value: string): Priority | null {
  const trimmed = value.trim().toLowerCase();
  if (!trimmed) return null;
  const match = PRIORITIES.find(p => p.toLowerCase() === trimmed);
  if (!match) logger.warn({ priority: value }, 'Unknown task priority, reading it as blank');
  return match ?? null;
}

function optionalDate(value: string): string | null {
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

/** Build a Task from its sheet row, resolving references to display names */
export function rowToTask(cells: readonly string[], refs: ReferenceLookup): Task {
  const categoryId = cellAt(cells, TaskColumn.Category).trim();
  const projectId = cellAt(cells, TaskColumn.Project).trim();
  return {
    id: rowTaskId(cells),
    name: cellAt(cells, TaskColumn.Name),
    createDate: optionalDate(cellAt(cells, TaskColumn.CreateDate)),
    deadline: cellAt(cells, TaskColumn.Deadline).trim(),
    completeDate: optionalDate(cellAt(cells, TaskColumn.CompleteDate)),
    status: parseStatusCell(cellAt(cells, TaskColumn.Status)),
    priority: parsePriorityCell(cellAt(cells, TaskColumn.Priority)),
    category: { id: categoryId, name: refs.categoryName(categoryId) },
    project: { id: projectId, name: refs.projectName(projectId) },
    notes: cellAt(cells, TaskColumn.Notes),
  };
}

/** Sheet row for a task, in the fixed column order */
export function taskToRow(task: Task): string[] {
  return [
    task.id,
    task.name,
    task.createDate ?? '',
    task.deadline,
    task.completeDate ?? '',
    task.status,
    task.priority ?? '',
    task.category.id,
    task.project.id,
    task.notes,
  ];
}

/**
 * Return a copy with a new status. Entering Completed stamps the completion
 * date once; leaving it clears the date.
 */
export function withStatus(task: Task, status: TaskStatus, date: string): Task {
  if (status === TaskStatus.Completed) {
    return {
      ...task,
      status,
      completeDate: task.status === TaskStatus.Completed ? task.completeDate : date,
    };
  }
  if (status === TaskStatus.Deleted) {
    return { ...task, status };
  }
  return { ...task, status, completeDate: null };
}

export function completeTask(task: Task, date: string): Task {
  return withStatus(task, TaskStatus.Completed, date);
}

export function archiveTask(task: Task): Task {
  return withStatus(task, TaskStatus.Deleted, '');
}

export function isArchived(task: Task): boolean {
  return task.status === TaskStatus.Deleted;
}
