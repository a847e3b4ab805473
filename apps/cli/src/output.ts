/**
 * chalk-based console output: messages, priority badges and the fixed-width
 * task table.
 */

import chalk from 'chalk';
import { ARCHIVE_HEADER, Priority, TaskColumn, isOverdue } from '@taskbook/core';
import type { Task, TaskResult, DataResult, ValidationIssue } from '@taskbook/core';

export const CONSOLE_WIDTH = 100;

export const COLUMN_WIDTHS = {
  id: 4,
  deadline: 10,
  priority: 8,
  status: 12,
  project: 20,
  // six columns, five separating spaces
  name: CONSOLE_WIDTH - (4 + 10 + 8 + 12 + 20 + 5),
} as const;

// --- Formatting functions ---

/** Cut to `width`, ending in "..." when shortened */
export function truncate(s: string, width: number): string {
  if (s.length <= width) return s;
  return s.slice(0, width - 3) + '...';
}

export function fit(s: string, width: number): string {
  return truncate(s, width).padEnd(width);
}

export function formatPriority(priority: Priority | null, width: number = COLUMN_WIDTHS.priority): string {
  const label = fit(priority ?? '', width);
  switch (priority) {
    case Priority.High: return chalk.bgRed.white(label);
    case Priority.Medium: return chalk.bgMagenta.white(label);
    case Priority.Low: return chalk.bgGreen.white(label);
    default: return chalk.bgBlack.white(label);
  }
}

export function formatDeadline(task: Task, today: string): string {
  const cell = fit(task.deadline, COLUMN_WIDTHS.deadline);
  return isOverdue(task, today) ? chalk.red(cell) : cell;
}

export function tableHeader(): string[] {
  const w = COLUMN_WIDTHS;
  const header = [
    fit('ID', w.id), fit('Deadline', w.deadline), fit('Priority', w.priority),
    fit('Status', w.status), fit('Project', w.project), 'Name',
  ].join(' ');
  return [chalk.bold.blue(header), '-'.repeat(CONSOLE_WIDTH)];
}

export function formatTaskRow(task: Task, today: string): string {
  const w = COLUMN_WIDTHS;
  return [
    fit(task.id, w.id),
    formatDeadline(task, today),
    formatPriority(task.priority),
    fit(task.status, w.status),
    fit(task.project.name, w.project),
    truncate(task.name, w.name),
  ].join(' ');
}

/** Header, rule and one line per task */
export function renderTaskTable(tasks: readonly Task[], today: string): string[] {
  return [...tableHeader(), ...tasks.map(t => formatTaskRow(t, today))];
}

export function printTaskTable(tasks: readonly Task[], today: string, emptyMessage = 'No tasks available.'): void {
  if (tasks.length === 0) {
    info(emptyMessage);
    return;
  }
  for (const line of renderTaskTable(tasks, today)) console.log(line);
}

/** Archived rows as stored: id, name and the date they were moved out */
export function renderArchivedRows(rows: readonly (readonly string[])[]): string[] {
  const header = `${fit('ID', COLUMN_WIDTHS.id)} ${fit('Archived', 10)} ${fit('Status', COLUMN_WIDTHS.status)} Name`;
  const lines = rows.map(cells => [
    fit(cells[TaskColumn.Id - 1] ?? '', COLUMN_WIDTHS.id),
    fit(cells[ARCHIVE_HEADER.length - 1] ?? '', 10),
    fit(cells[TaskColumn.Status - 1] ?? '', COLUMN_WIDTHS.status),
    truncate(cells[TaskColumn.Name - 1] ?? '', COLUMN_WIDTHS.name),
  ].join(' '));
  return [chalk.bold.blue(header), '-'.repeat(CONSOLE_WIDTH), ...lines];
}

export function formatTaskDetails(task: Task): string[] {
  return [
    `${chalk.bold(`Task ${task.id}`)}  ${task.name}`,
    `  Status:    ${task.status}`,
    `  Priority:  ${task.priority ?? '-'}`,
    `  Deadline:  ${task.deadline}`,
    `  Project:   ${task.project.name}`,
    `  Category:  ${task.category.name}`,
    `  Created:   ${task.createDate ?? '-'}`,
    `  Completed: ${task.completeDate ?? '-'}`,
    `  Notes:     ${task.notes || '-'}`,
  ];
}

// --- Result output ---

export function printIssue(issue: ValidationIssue): void {
  error(issue.message);
}

/** Print any result; returns true on success */
export function printResult(result: TaskResult | DataResult<unknown>): boolean {
  switch (result.type) {
    case 'success': success(result.message); return true;
    case 'not-found': error(`Task ID ${result.taskId} not found.`); return false;
    case 'no-change': info(result.message); return false;
    case 'invalid': printIssue(result.issue); return false;
    case 'error': error(result.message); return false;
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
