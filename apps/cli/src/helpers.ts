/**
 * CLI helpers: error handling, argument parsing, date shortcuts.
 */

import { InvalidArgumentError } from 'commander';
import {
  Priority, TaskStatus, TASK_FIELDS, addDays, formatDate, errorMessage, isSortKey, logger,
} from '@taskbook/core';
import type { TaskRepository, TaskField, SortKey, UserStatus, TaskResult, DataResult } from '@taskbook/core';
import * as out from './output.js';

/** Opens the repository on first use; every command shares the same one */
export type RepositoryOpener = () => Promise<TaskRepository>;

/**
 * Run a command action, printing any failure in red and flagging the exit code.
 */
export async function $try(fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    logger.debug({ err }, 'Command failed');
    out.error(errorMessage(err));
    process.exitCode = 1;
  }
}

/**
 * Print a repository result. Anything but success or no-change marks the run
 * as failed.
 */
export function report(result: TaskResult | DataResult<unknown>): boolean {
  const ok = out.printResult(result);
  if (result.type !== 'success' && result.type !== 'no-change') process.exitCode = 1;
  return ok;
}

/**
 * Parse a priority argument, any case, into the stored label.
 */
export function parsePriorityArg(level: string): Priority | null {
  switch (level.trim().toLowerCase()) {
    case 'high': case '1': case 'p1': return Priority.High;
    case 'medium': case '2': case 'p2': return Priority.Medium;
    case 'low': case '3': case 'p3': return Priority.Low;
    default: return null;
  }
}

/**
 * Parse a status argument into a status a user may set.
 */
export function parseStatusArg(status: string): UserStatus | null {
  switch (status.trim().toLowerCase()) {
    case 'pending': return TaskStatus.Pending;
    case 'in progress': case 'in-progress': case 'inprogress': case 'wip': return TaskStatus.InProgress;
    case 'completed': case 'complete': case 'done': return TaskStatus.Completed;
    default: return null;
  }
}

export function parseSortKey(value: string): SortKey | null {
  const key = value.trim().toLowerCase();
  return isSortKey(key) ? key : null;
}

export function parseField(value: string): TaskField | null {
  const field = value.trim().toLowerCase();
  return TASK_FIELDS.find(f => f === field) ?? null;
}

/**
 * Resolve a deadline shortcut: today, tomorrow, +Nd, +Nw. Anything else is
 * returned trimmed for the validator to judge.
 */
export function resolveDateInput(input: string, now: Date = new Date()): string {
  const value = input.trim().toLowerCase();
  if (value === 'today') return formatDate(now);
  if (value === 'tomorrow') return formatDate(addDays(now, 1));

  const m = /^\+(\d+)([dw])$/.exec(value);
  if (m?.[1] && m[2]) {
    const n = parseInt(m[1], 10);
    return formatDate(addDays(now, m[2] === 'w' ? n * 7 : n));
  }
  return input.trim();
}

/** Commander argument parser for priorities */
export function priorityOption(value: string): Priority {
  const priority = parsePriorityArg(value);
  if (!priority) throw new InvalidArgumentError('Use high, medium or low.');
  return priority;
}

/** Commander argument parser for sort keys */
export function sortKeyOption(value: string): SortKey {
  const key = parseSortKey(value);
  if (!key) throw new InvalidArgumentError('Use priority, deadline, status, project or name.');
  return key;
}

/** Value the repository expects for a field, from a command-line argument */
export function normalizeFieldValue(field: TaskField, value: string, now: Date = new Date()): string {
  switch (field) {
    case 'priority': return parsePriorityArg(value) ?? value;
    case 'status': return parseStatusArg(value) ?? value;
    case 'deadline': return resolveDateInput(value, now);
    case 'name': case 'notes': return value;
    case 'category': case 'project': return value.trim();
  }
}
