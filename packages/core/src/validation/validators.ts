/**
 * Pure field validators. None of them perform I/O: reference checks take the
 * set of known ids from the caller.
 */

import { parseIsoDate, formatDate } from '../dates.js';
import { PRIORITIES, isPriority } from '../types/priority.js';
import { USER_STATUSES, isUserStatus } from '../types/task-status.js';
import type { NewTaskInput, TaskField } from '../types/task.js';

export const MAX_NAME_LENGTH = 50;
export const MAX_NOTES_LENGTH = 250;

export type ValidationErrorKind =
  | 'EmptyOrTooLong'
  | 'BadFormat'
  | 'InThePast'
  | 'InvalidEnum'
  | 'UnknownReference';

export interface ValidationIssue {
  readonly kind: ValidationErrorKind;
  readonly field: TaskField;
  readonly message: string;
}

export interface NotesCheck {
  readonly value: string;
  readonly truncated: boolean;
}

/** Known reference ids, taken from the repository cache */
export interface ReferenceIds {
  readonly categoryIds: ReadonlySet<string>;
  readonly projectIds: ReadonlySet<string>;
}

function issue(kind: ValidationErrorKind, field: TaskField, message: string): ValidationIssue {
  return { kind, field, message };
}

export function validateName(name: string): ValidationIssue | null {
  if (!name.trim() || name.length > MAX_NAME_LENGTH) {
    return issue('EmptyOrTooLong', 'name', `Task name must be non-empty and ${MAX_NAME_LENGTH} characters or less.`);
  }
  return null;
}

/** A deadline of today is accepted; only earlier calendar dates are in the past */
export function validateDeadline(deadline: string, now: Date = new Date()): ValidationIssue | null {
  const parsed = parseIsoDate(deadline);
  if (!parsed) {
    return issue('BadFormat', 'deadline', 'Invalid deadline format. Please use YYYY-MM-DD.');
  }
  if (deadline < formatDate(now)) {
    return issue('InThePast', 'deadline', 'Deadline cannot be in the past.');
  }
  return null;
}

export function validatePriority(priority: string): ValidationIssue | null {
  if (!isPriority(priority)) {
    return issue('InvalidEnum', 'priority', `Invalid priority. Please choose from ${PRIORITIES.join(', ')}.`);
  }
  return null;
}

export function validateStatus(status: string): ValidationIssue | null {
  if (!isUserStatus(status)) {
    return issue('InvalidEnum', 'status', `Invalid status. Please choose from ${USER_STATUSES.join(', ')}.`);
  }
  return null;
}

export function validateCategoryRef(categoryId: string, knownIds: ReadonlySet<string>): ValidationIssue | null {
  if (!knownIds.has(categoryId)) {
    return issue('UnknownReference', 'category', 'Invalid category ID. Please choose from the available categories.');
  }
  return null;
}

export function validateProjectRef(projectId: string, knownIds: ReadonlySet<string>): ValidationIssue | null {
  if (!knownIds.has(projectId)) {
    return issue('UnknownReference', 'project', 'Invalid project ID. Please choose from the available projects.');
  }
  return null;
}

/** Never fails. Longer notes are cut to the limit and flagged. */
export function validateNotes(notes: string): NotesCheck {
  if (notes.length > MAX_NOTES_LENGTH) {
    return { value: notes.slice(0, MAX_NOTES_LENGTH), truncated: true };
  }
  return { value: notes, truncated: false };
}

/** Run every check for a new task, returning the first issue found */
export function validateNewTask(
  input: NewTaskInput,
  refs: ReferenceIds,
  now: Date = new Date(),
): ValidationIssue | null {
  return validateName(input.name)
    ?? validateDeadline(input.deadline, now)
    ?? validatePriority(input.priority)
    ?? validateCategoryRef(input.categoryId, refs.categoryIds)
    ?? validateProjectRef(input.projectId, refs.projectIds);
}
