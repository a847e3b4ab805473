import { describe, it, expect } from 'vitest';
import {
  validateName, validateDeadline, validatePriority, validateStatus,
  validateCategoryRef, validateProjectRef, validateNotes, validateNewTask,
} from '../../src/validation/validators.js';
import { NOW, newTask } from '../support/fixtures.js';

const refs = { categoryIds: new Set(['1', '2']), projectIds: new Set(['1']) };

describe('validateName', () => {
  it('accepts up to 50 characters', () => {
    expect(validateName('a'.repeat(50))).toBeNull();
  });

  it('rejects blank and overlong names', () => {
    expect(validateName('   ')?.kind).toBe('EmptyOrTooLong');
    expect(validateName('a'.repeat(51))).toEqual({
      kind: 'EmptyOrTooLong',
      field: 'name',
      message: 'Task name must be non-empty and 50 characters or less.',
    });
  });
});

describe('validateDeadline', () => {
  it('accepts today and later', () => {
    expect(validateDeadline('2026-01-15', NOW)).toBeNull();
    expect(validateDeadline('2026-12-31', NOW)).toBeNull();
  });

  it('rejects yesterday', () => {
    expect(validateDeadline('2026-01-14', NOW)).toMatchObject({
      kind: 'InThePast',
      message: 'Deadline cannot be in the past.',
    });
  });

  it.each(['2026-1-20', '20/01/2026', '2026-02-30', ''])('rejects malformed %j', (value) => {
    expect(validateDeadline(value, NOW)?.kind).toBe('BadFormat');
  });
});

describe('enum validators', () => {
  it('checks priority', () => {
    expect(validatePriority('Medium')).toBeNull();
    expect(validatePriority('urgent')?.message).toBe('Invalid priority. Please choose from High, Medium, Low.');
  });

  it('does not let users set Deleted directly', () => {
    expect(validateStatus('In Progress')).toBeNull();
    expect(validateStatus('Deleted')?.message).toBe(
      'Invalid status. Please choose from Pending, In Progress, Completed.',
    );
  });
});

describe('reference validators', () => {
  it('accepts known ids only', () => {
    expect(validateCategoryRef('2', refs.categoryIds)).toBeNull();
    expect(validateCategoryRef('9', refs.categoryIds)?.kind).toBe('UnknownReference');
    expect(validateProjectRef('2', refs.projectIds)?.field).toBe('project');
  });
});

describe('validateNotes', () => {
  it('truncates to 250 characters', () => {
    const check = validateNotes('n'.repeat(300));
    expect(check.truncated).toBe(true);
    expect(check.value).toHaveLength(250);
  });

  it('keeps short notes', () => {
    expect(validateNotes('call back')).toEqual({ value: 'call back', truncated: false });
  });
});

describe('validateNewTask', () => {
  it('passes a valid task', () => {
    expect(validateNewTask(newTask(), refs, NOW)).toBeNull();
  });

  it('reports the first problem in field order', () => {
    const issue = validateNewTask(newTask({ name: '', priority: 'bogus', projectId: '7' }), refs, NOW);
    expect(issue?.field).toBe('name');
    expect(validateNewTask(newTask({ priority: 'bogus', projectId: '7' }), refs, NOW)?.field).toBe('priority');
    expect(validateNewTask(newTask({ projectId: '7' }), refs, NOW)?.field).toBe('project');
  });
});
