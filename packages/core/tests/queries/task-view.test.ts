import { describe, it, expect } from 'vitest';
import { activeTasks, sortTasks, filterTasks, isOverdue, getStats, isSortKey } from '../../src/queries/task-view.js';
import type { Task } from '../../src/types/task.js';
import { TaskStatus } from '../../src/types/task-status.js';
import type { Priority } from '../../src/types/priority.js';
import { TODAY } from '../support/fixtures.js';

function task(id: string, overrides: Partial<Task> = {}): Task {
  return {
    id,
    name: `Task ${id}`,
    createDate: '2026-01-01',
    deadline: '2026-02-01',
    completeDate: null,
    status: TaskStatus.Pending,
    priority: null,
    category: { id: '1', name: 'Work' },
    project: { id: '1', name: 'Website' },
    notes: '',
    ...overrides,
  };
}

const withPriority = (id: string, priority: Priority | null) => task(id, { priority });

describe('activeTasks', () => {
  it('drops archived tasks', () => {
    const tasks = [task('1'), task('2', { status: TaskStatus.Deleted }), task('3', { status: TaskStatus.Completed })];
    expect(activeTasks(tasks).map(t => t.id)).toEqual(['1', '3']);
  });
});

describe('sortTasks', () => {
  it('orders priority High, Medium, Low, then blank', () => {
    const tasks = [withPriority('1', null), withPriority('2', 'Low'), withPriority('3', 'High'), withPriority('4', 'Medium')];
    expect(sortTasks(tasks, 'priority').map(t => t.id)).toEqual(['3', '4', '2', '1']);
  });

  it('is stable for equal keys', () => {
    const tasks = [withPriority('1', 'Low'), withPriority('2', 'High'), withPriority('3', 'Low')];
    expect(sortTasks(tasks, 'priority').map(t => t.id)).toEqual(['2', '1', '3']);
  });

  it('sorts deadlines ascending with blanks first', () => {
    const tasks = [task('1', { deadline: '2026-03-01' }), task('2', { deadline: '' }), task('3', { deadline: '2026-01-20' })];
    expect(sortTasks(tasks, 'deadline').map(t => t.id)).toEqual(['2', '3', '1']);
  });

  it('compares names and projects without case', () => {
    const tasks = [task('1', { name: 'beta' }), task('2', { name: 'Alpha' })];
    expect(sortTasks(tasks, 'name').map(t => t.id)).toEqual(['2', '1']);

    const byProject = [task('1', { project: { id: '2', name: 'garden' } }), task('2', { project: { id: '1', name: 'Website' } })];
    expect(sortTasks(byProject, 'project').map(t => t.id)).toEqual(['1', '2']);
  });

  it('does not modify its input', () => {
    const tasks = [task('2', { name: 'b' }), task('1', { name: 'a' })];
    sortTasks(tasks, 'name');
    expect(tasks.map(t => t.id)).toEqual(['2', '1']);
  });
});

describe('filterTasks', () => {
  const tasks = [
    task('1', { priority: 'High' }),
    task('2', { project: { id: '2', name: 'Garden' }, category: { id: '2', name: 'Home' } }),
    task('3', { priority: 'High', category: { id: '2', name: 'Home' } }),
  ];

  it('combines the given criteria', () => {
    expect(filterTasks(tasks, { priority: 'High' }).map(t => t.id)).toEqual(['1', '3']);
    expect(filterTasks(tasks, { categoryId: '2' }).map(t => t.id)).toEqual(['2', '3']);
    expect(filterTasks(tasks, { categoryId: '2', priority: 'High' }).map(t => t.id)).toEqual(['3']);
    expect(filterTasks(tasks, { projectId: '2' }).map(t => t.id)).toEqual(['2']);
    expect(filterTasks(tasks, {})).toHaveLength(3);
  });
});

describe('isOverdue', () => {
  it('flags open tasks with past deadlines', () => {
    expect(isOverdue(task('1', { deadline: '2026-01-14' }), TODAY)).toBe(true);
    expect(isOverdue(task('2', { deadline: TODAY }), TODAY)).toBe(false);
    expect(isOverdue(task('3', { deadline: '2026-01-14', status: TaskStatus.Completed }), TODAY)).toBe(false);
    expect(isOverdue(task('4', { deadline: '' }), TODAY)).toBe(false);
  });
});

describe('getStats', () => {
  it('counts tasks per status', () => {
    const stats = getStats([
      task('1'),
      task('2', { status: TaskStatus.InProgress }),
      task('3', { status: TaskStatus.Completed }),
      task('4', { status: TaskStatus.Pending }),
    ]);
    expect(stats).toEqual({ Pending: 2, 'In Progress': 1, Completed: 1, Deleted: 0, total: 4 });
  });
});

describe('isSortKey', () => {
  it('accepts the known keys only', () => {
    expect(isSortKey('deadline')).toBe(true);
    expect(isSortKey('color')).toBe(false);
  });
});
