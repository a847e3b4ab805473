import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { Command } from 'commander';
import { TaskStatus, type TaskRepository } from '@taskbook/core';
import { createAddCommand } from '../src/commands/add.js';
import { createListCommand } from '../src/commands/list.js';
import { createUpdateCommand } from '../src/commands/update.js';
import { createCompleteCommand } from '../src/commands/complete.js';
import { createDeleteCommand } from '../src/commands/delete.js';
import { createArchiveCommand } from '../src/commands/archive.js';
import { createRefsCommand } from '../src/commands/refs.js';
import { createStatusCommand } from '../src/commands/status.js';
import { captureConsole, seededRepository } from './support.js';

let repo: TaskRepository;

beforeAll(() => {
  chalk.level = 0;
});

beforeEach(async () => {
  repo = await seededRepository();
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

async function run(...args: string[]): Promise<string[]> {
  const open = async () => repo;
  const program = new Command('taskbook');
  for (const cmd of [
    createAddCommand(open), createListCommand(open), createUpdateCommand(open),
    createCompleteCommand(open), createDeleteCommand(open), createArchiveCommand(open),
    createRefsCommand(open), createStatusCommand(open),
  ]) {
    program.addCommand(cmd);
  }
  const output = captureConsole();
  await program.parseAsync(args, { from: 'user' });
  const lines = output.lines();
  output.spy.mockRestore();
  return lines;
}

async function addTwo(): Promise<void> {
  await run('add', 'Plan beds', '-d', '2099-03-01', '-p', 'medium', '-c', '2', '-P', '2');
  await run('add', 'Fix header', '-d', '2099-02-01', '-p', 'HIGH', '-c', '1', '-P', '1', '-n', 'mobile only');
}

describe('add', () => {
  it('stores the task with normalized options', async () => {
    const lines = await run('add', 'Plan beds', '-d', '2099-03-01', '-p', 'medium', '-c', '2', '-P', '2', '-n', 'north side');

    expect(lines).toEqual(["Task 'Plan beds' added with ID 1."]);
    expect(repo.getTask('1')).toMatchObject({ priority: 'Medium', project: { name: 'Garden' }, notes: 'north side' });
  });

  it('reports validation problems and fails the run', async () => {
    const lines = await run('add', 'Too late', '-d', '2020-01-01', '-p', 'low', '-c', '1', '-P', '1');

    expect(lines).toEqual(['Deadline cannot be in the past.']);
    expect(process.exitCode).toBe(1);
    expect(repo.getTasks()).toEqual([]);
  });
});

describe('list', () => {
  it('filters and sorts the active tasks', async () => {
    await addTwo();
    const lines = await run('list', '--sort', 'deadline');

    expect(lines).toHaveLength(4);
    expect(lines[2]?.startsWith('2    2099-02-01')).toBe(true);
    expect(lines[3]?.startsWith('1    2099-03-01')).toBe(true);

    const high = await run('list', '--priority', 'high');
    expect(high).toHaveLength(3);
    expect(high[2]?.endsWith('Fix header')).toBe(true);
  });

  it('says so when there is nothing to show', async () => {
    expect(await run('list')).toEqual(['No tasks available.']);
  });
});

describe('update', () => {
  it('changes one field', async () => {
    await addTwo();
    expect(await run('update', '1', 'priority', 'low')).toEqual(['Task 1 priority updated.']);
    expect(repo.getTask('1')?.priority).toBe('Low');
  });

  it('rejects unknown fields', async () => {
    const lines = await run('update', '1', 'owner', 'me');

    expect(lines).toEqual(["Unknown field 'owner'. Use one of: name, deadline, priority, notes, status, category, project."]);
    expect(process.exitCode).toBe(1);
  });
});

describe('complete', () => {
  it('handles each id and reports missing ones', async () => {
    await addTwo();
    const lines = await run('complete', '1', '7');

    expect(lines).toEqual(["Task 'Plan beds' marked as completed.", 'Task ID 7 not found.']);
    expect(repo.getTask('1')?.status).toBe(TaskStatus.Completed);
    expect(process.exitCode).toBe(1);
  });
});

describe('delete and archive', () => {
  it('soft deletes, then compacts into the archive sheet', async () => {
    await addTwo();
    expect(await run('delete', '1')).toEqual(['Task 1 archived.']);
    expect(await run('archive', 'compact')).toEqual(['Moved 1 archived task(s) to the archive sheet.']);

    const archived = await run('archive', 'list');
    expect(archived).toHaveLength(3);
    expect(archived[2]?.startsWith('1    ')).toBe(true);
    expect(archived[2]?.endsWith('Plan beds')).toBe(true);
    expect(repo.getTasks().map(t => t.id)).toEqual(['2']);
  });
});

describe('refs', () => {
  it('adds and lists references', async () => {
    expect(await run('refs', 'add', 'project', '3', 'Garage')).toEqual(['Added project 3 (Garage).']);
    expect(await run('refs', 'list')).toEqual([
      'Projects', '  1 - Website', '  2 - Garden', '  3 - Garage',
      'Categories', '  1 - Work', '  2 - Home',
    ]);
  });
});

describe('status', () => {
  it('counts tasks by status', async () => {
    await addTwo();
    await run('complete', '2');

    expect(await run('status')).toEqual([
      'Pending:'.padEnd(12) + ' 1',
      'In Progress:' + ' 0',
      'Completed:'.padEnd(12) + ' 1',
      'Archived:'.padEnd(12) + ' 0',
      'Total:'.padEnd(12) + ' 2',
    ]);
  });
});
