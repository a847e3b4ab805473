import { Command } from 'commander';
import chalk from 'chalk';
import { TaskStatus, getStats } from '@taskbook/core';
import type { TaskStats } from '@taskbook/core';
import { type RepositoryOpener, $try } from '../helpers.js';

export function formatStats(stats: TaskStats): string[] {
  return [
    `${chalk.gray('Pending:    ')} ${stats[TaskStatus.Pending]}`,
    `${chalk.yellow('In Progress:')} ${stats[TaskStatus.InProgress]}`,
    `${chalk.green('Completed:  ')} ${stats[TaskStatus.Completed]}`,
    `${chalk.dim('Archived:   ')} ${stats[TaskStatus.Deleted]}`,
    `${chalk.bold('Total:      ')} ${stats.total}`,
  ];
}

export function createStatusCommand(open: RepositoryOpener): Command {
  return new Command('status')
    .description('Count tasks by status')
    .action(() => $try(async () => {
      const repo = await open();
      for (const line of formatStats(getStats(repo.getTasks()))) console.log(line);
    }));
}
