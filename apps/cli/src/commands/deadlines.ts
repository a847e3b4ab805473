import { Command } from 'commander';
import { activeTasks, isOverdue, sortTasks, today } from '@taskbook/core';
import * as out from '../output.js';
import { type RepositoryOpener, $try } from '../helpers.js';

export function createDeadlinesCommand(open: RepositoryOpener): Command {
  return new Command('deadlines')
    .description('Review active tasks by deadline')
    .action(() => $try(async () => {
      const repo = await open();
      const date = today();
      const tasks = sortTasks(activeTasks(repo.getTasks()), 'deadline');
      out.printTaskTable(tasks, date);

      const overdue = tasks.filter(t => isOverdue(t, date)).length;
      if (overdue > 0) out.warning(`${overdue} task(s) overdue.`);
    }));
}
