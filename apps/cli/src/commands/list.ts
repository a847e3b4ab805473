import { Command } from 'commander';
import { activeTasks, filterTasks, sortTasks, today } from '@taskbook/core';
import type { Priority, SortKey } from '@taskbook/core';
import * as out from '../output.js';
import { type RepositoryOpener, $try, priorityOption, sortKeyOption } from '../helpers.js';

interface ListOptions {
  sort?: SortKey;
  project?: string;
  category?: string;
  priority?: Priority;
  archived?: boolean;
}

export function createListCommand(open: RepositoryOpener): Command {
  return new Command('list')
    .description('List active tasks')
    .option('-s, --sort <key>', 'Sort by priority, deadline, status, project or name', sortKeyOption)
    .option('--project <id>', 'Only tasks of this project')
    .option('--category <id>', 'Only tasks of this category')
    .option('--priority <level>', 'Only tasks of this priority', priorityOption)
    .option('--archived', 'Show rows moved to the archive sheet')
    .action((opts: ListOptions) => $try(async () => {
      const repo = await open();

      if (opts.archived) {
        const rows = repo.getArchivedRows();
        if (rows.length === 0) {
          out.info('The archive is empty.');
          return;
        }
        for (const line of out.renderArchivedRows(rows)) console.log(line);
        return;
      }

      const tasks = filterTasks(activeTasks(repo.getTasks()), {
        projectId: opts.project?.trim(),
        categoryId: opts.category?.trim(),
        priority: opts.priority,
      });
      out.printTaskTable(opts.sort ? sortTasks(tasks, opts.sort) : tasks, today());
    }));
}
