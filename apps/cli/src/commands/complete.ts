import { Command } from 'commander';
import { type RepositoryOpener, $try, report } from '../helpers.js';

export function createCompleteCommand(open: RepositoryOpener): Command {
  return new Command('complete')
    .description('Mark one or more tasks as completed')
    .argument('<taskIds...>', 'Task ids')
    .action((taskIds: string[]) => $try(async () => {
      const repo = await open();
      for (const id of taskIds) {
        report(await repo.markCompleted(id.trim()));
      }
    }));
}
