import { Command } from 'commander';
import { type RepositoryOpener, $try, report } from '../helpers.js';

export function createDeleteCommand(open: RepositoryOpener): Command {
  return new Command('delete')
    .description('Archive one or more tasks (they stay in the sheet, marked Deleted)')
    .argument('<taskIds...>', 'Task ids')
    .action((taskIds: string[]) => $try(async () => {
      const repo = await open();
      for (const id of taskIds) {
        report(await repo.archive(id.trim()));
      }
    }));
}
