import { Command } from 'commander';
import * as out from '../output.js';
import { type RepositoryOpener, $try, report } from '../helpers.js';

export function createArchiveCommand(open: RepositoryOpener): Command {
  const archive = new Command('archive')
    .description('Inspect or compact the archive sheet');

  archive.addCommand(new Command('list')
    .description('Show rows already moved to the archive sheet')
    .action(() => $try(async () => {
      const repo = await open();
      const rows = repo.getArchivedRows();
      if (rows.length === 0) {
        out.info('The archive is empty.');
        return;
      }
      for (const line of out.renderArchivedRows(rows)) console.log(line);
    })));

  archive.addCommand(new Command('compact')
    .description('Move every Deleted task from the tasks sheet to the archive sheet')
    .action(() => $try(async () => {
      const repo = await open();
      report(await repo.compactArchived());
    })));

  return archive;
}
