import { Command } from 'commander';
import * as out from '../output.js';
import { type RepositoryOpener, $try, report, parsePriorityArg, resolveDateInput } from '../helpers.js';

interface AddOptions {
  deadline: string;
  priority: string;
  category: string;
  project: string;
  notes: string;
}

export function createAddCommand(open: RepositoryOpener): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<name>', 'Task name, up to 50 characters')
    .requiredOption('-d, --deadline <date>', 'Deadline: YYYY-MM-DD, today, tomorrow, +3d or +2w')
    .requiredOption('-p, --priority <level>', 'Priority: high, medium or low')
    .requiredOption('-c, --category <id>', 'Category id')
    .requiredOption('-P, --project <id>', 'Project id')
    .option('-n, --notes <text>', 'Notes, cut to 250 characters', '')
    .action((name: string, opts: AddOptions) => $try(async () => {
      const repo = await open();
      const result = await repo.add({
        name: name.trim(),
        deadline: resolveDateInput(opts.deadline),
        priority: parsePriorityArg(opts.priority) ?? opts.priority,
        categoryId: opts.category.trim(),
        projectId: opts.project.trim(),
        notes: opts.notes,
      });

      if (result.type === 'success') {
        for (const w of result.data.warnings) out.warning(w);
      }
      report(result);
    }));
}
