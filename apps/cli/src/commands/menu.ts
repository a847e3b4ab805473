import { Command } from 'commander';
import { TaskMenu } from '../menu.js';
import { createConsolePrompter } from '../prompt.js';
import { type RepositoryOpener, $try } from '../helpers.js';

export function createMenuCommand(open: RepositoryOpener): Command {
  return new Command('menu')
    .description('Interactive task manager (default)')
    .action(() => $try(async () => {
      const repo = await open();
      const prompter = createConsolePrompter();
      try {
        await new TaskMenu(repo, prompter).run();
      } finally {
        prompter.close();
      }
    }));
}
