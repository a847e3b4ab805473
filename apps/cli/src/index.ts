import 'dotenv/config';
import { Command } from 'commander';
import { createSession, loadConfig, logger } from '@taskbook/core';
import type { Session, RetryNotice } from '@taskbook/core';
import * as out from './output.js';

import { createMenuCommand } from './commands/menu.js';
import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createDeadlinesCommand } from './commands/deadlines.js';
import { createUpdateCommand } from './commands/update.js';
import { createCompleteCommand } from './commands/complete.js';
import { createDeleteCommand } from './commands/delete.js';
import { createArchiveCommand } from './commands/archive.js';
import { createRefsCommand } from './commands/refs.js';
import { createStatusCommand } from './commands/status.js';

function retryNotice(notice: RetryNotice): void {
  out.warning(`Rate limit hit while ${notice.operation}. Retrying in ${notice.delayMs / 1000}s...`);
}

// Opened on first use so that --help and argument errors need no credentials
const state: { session?: Promise<Session> } = {};
const openRepository = async () => {
  state.session ??= createSession(loadConfig(), { onRetry: retryNotice });
  return (await state.session).repository;
};

// Build the CLI program
const program = new Command()
  .name('taskbook')
  .description('Task tracker backed by a spreadsheet')
  .version('1.0.0');

// Register commands
program.addCommand(createMenuCommand(openRepository), { isDefault: true });
program.addCommand(createAddCommand(openRepository));
program.addCommand(createListCommand(openRepository));
program.addCommand(createDeadlinesCommand(openRepository));
program.addCommand(createUpdateCommand(openRepository));
program.addCommand(createCompleteCommand(openRepository));
program.addCommand(createDeleteCommand(openRepository));
program.addCommand(createArchiveCommand(openRepository));
program.addCommand(createRefsCommand(openRepository));
program.addCommand(createStatusCommand(openRepository));

try {
  await program.parseAsync();
} finally {
  if (state.session) {
    // a failed open was already reported by the command
    await state.session.then(
      s => s.close(),
      (err: unknown) => logger.debug({ err }, 'Session never opened'),
    );
  }
}
