import { Command } from 'commander';
import { TASK_FIELDS } from '@taskbook/core';
import * as out from '../output.js';
import { type RepositoryOpener, $try, report, parseField, normalizeFieldValue } from '../helpers.js';

export function createUpdateCommand(open: RepositoryOpener): Command {
  return new Command('update')
    .description('Change one field of a task')
    .argument('<taskId>', 'Task id')
    .argument('<field>', `One of: ${TASK_FIELDS.join(', ')}`)
    .argument('<value>', 'New value')
    .action((taskId: string, fieldArg: string, value: string) => $try(async () => {
      const field = parseField(fieldArg);
      if (!field) {
        out.error(`Unknown field '${fieldArg}'. Use one of: ${TASK_FIELDS.join(', ')}.`);
        process.exitCode = 1;
        return;
      }

      const repo = await open();
      const result = await repo.updateField(taskId.trim(), { field, value: normalizeFieldValue(field, value) });
      if (result.type === 'success') {
        for (const w of result.data.warnings) out.warning(w);
      }
      report(result);
    }));
}
