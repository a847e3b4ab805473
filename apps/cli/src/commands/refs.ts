import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import type { Reference, ReferenceKind } from '@taskbook/core';
import * as out from '../output.js';
import { type RepositoryOpener, $try, report } from '../helpers.js';

function referenceKind(value: string): ReferenceKind {
  const kind = value.trim().toLowerCase();
  if (kind === 'project' || kind === 'category') return kind;
  throw new InvalidArgumentError('Use project or category.');
}

export function formatReferences(title: string, refs: readonly Reference[]): string[] {
  if (refs.length === 0) return [chalk.bold(title), '  (none)'];
  return [chalk.bold(title), ...refs.map(r => `  ${r.id} - ${r.name}`)];
}

export function createRefsCommand(open: RepositoryOpener): Command {
  const refs = new Command('refs')
    .description('Projects and categories tasks can refer to');

  refs.addCommand(new Command('list')
    .description('Show all projects and categories')
    .action(() => $try(async () => {
      const repo = await open();
      for (const line of formatReferences('Projects', repo.getProjects())) console.log(line);
      for (const line of formatReferences('Categories', repo.getCategories())) console.log(line);
    })));

  refs.addCommand(new Command('add')
    .description('Add a project or category')
    .argument('<kind>', 'project or category', referenceKind)
    .argument('<id>', 'New id')
    .argument('<name>', 'Display name')
    .action((kind: ReferenceKind, id: string, name: string) => $try(async () => {
      const repo = await open();
      report(await repo.addReference(kind, id, name));
    })));

  return refs;
}
