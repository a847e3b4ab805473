import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';

function readCliFile(path: string): string {
  return readFileSync(new URL(`../${path}`, import.meta.url), 'utf8');
}

describe('taskbook launcher', () => {
  it('runs the CLI sources under plain node', () => {
    const manifest: unknown = JSON.parse(readCliFile('package.json'));
    expect(manifest).toMatchObject({ bin: { taskbook: './bin/taskbook.js' } });

    const lines = readCliFile('bin/taskbook.js').split('\n');
    expect(lines[0]).toBe('#!/usr/bin/env node');
    expect(lines).toContain("await import('../src/index.ts');");
  });
});
