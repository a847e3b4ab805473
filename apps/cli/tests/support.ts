import { vi } from 'vitest';
import { TaskRepository, createTestStore, DEFAULT_SHEET_NAMES } from '@taskbook/core';
import type { Prompter } from '../src/prompt.js';
import { InputClosedError } from '../src/prompt.js';

/** 2026-01-15, local noon */
export const NOW = new Date(2026, 0, 15, 12, 0, 0);

/** Repository on an in-memory workbook with projects 1 Website, 2 Garden and categories 1 Work, 2 Home */
export async function seededRepository(): Promise<TaskRepository> {
  const store = createTestStore();
  const repo = new TaskRepository(store);
  await repo.ensureSheets();
  await store.appendRow(DEFAULT_SHEET_NAMES.projects, ['1', 'Website']);
  await store.appendRow(DEFAULT_SHEET_NAMES.projects, ['2', 'Garden']);
  await store.appendRow(DEFAULT_SHEET_NAMES.categories, ['1', 'Work']);
  await store.appendRow(DEFAULT_SHEET_NAMES.categories, ['2', 'Home']);
  await repo.refresh();
  return repo;
}

/** Answers questions from a fixed script; running out behaves like closed input */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  private readonly answers: string[];

  constructor(answers: readonly string[]) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) throw new InputClosedError();
    return answer;
  }

  close(): void {}
}

export function captureConsole() {
  const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
  return { spy, lines: (): string[] => spy.mock.calls.map(call => String(call[0])) };
}
