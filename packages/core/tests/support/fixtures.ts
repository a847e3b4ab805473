import type { SheetStore } from '../../src/store/sheet-store.js';
import { DEFAULT_SHEET_NAMES } from '../../src/store/sheet-store.js';
import { createTestStore } from '../../src/store/sqlite-sheet-store.js';
import { TaskRepository } from '../../src/repository/task-repository.js';
import type { NewTaskInput } from '../../src/types/task.js';

/** Fixed clock: 2026-01-15, local time */
export const NOW = new Date(2026, 0, 15, 12, 0, 0);
export const TODAY = '2026-01-15';

export type StoreMethod = 'readAll' | 'appendRow' | 'updateCells' | 'deleteRow' | 'createTableIfAbsent';

export interface StoreCall {
  readonly method: StoreMethod;
  readonly sheet: string;
  readonly args: readonly unknown[];
}

/** Wraps a store, recording calls and failing chosen methods on demand */
export class FlakyStore implements SheetStore {
  readonly calls: StoreCall[] = [];
  private readonly failures = new Map<StoreMethod, unknown[]>();
  /** When true, appendRow resolves to null as if the store did not report the row */
  hideAppendedRow = false;

  constructor(private readonly inner: SheetStore) {}

  /** Fail the next `times` calls of `method` with `error` */
  failNext(method: StoreMethod, error: unknown, times = 1): void {
    const queue = this.failures.get(method) ?? [];
    for (let i = 0; i < times; i++) queue.push(error);
    this.failures.set(method, queue);
  }

  callsOf(method: StoreMethod): StoreCall[] {
    return this.calls.filter(c => c.method === method);
  }

  async readAll(sheet: string): Promise<string[][]> {
    this.record('readAll', sheet, []);
    return this.inner.readAll(sheet);
  }

  async appendRow(sheet: string, values: readonly string[]): Promise<number | null> {
    this.record('appendRow', sheet, [values]);
    const row = await this.inner.appendRow(sheet, values);
    return this.hideAppendedRow ? null : row;
  }

  async updateCells(sheet: string, row: number, column: number, values: readonly string[]): Promise<void> {
    this.record('updateCells', sheet, [row, column, values]);
    return this.inner.updateCells(sheet, row, column, values);
  }

  async deleteRow(sheet: string, row: number): Promise<void> {
    this.record('deleteRow', sheet, [row]);
    return this.inner.deleteRow(sheet, row);
  }

  async createTableIfAbsent(sheet: string, header: readonly string[]): Promise<boolean> {
    this.record('createTableIfAbsent', sheet, [header]);
    return this.inner.createTableIfAbsent(sheet, header);
  }

  close(): Promise<void> {
    return this.inner.close();
  }

  private record(method: StoreMethod, sheet: string, args: readonly unknown[]): void {
    this.calls.push({ method, sheet, args });
    const queue = this.failures.get(method);
    const error = queue?.shift();
    if (error !== undefined) throw error;
  }
}

/** Store with the reference tables filled in: projects 1 Website, 2 Garden; categories 1 Work, 2 Home */
export async function seededStore(): Promise<SheetStore> {
  const store = createTestStore();
  const repo = new TaskRepository(store);
  await repo.ensureSheets();
  await store.appendRow(DEFAULT_SHEET_NAMES.projects, ['1', 'Website']);
  await store.appendRow(DEFAULT_SHEET_NAMES.projects, ['2', 'Garden']);
  await store.appendRow(DEFAULT_SHEET_NAMES.categories, ['1', 'Work']);
  await store.appendRow(DEFAULT_SHEET_NAMES.categories, ['2', 'Home']);
  return store;
}

export function newTask(overrides: Partial<NewTaskInput> = {}): NewTaskInput {
  return {
    name: 'Write report',
    deadline: '2026-02-01',
    priority: 'High',
    categoryId: '1',
    projectId: '1',
    notes: '',
    ...overrides,
  };
}
