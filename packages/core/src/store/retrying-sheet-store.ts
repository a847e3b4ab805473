import type { SheetStore } from './sheet-store.js';
import { withRetry, DEFAULT_RETRY_POLICY, type RetryPolicy, type RetryHooks } from '../retry.js';

/** Applies one retry policy to every call of the wrapped store */
export class RetryingSheetStore implements SheetStore {
  constructor(
    private readonly inner: SheetStore,
    private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    private readonly hooks: RetryHooks = {},
  ) {}

  readAll(sheet: string): Promise<string[][]> {
    return this.retry(`reading '${sheet}'`, () => this.inner.readAll(sheet));
  }

  appendRow(sheet: string, values: readonly string[]): Promise<number | null> {
    return this.retry(`appending to '${sheet}'`, () => this.inner.appendRow(sheet, values));
  }

  updateCells(sheet: string, row: number, column: number, values: readonly string[]): Promise<void> {
    return this.retry(`updating '${sheet}' row ${row}`, () => this.inner.updateCells(sheet, row, column, values));
  }

  deleteRow(sheet: string, row: number): Promise<void> {
    return this.retry(`deleting '${sheet}' row ${row}`, () => this.inner.deleteRow(sheet, row));
  }

  createTableIfAbsent(sheet: string, header: readonly string[]): Promise<boolean> {
    return this.retry(`creating '${sheet}'`, () => this.inner.createTableIfAbsent(sheet, header));
  }

  close(): Promise<void> {
    return this.inner.close();
  }

  private retry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, this.policy, operation, this.hooks);
  }
}
