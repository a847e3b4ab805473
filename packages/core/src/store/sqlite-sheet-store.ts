/**
 * Local workbook: the sheet store contract on top of SQLite, one row per
 * sheet row with the cells kept as a JSON array.
 */

import { eq, and, asc, gt, max, sql } from 'drizzle-orm';
import type { SheetStore } from './sheet-store.js';
import { openWorkbook, type Workbook, type WorkbookDb } from '../db.js';
import { sheets, sheetRows } from '../schema/index.js';
import { RemoteRejectedError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';

/** Deserialize a cells column; anything but an array reads as an empty row */
function decodeCells(json: string): string[] {
  let arr: unknown;
  try {
    arr = JSON.parse(json);
  } catch (err: unknown) {
    logger.warn({ cells: json, reason: errorMessage(err) }, 'Unreadable workbook row, reading it as empty');
    return [];
  }
  if (!Array.isArray(arr)) {
    logger.warn({ cells: json }, 'Workbook row is not a cell array, reading it as empty');
    return [];
  }
  return arr.map(cell => (cell == null ? '' : String(cell)));
}

/** Cells are stored without trailing blanks, the way the remote store returns them */
function encodeCells(cells: readonly string[]): string {
  let end = cells.length;
  while (end > 0 && cells[end - 1] === '') end--;
  return JSON.stringify(cells.slice(0, end));
}

export class SqliteSheetStore implements SheetStore {
  private readonly db: WorkbookDb;

  constructor(private readonly workbook: Workbook) {
    this.db = workbook.db;
  }

  async readAll(sheet: string): Promise<string[][]> {
    this.requireSheet(sheet);
    const rows = this.db.select().from(sheetRows)
      .where(eq(sheetRows.sheetName, sheet))
      .orderBy(asc(sheetRows.position))
      .all();

    const values: string[][] = [];
    for (const row of rows) {
      // Gaps never occur through this store, but keep positions exact if they do
      while (values.length < row.position - 1) values.push([]);
      values.push(decodeCells(row.cells));
    }
    return values;
  }

  async appendRow(sheet: string, values: readonly string[]): Promise<number> {
    this.requireSheet(sheet);
    const position = this.lastPosition(sheet) + 1;
    this.db.insert(sheetRows).values({ sheetName: sheet, position, cells: encodeCells(values) }).run();
    return position;
  }

  async updateCells(sheet: string, row: number, column: number, values: readonly string[]): Promise<void> {
    this.requireSheet(sheet);
    if (row < 1 || column < 1) {
      throw new RemoteRejectedError(`Invalid cell reference row ${row}, column ${column} in '${sheet}'`, 400);
    }

    this.db.transaction((tx) => {
      const last = this.lastPosition(sheet);
      for (let p = last + 1; p <= row; p++) {
        tx.insert(sheetRows).values({ sheetName: sheet, position: p, cells: '[]' }).run();
      }

      const existing = tx.select().from(sheetRows)
        .where(and(eq(sheetRows.sheetName, sheet), eq(sheetRows.position, row)))
        .get();
      const cells = existing ? decodeCells(existing.cells) : [];
      while (cells.length < column - 1) cells.push('');
      values.forEach((value, i) => { cells[column - 1 + i] = value; });

      tx.update(sheetRows).set({ cells: encodeCells(cells) })
        .where(and(eq(sheetRows.sheetName, sheet), eq(sheetRows.position, row)))
        .run();
    });
  }

  async deleteRow(sheet: string, row: number): Promise<void> {
    this.requireSheet(sheet);
    this.db.transaction((tx) => {
      const result = tx.delete(sheetRows)
        .where(and(eq(sheetRows.sheetName, sheet), eq(sheetRows.position, row)))
        .run();
      if (result.changes === 0) {
        throw new RemoteRejectedError(`Row ${row} does not exist in '${sheet}'`, 400);
      }
      tx.update(sheetRows).set({ position: sql`${sheetRows.position} - 1` })
        .where(and(eq(sheetRows.sheetName, sheet), gt(sheetRows.position, row)))
        .run();
    });
  }

  async createTableIfAbsent(sheet: string, header: readonly string[]): Promise<boolean> {
    return this.db.transaction((tx) => {
      const result = tx.insert(sheets)
        .values({ name: sheet, createdAt: new Date().toISOString() })
        .onConflictDoNothing()
        .run();
      if (header.length === 0) return result.changes > 0;

      const first = tx.select().from(sheetRows)
        .where(and(eq(sheetRows.sheetName, sheet), eq(sheetRows.position, 1)))
        .get();
      if (!first) {
        tx.insert(sheetRows).values({ sheetName: sheet, position: 1, cells: encodeCells(header) }).run();
      } else if (decodeCells(first.cells).every(cell => cell === '')) {
        tx.update(sheetRows).set({ cells: encodeCells(header) })
          .where(and(eq(sheetRows.sheetName, sheet), eq(sheetRows.position, 1)))
          .run();
      }
      return result.changes > 0;
    });
  }

  async close(): Promise<void> {
    if (this.workbook.sqlite.open) this.workbook.sqlite.close();
  }

  private requireSheet(sheet: string): void {
    const row = this.db.select({ name: sheets.name }).from(sheets).where(eq(sheets.name, sheet)).get();
    if (!row) throw new RemoteRejectedError(`Sheet '${sheet}' does not exist`, 400);
  }

  private lastPosition(sheet: string): number {
    const row = this.db.select({ maxPosition: max(sheetRows.position) }).from(sheetRows)
      .where(eq(sheetRows.sheetName, sheet))
      .get();
    return row?.maxPosition ?? 0;
  }
}

/** A store on a fresh in-memory workbook. For tests. */
export function createTestStore(): SqliteSheetStore {
  return new SqliteSheetStore(openWorkbook(':memory:'));
}
