/**
 * The tabular store the repository persists to. Every table is a header row
 * followed by data rows, addressed with 1-based row and column numbers.
 */
export interface SheetStore {
  /** All rows of a table, header included. Trailing blank cells may be missing. */
  readAll(sheet: string): Promise<string[][]>;

  /** Append one row after the last row; resolves to the row number written, when the store reports it */
  appendRow(sheet: string, values: readonly string[]): Promise<number | null>;

  /** Overwrite contiguous cells of one row starting at `column` */
  updateCells(sheet: string, row: number, column: number, values: readonly string[]): Promise<void>;

  /** Remove a row; rows below it move up by one */
  deleteRow(sheet: string, row: number): Promise<void>;

  /**
   * Create the table with its header row unless it exists. An existing table
   * whose first row is empty gets the header written. Resolves to true if created.
   */
  createTableIfAbsent(sheet: string, header: readonly string[]): Promise<boolean>;

  close(): Promise<void>;
}

export interface SheetNames {
  readonly tasks: string;
  readonly projects: string;
  readonly categories: string;
  readonly archive: string;
}

export const DEFAULT_SHEET_NAMES: SheetNames = {
  tasks: 'tasks',
  projects: 'project',
  categories: 'category',
  archive: 'archive',
};

export const REFERENCE_HEADER: readonly string[] = ['id', 'name'];
