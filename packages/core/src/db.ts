import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { mkdirSync } from 'node:fs';

export type WorkbookDb = BetterSQLite3Database<typeof schema>;

/** Drizzle handle plus the raw connection it wraps, kept for close() */
export interface Workbook {
  readonly db: WorkbookDb;
  readonly sqlite: Database.Database;
}

/** Returns the platform-appropriate default workbook path */
export function getDefaultDbPath(): string {
  const platform = process.platform;
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', 'taskbook');
  } else if (platform === 'win32') {
    dir = join(process.env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), 'taskbook');
  } else {
    dir = join(process.env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), 'taskbook');
  }

  return join(dir, 'workbook.db');
}

export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS sheets (
    name TEXT PRIMARY KEY,
    created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS sheet_rows (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    sheet_name TEXT NOT NULL REFERENCES sheets(name) ON UPDATE CASCADE ON DELETE CASCADE,
    position INTEGER NOT NULL,
    cells TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sheet_rows_position ON sheet_rows(sheet_name, position);
`;

/**
 * Open a workbook database with pragmas and schema applied.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function openWorkbook(path?: string): Workbook {
  const dbPath = path ?? getDefaultDbPath();

  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');
  sqlite.exec(CREATE_SCHEMA_SQL);

  return { db: drizzle(sqlite, { schema }), sqlite };
}
