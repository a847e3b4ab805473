/**
 * Google Sheets backend. Each table is a tab of one spreadsheet; values are
 * written RAW so ids and dates stay plain strings.
 */

import { google, type sheets_v4 } from 'googleapis';
import { z } from 'zod';
import type { SheetStore } from './sheet-store.js';
import {
  AppError, ConfigError, RemoteRejectedError, RemoteTransientError, errorMessage,
} from '../errors.js';
import { logger } from '../logger.js';

const SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive.file',
];

const UPDATED_ROW_RE = /!\$?[A-Z]+\$?(\d+)/;

const serviceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
  project_id: z.string().optional(),
});

/** The part of the Sheets v4 client this store calls */
export interface SheetsApi {
  readonly spreadsheets: {
    get(params: sheets_v4.Params$Resource$Spreadsheets$Get): Promise<{ data: sheets_v4.Schema$Spreadsheet }>;
    batchUpdate(
      params: sheets_v4.Params$Resource$Spreadsheets$Batchupdate,
    ): Promise<{ data: sheets_v4.Schema$BatchUpdateSpreadsheetResponse }>;
    readonly values: {
      get(params: sheets_v4.Params$Resource$Spreadsheets$Values$Get): Promise<{ data: sheets_v4.Schema$ValueRange }>;
      append(
        params: sheets_v4.Params$Resource$Spreadsheets$Values$Append,
      ): Promise<{ data: sheets_v4.Schema$AppendValuesResponse }>;
      update(
        params: sheets_v4.Params$Resource$Spreadsheets$Values$Update,
      ): Promise<{ data: sheets_v4.Schema$UpdateValuesResponse }>;
    };
  };
}

export interface GoogleSheetStoreOptions {
  readonly spreadsheetId: string;
  /** Path to a service-account key file */
  readonly keyFile?: string;
  /** Service-account key as a JSON string */
  readonly credentialsJson?: string;
}

// --- A1 notation ---

/** 1 -> A, 26 -> Z, 27 -> AA */
export function columnLetter(column: number): string {
  let n = column;
  let letters = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

export function quoteSheet(sheet: string): string {
  return `'${sheet.replace(/'/g, "''")}'`;
}

export function cellRange(sheet: string, row: number, column: number, width = 1): string {
  const start = `${columnLetter(column)}${row}`;
  if (width <= 1) return `${quoteSheet(sheet)}!${start}`;
  return `${quoteSheet(sheet)}!${start}:${columnLetter(column + width - 1)}${row}`;
}

/** Row number from an updatedRange such as 'tasks'!A5:J5 */
export function parseUpdatedRow(range: string | null | undefined): number | null {
  if (!range) return null;
  const m = UPDATED_ROW_RE.exec(range);
  return m?.[1] ? parseInt(m[1], 10) : null;
}

// --- Error classification ---

/** HTTP status carried by a client error, if any */
export function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('status' in err && typeof err.status === 'number') return err.status;
  if ('response' in err && typeof err.response === 'object' && err.response !== null
    && 'status' in err.response && typeof err.response.status === 'number') {
    return err.response.status;
  }
  if ('code' in err && typeof err.code === 'number') return err.code;
  return undefined;
}

/** 429 is the only retry-worthy answer; everything else is a rejection */
export function toStoreError(err: unknown, operation: string): AppError {
  if (err instanceof AppError) return err;
  const status = httpStatusOf(err);
  if (status === 429) {
    return new RemoteTransientError(`Rate limited while ${operation}`, { status }, { cause: err });
  }
  return new RemoteRejectedError(`Sheet store rejected ${operation}: ${errorMessage(err)}`, status, { cause: err });
}

export function parseServiceAccount(json: string): z.infer<typeof serviceAccountSchema> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err: unknown) {
    throw new ConfigError(`Service-account credentials are not valid JSON: ${errorMessage(err)}`);
  }
  const parsed = serviceAccountSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Service-account credentials must include client_email and private_key');
  }
  return parsed.data;
}

export class GoogleSheetStore implements SheetStore {
  private sheetIds: Map<string, number> | null = null;

  constructor(
    private readonly api: SheetsApi,
    private readonly spreadsheetId: string,
  ) {}

  async readAll(sheet: string): Promise<string[][]> {
    const res = await this.call(`reading '${sheet}'`, () =>
      this.api.spreadsheets.values.get({ spreadsheetId: this.spreadsheetId, range: quoteSheet(sheet) }),
    );
    const rows: unknown[][] = res.data.values ?? [];
    return rows.map(row => row.map(cell => (cell == null ? '' : String(cell))));
  }

  async appendRow(sheet: string, values: readonly string[]): Promise<number | null> {
    const res = await this.call(`appending to '${sheet}'`, () =>
      this.api.spreadsheets.values.append({
        spreadsheetId: this.spreadsheetId,
        range: `${quoteSheet(sheet)}!A1`,
        valueInputOption: 'RAW',
        insertDataOption: 'INSERT_ROWS',
        requestBody: { values: [[...values]] },
      }),
    );
    const row = parseUpdatedRow(res.data.updates?.updatedRange);
    if (row === null) logger.warn({ sheet }, 'Append response did not report the written row');
    return row;
  }

  async updateCells(sheet: string, row: number, column: number, values: readonly string[]): Promise<void> {
    await this.call(`updating '${sheet}' row ${row}`, () =>
      this.api.spreadsheets.values.update({
        spreadsheetId: this.spreadsheetId,
        range: cellRange(sheet, row, column, values.length),
        valueInputOption: 'RAW',
        requestBody: { values: [[...values]] },
      }),
    );
  }

  async deleteRow(sheet: string, row: number): Promise<void> {
    const sheetId = await this.sheetIdOf(sheet);
    if (sheetId === undefined) throw new RemoteRejectedError(`Sheet '${sheet}' does not exist`, 400);

    await this.call(`deleting '${sheet}' row ${row}`, () =>
      this.api.spreadsheets.batchUpdate({
        spreadsheetId: this.spreadsheetId,
        requestBody: {
          requests: [{
            deleteDimension: {
              range: { sheetId, dimension: 'ROWS', startIndex: row - 1, endIndex: row },
            },
          }],
        },
      }),
    );
  }

  async createTableIfAbsent(sheet: string, header: readonly string[]): Promise<boolean> {
    if (await this.sheetIdOf(sheet) !== undefined) {
      // A retried create can find the sheet added but its header never written
      await this.ensureHeader(sheet, header);
      return false;
    }

    const res = await this.call(`creating '${sheet}'`, () =>
      this.api.spreadsheets.batchUpdate({
        spreadsheetId: this.spreadsheetId,
        requestBody: { requests: [{ addSheet: { properties: { title: sheet } } }] },
      }),
    );
    const newId = res.data.replies?.[0]?.addSheet?.properties?.sheetId;
    if (typeof newId === 'number') this.sheetIds?.set(sheet, newId);
    else this.sheetIds = null;

    if (header.length > 0) await this.updateCells(sheet, 1, 1, header);
    logger.info({ sheet }, 'Created sheet');
    return true;
  }

  async close(): Promise<void> {
    this.sheetIds = null;
  }

  private async ensureHeader(sheet: string, header: readonly string[]): Promise<void> {
    if (header.length === 0) return;
    const res = await this.call(`reading '${sheet}' header`, () =>
      this.api.spreadsheets.values.get({ spreadsheetId: this.spreadsheetId, range: `${quoteSheet(sheet)}!1:1` }),
    );
    const first: unknown[] = res.data.values?.[0] ?? [];
    if (first.some(cell => cell != null && String(cell) !== '')) return;

    await this.updateCells(sheet, 1, 1, header);
    logger.warn({ sheet }, 'Wrote missing header row');
  }

  private async sheetIdOf(sheet: string): Promise<number | undefined> {
    let ids = this.sheetIds;
    if (!ids?.has(sheet)) {
      ids = await this.loadSheetIds();
      this.sheetIds = ids;
    }
    return ids.get(sheet);
  }

  private async loadSheetIds(): Promise<Map<string, number>> {
    const res = await this.call('reading spreadsheet metadata', () =>
      this.api.spreadsheets.get({
        spreadsheetId: this.spreadsheetId,
        fields: 'sheets.properties(sheetId,title)',
      }),
    );
    const ids = new Map<string, number>();
    for (const s of res.data.sheets ?? []) {
      const title = s.properties?.title;
      const id = s.properties?.sheetId;
      if (title && typeof id === 'number') ids.set(title, id);
    }
    return ids;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      throw toStoreError(err, operation);
    }
  }
}

/** Authorize with a service account and open the spreadsheet */
export function createGoogleSheetStore(options: GoogleSheetStoreOptions): GoogleSheetStore {
  if (!options.keyFile && !options.credentialsJson) {
    throw new ConfigError('Google backend needs GOOGLE_APPLICATION_CREDENTIALS or TASKBOOK_CREDENTIALS_JSON');
  }

  const auth = options.credentialsJson
    ? new google.auth.GoogleAuth({ credentials: parseServiceAccount(options.credentialsJson), scopes: SCOPES })
    : new google.auth.GoogleAuth({ keyFile: options.keyFile, scopes: SCOPES });

  return new GoogleSheetStore(google.sheets({ version: 'v4', auth }), options.spreadsheetId);
}
