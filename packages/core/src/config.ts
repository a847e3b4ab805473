import { z } from 'zod';
import type { LevelWithSilent } from 'pino';
import { ConfigError } from './errors.js';
import { getDefaultDbPath } from './db.js';
import { DEFAULT_SHEET_NAMES, type SheetNames } from './store/sheet-store.js';
import { DEFAULT_RETRY_POLICY } from './retry.js';

export type Backend = 'google' | 'local';

export interface RetrySettings {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxTotalDelayMs?: number;
}

export interface AppConfig {
  readonly backend: Backend;
  readonly spreadsheetId?: string;
  readonly keyFile?: string;
  readonly credentialsJson?: string;
  readonly dbPath: string;
  readonly sheets: SheetNames;
  readonly retry: RetrySettings;
  readonly logLevel: LevelWithSilent;
}

const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const optionalText = z.preprocess(blankAsUndefined, z.string().trim().min(1).optional());

const optionalInt = (min: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().min(min).optional());

const envSchema = z.object({
  TASKBOOK_BACKEND: z.preprocess(blankAsUndefined, z.enum(['google', 'local']).optional()),
  TASKBOOK_SPREADSHEET_ID: optionalText,
  GOOGLE_APPLICATION_CREDENTIALS: optionalText,
  TASKBOOK_CREDENTIALS_JSON: optionalText,
  TASKBOOK_DB_PATH: optionalText,
  TASKBOOK_TASKS_SHEET: optionalText,
  TASKBOOK_PROJECTS_SHEET: optionalText,
  TASKBOOK_CATEGORIES_SHEET: optionalText,
  TASKBOOK_ARCHIVE_SHEET: optionalText,
  TASKBOOK_RETRY_ATTEMPTS: optionalInt(1),
  TASKBOOK_RETRY_BASE_DELAY_MS: optionalInt(0),
  TASKBOOK_RETRY_MAX_WAIT_MS: optionalInt(0),
  LOG_LEVEL: z.preprocess(
    blankAsUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  ),
});

/**
 * Read settings from the environment. Every invalid variable is reported in
 * one ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`, { problems });
  }
  const e = parsed.data;

  const backend: Backend = e.TASKBOOK_BACKEND ?? (e.TASKBOOK_SPREADSHEET_ID ? 'google' : 'local');
  if (backend === 'google' && !e.TASKBOOK_SPREADSHEET_ID) {
    throw new ConfigError('TASKBOOK_SPREADSHEET_ID is required for the google backend');
  }

  return {
    backend,
    spreadsheetId: e.TASKBOOK_SPREADSHEET_ID,
    keyFile: e.GOOGLE_APPLICATION_CREDENTIALS,
    credentialsJson: e.TASKBOOK_CREDENTIALS_JSON,
    dbPath: e.TASKBOOK_DB_PATH ?? getDefaultDbPath(),
    sheets: {
      tasks: e.TASKBOOK_TASKS_SHEET ?? DEFAULT_SHEET_NAMES.tasks,
      projects: e.TASKBOOK_PROJECTS_SHEET ?? DEFAULT_SHEET_NAMES.projects,
      categories: e.TASKBOOK_CATEGORIES_SHEET ?? DEFAULT_SHEET_NAMES.categories,
      archive: e.TASKBOOK_ARCHIVE_SHEET ?? DEFAULT_SHEET_NAMES.archive,
    },
    retry: {
      maxAttempts: e.TASKBOOK_RETRY_ATTEMPTS ?? DEFAULT_RETRY_POLICY.maxAttempts,
      baseDelayMs: e.TASKBOOK_RETRY_BASE_DELAY_MS ?? DEFAULT_RETRY_POLICY.baseDelayMs,
      maxTotalDelayMs: e.TASKBOOK_RETRY_MAX_WAIT_MS,
    },
    logLevel: e.LOG_LEVEL,
  };
}
