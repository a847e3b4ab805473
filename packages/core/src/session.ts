import type { AppConfig } from './config.js';
import type { RetryHooks, RetryPolicy } from './retry.js';
import { DEFAULT_RETRY_POLICY } from './retry.js';
import type { SheetStore } from './store/sheet-store.js';
import { RetryingSheetStore } from './store/retrying-sheet-store.js';
import { SqliteSheetStore } from './store/sqlite-sheet-store.js';
import { createGoogleSheetStore } from './store/google-sheet-store.js';
import { openWorkbook } from './db.js';
import { TaskRepository } from './repository/task-repository.js';
import { logger, setLogLevel } from './logger.js';

/** Everything one CLI run needs: the store, wrapped in retries, and the repository over it */
export interface Session {
  readonly config: AppConfig;
  readonly store: SheetStore;
  readonly repository: TaskRepository;
  close(): Promise<void>;
}

export function retryPolicyFor(config: AppConfig): RetryPolicy {
  return {
    ...DEFAULT_RETRY_POLICY,
    maxAttempts: config.retry.maxAttempts,
    baseDelayMs: config.retry.baseDelayMs,
    maxTotalDelayMs: config.retry.maxTotalDelayMs,
  };
}

function openBackend(config: AppConfig): SheetStore {
  if (config.backend === 'google') {
    return createGoogleSheetStore({
      spreadsheetId: config.spreadsheetId ?? '',
      keyFile: config.keyFile,
      credentialsJson: config.credentialsJson,
    });
  }
  return new SqliteSheetStore(openWorkbook(config.dbPath));
}

/**
 * Build the store for the configured backend and load the repository.
 * `backend` replaces the configured store, e.g. with an in-memory one.
 */
export async function createSession(
  config: AppConfig,
  hooks: RetryHooks = {},
  backend?: SheetStore,
): Promise<Session> {
  setLogLevel(config.logLevel);
  const inner = backend ?? openBackend(config);
  const store = new RetryingSheetStore(inner, retryPolicyFor(config), hooks);
  const repository = new TaskRepository(store, config.sheets);

  try {
    await repository.open();
  } catch (err: unknown) {
    await store.close();
    throw err;
  }
  logger.debug({ backend: config.backend }, 'Session opened');

  return {
    config,
    store,
    repository,
    close: () => store.close(),
  };
}
