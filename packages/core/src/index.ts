// Types
export * from './types/index.js';

// Errors and logging
export {
  AppError,
  ErrorCode,
  RemoteTransientError,
  RemoteRejectedError,
  RetryLimitExceededError,
  ConfigError,
  errorMessage,
} from './errors.js';
export { logger, setLogLevel } from './logger.js';

// Dates and validation
export { formatDate, addDays, parseIsoDate, today } from './dates.js';
export {
  validateName,
  validateDeadline,
  validatePriority,
  validateStatus,
  validateCategoryRef,
  validateProjectRef,
  validateNotes,
  validateNewTask,
  MAX_NAME_LENGTH,
  MAX_NOTES_LENGTH,
} from './validation/validators.js';
export type {
  ValidationIssue,
  ValidationErrorKind,
  NotesCheck,
  ReferenceIds,
} from './validation/validators.js';

// Retries
export { withRetry, backoffDelay, isRateLimited, DEFAULT_RETRY_POLICY } from './retry.js';
export type { RetryPolicy, RetryHooks, RetryNotice } from './retry.js';

// Sheet stores
export { DEFAULT_SHEET_NAMES, REFERENCE_HEADER } from './store/sheet-store.js';
export type { SheetStore, SheetNames } from './store/sheet-store.js';
export { RetryingSheetStore } from './store/retrying-sheet-store.js';
export { SqliteSheetStore, createTestStore } from './store/sqlite-sheet-store.js';
export { GoogleSheetStore, createGoogleSheetStore } from './store/google-sheet-store.js';
export type { GoogleSheetStoreOptions } from './store/google-sheet-store.js';
export { openWorkbook, getDefaultDbPath } from './db.js';
export type { Workbook, WorkbookDb } from './db.js';

// Repository
export { TaskRepository } from './repository/task-repository.js';
export type { CompactionSummary, ReferenceKind } from './repository/task-repository.js';
export {
  TASK_HEADER,
  ARCHIVE_HEADER,
  TaskColumn,
  UNKNOWN_CATEGORY,
  UNKNOWN_PROJECT,
} from './repository/task-record.js';

// Views
export * from './queries/index.js';

// Configuration and session
export { loadConfig } from './config.js';
export type { AppConfig, Backend, RetrySettings } from './config.js';
export { createSession, retryPolicyFor } from './session.js';
export type { Session } from './session.js';
