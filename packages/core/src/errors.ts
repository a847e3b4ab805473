export const ErrorCode = {
  RemoteTransient: 'RemoteTransient',
  RetryLimitExceeded: 'RetryLimitExceeded',
  RemoteRejected: 'RemoteRejected',
  ConfigError: 'ConfigError',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class AppError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(errorCode: ErrorCode, message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.errorCode = errorCode;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Rate or quota limiting by the sheet store. Retried by the backoff caller. */
export class RemoteTransientError extends AppError {
  constructor(message = 'The sheet store is rate limiting requests', details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCode.RemoteTransient, message, details, options);
  }
}

/** Any non-transient failure reported by the sheet store */
export class RemoteRejectedError extends AppError {
  public readonly status: number | undefined;

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super(ErrorCode.RemoteRejected, message, status === undefined ? undefined : { status }, options);
    this.status = status;
  }
}

export class RetryLimitExceededError extends AppError {
  public readonly attempts: number;

  constructor(operation: string, attempts: number, lastError: unknown) {
    super(
      ErrorCode.RetryLimitExceeded,
      `Gave up on ${operation} after ${attempts} attempt(s): the sheet store is still rate limiting. Try again in a minute.`,
      { operation, attempts },
      { cause: lastError },
    );
    this.attempts = attempts;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.ConfigError, message, details);
  }
}

/** Message of any thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
