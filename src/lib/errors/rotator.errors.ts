/**
 * Rotator Errors
 * Error taxonomy shared by the pool, apply, scheduler and Tor layers
 */

export enum RotatorErrorType {
  SOURCE_FETCH_ERROR = 'SOURCE_FETCH_ERROR',
  SCHEMA_ERROR = 'SCHEMA_ERROR',
  HEALTH_CHECK_FAILURE = 'HEALTH_CHECK_FAILURE',
  APPLY_ERROR = 'APPLY_ERROR',
  TOR_START_ERROR = 'TOR_START_ERROR',
  TOR_AUTH_ERROR = 'TOR_AUTH_ERROR',
  TOR_SIGNAL_ERROR = 'TOR_SIGNAL_ERROR',
  SCHEDULER_RETRYABLE_FAILURE = 'SCHEDULER_RETRYABLE_FAILURE',
}

/**
 * Routine, non-exceptional probe failure. Attached to a HealthResult, never thrown.
 */
export interface HealthCheckFailure {
  type: RotatorErrorType.HEALTH_CHECK_FAILURE;
  message: string;
  statusCode?: number;
}

export class RotatorError extends Error {
  readonly type: RotatorErrorType;
  readonly retryable: boolean;

  constructor(type: RotatorErrorType, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.type = type;
    this.retryable = options.retryable ?? false;
  }
}

/** Network, timeout or HTTP failure while fetching a pool */
export class SourceFetchError extends RotatorError {
  readonly statusCode?: number;

  constructor(message: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super(RotatorErrorType.SOURCE_FETCH_ERROR, message, { retryable: true, cause: options.cause });
    this.statusCode = options.statusCode;
  }
}

/** Source answered, but not with the expected shape */
export class SchemaError extends RotatorError {
  constructor(message: string, cause?: unknown) {
    super(RotatorErrorType.SCHEMA_ERROR, message, { cause });
  }
}

/** Persistence or egress configuration failure while applying a proxy */
export class ApplyError extends RotatorError {
  constructor(message: string, cause?: unknown) {
    super(RotatorErrorType.APPLY_ERROR, message, { cause });
  }
}

export class TorStartError extends RotatorError {
  constructor(message: string, cause?: unknown) {
    super(RotatorErrorType.TOR_START_ERROR, message, { cause });
  }
}

export class TorAuthError extends RotatorError {
  readonly reply?: string;

  constructor(message: string, options: { reply?: string; cause?: unknown } = {}) {
    super(RotatorErrorType.TOR_AUTH_ERROR, message, { retryable: true, cause: options.cause });
    this.reply = options.reply;
  }
}

export class TorSignalError extends RotatorError {
  readonly reply?: string;

  constructor(message: string, options: { reply?: string; cause?: unknown } = {}) {
    super(RotatorErrorType.TOR_SIGNAL_ERROR, message, { retryable: true, cause: options.cause });
    this.reply = options.reply;
  }
}

/** A rotation cycle found nothing to apply; the scheduler backs off and retries */
export class SchedulerRetryableFailure extends RotatorError {
  readonly retryAfter: number;

  constructor(message: string, retryAfter: number, cause?: unknown) {
    super(RotatorErrorType.SCHEDULER_RETRYABLE_FAILURE, message, { retryable: true, cause });
    this.retryAfter = retryAfter;
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
