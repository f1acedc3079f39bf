/**
 * Custom error classes for consistent error handling
 */

/**
 * Base error class for all cmdrecall errors
 */
export class CmdRecallError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'CmdRecallError';
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Validation error for invalid settings or input data
 */
export class ValidationError extends CmdRecallError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * The store could not be reached: I/O, permissions, corruption or a
 * write lock that never cleared
 */
export class StoreUnavailableError extends CmdRecallError {
  public readonly path?: string;

  constructor(message: string, options?: { path?: string; details?: unknown }) {
    super(message, 'STORE_UNAVAILABLE', options?.details);
    this.name = 'StoreUnavailableError';
    this.path = options?.path;
  }
}

/**
 * The store opened but its tables do not have the expected shape
 */
export class SchemaError extends CmdRecallError {
  public readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message, 'SCHEMA_ERROR', { missing });
    this.name = 'SchemaError';
    this.missing = missing;
  }
}

/**
 * A cache operation failed
 */
export class CacheUnavailableError extends CmdRecallError {
  public readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : 'unknown failure';
    super(`Cache operation '${operation}' failed: ${reason}`, 'CACHE_UNAVAILABLE', {
      operation,
      cause: cause instanceof CmdRecallError ? cause.toJSON() : reason,
    });
    this.name = 'CacheUnavailableError';
    this.operation = operation;
    this.cause = cause;
  }
}

/**
 * The degradation controller has opened the circuit
 */
export class CacheDisabledError extends CmdRecallError {
  constructor(operation: string) {
    super(`Cache is disabled, skipped '${operation}'`, 'CACHE_DISABLED', { operation });
    this.name = 'CacheDisabledError';
  }
}

/**
 * The translation client could not produce a command
 */
export class TranslationError extends CmdRecallError {
  public readonly query: string;

  constructor(query: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause ?? 'unknown failure');
    super(`Translation failed: ${reason}`, 'TRANSLATION_FAILED', { query });
    this.name = 'TranslationError';
    this.query = query;
    this.cause = cause;
  }
}

/**
 * Check if an error is a CmdRecallError
 */
export function isCmdRecallError(error: unknown): error is CmdRecallError {
  return error instanceof CmdRecallError;
}

/**
 * True for SQLite lock contention, which is worth retrying
 */
export function isBusyError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  const { code } = error;
  return typeof code === 'string' && (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED'));
}

/**
 * Wrap an unknown error as a CmdRecallError
 */
export function wrapError(error: unknown, defaultMessage = 'An error occurred'): CmdRecallError {
  if (isCmdRecallError(error)) return error;
  if (error instanceof Error) {
    return new CmdRecallError(error.message, 'UNKNOWN_ERROR', {
      originalName: error.name,
      stack: error.stack,
    });
  }
  return new CmdRecallError(defaultMessage, 'UNKNOWN_ERROR', { originalError: error });
}
