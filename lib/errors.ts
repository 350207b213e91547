import type { ApiErrorCode } from './types';

export class AppError extends Error {
  readonly code: ApiErrorCode;

  constructor(code: ApiErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Value outside its enumeration or range. Nothing was written. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
  }
}

/** Uniqueness violation: duplicate exercise name, second log for the same exercise and day. */
export class ConflictError extends AppError {
  constructor(message: string) {
    super('CONFLICT', message);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: number | string) {
    super('NOT_FOUND', `${entity} ${id} not found`);
  }
}

/**
 * Persistence failure below the managers (disk, schema mismatch, driver).
 * Never retried; the database keeps its last committed state.
 */
export class StorageError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('STORAGE_ERROR', message, { cause });
  }
}

/** Bad environment, seed file or preferences file. A server-side fault, never the caller's. */
export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('CONFIG_ERROR', message, { cause });
  }
}

export function isAppError(value: unknown): value is AppError {
  return value instanceof AppError;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
