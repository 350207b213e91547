import { AppError, ConflictError, StorageError, ValidationError, isAppError, toError } from '../errors';
import { logger } from '../logger';
import { getLocalDateISO } from '../date';
import type { EnergyDatabase } from '../db/client';
import type { SchemaVersion } from '../types';

export type Clock = () => Date;

export interface ManagerContext {
  db: EnergyDatabase;
  schemaVersion: SchemaVersion;
  timeZone: string;
  clock: Clock;
}

function hasCode(value: unknown): value is { code: string; message: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string' &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

// better-sqlite3 reports constraint failures as SqliteError with an extended result code
function sqliteFailure(error: unknown): { code: string; message: string } | null {
  if (hasCode(error) && error.code.startsWith('SQLITE_')) return error;
  if (error instanceof Error && hasCode(error.cause) && error.cause.code.startsWith('SQLITE_')) return error.cause;
  return null;
}

export function mapStorageError(error: unknown, action: string): AppError {
  if (isAppError(error)) return error;

  const failure = sqliteFailure(error);
  if (!failure) return new StorageError(`${action} failed`, error);

  switch (failure.code) {
    case 'SQLITE_CONSTRAINT_UNIQUE':
    case 'SQLITE_CONSTRAINT_PRIMARYKEY':
      return new ConflictError(`${action}: ${failure.message}`);
    case 'SQLITE_CONSTRAINT_CHECK':
    case 'SQLITE_CONSTRAINT_NOTNULL':
      return new ValidationError(`${action}: ${failure.message}`);
    case 'SQLITE_CONSTRAINT_FOREIGNKEY':
      return new AppError('NOT_FOUND', `${action}: referenced row does not exist`);
    default:
      return new StorageError(`${action} failed`, error);
  }
}

export abstract class BaseManager {
  protected readonly db: EnergyDatabase;
  protected readonly schemaVersion: SchemaVersion;
  protected readonly timeZone: string;
  protected readonly clock: Clock;

  protected abstract readonly component: string;

  constructor(context: ManagerContext) {
    this.db = context.db;
    this.schemaVersion = context.schemaVersion;
    this.timeZone = context.timeZone;
    this.clock = context.clock;
  }

  protected now(): string {
    return this.clock().toISOString();
  }

  protected today(): string {
    return getLocalDateISO(this.timeZone, this.clock());
  }

  /** Runs `work` in one transaction; anything thrown rolls it back. */
  protected write<T>(action: string, work: () => T): T {
    try {
      return this.db.transaction(() => work());
    } catch (e) {
      const mapped = mapStorageError(e, action);
      if (mapped instanceof StorageError) {
        logger.error(`${action} failed`, this.component, toError(e));
      } else {
        logger.warn(`${action} rejected: ${mapped.message}`, this.component);
      }
      throw mapped;
    }
  }

  protected read<T>(action: string, work: () => T): T {
    try {
      return work();
    } catch (e) {
      const mapped = mapStorageError(e, action);
      if (mapped instanceof StorageError) {
        logger.error(`${action} failed`, this.component, toError(e));
      }
      throw mapped;
    }
  }
}
