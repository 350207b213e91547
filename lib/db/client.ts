import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { eq, sql } from 'drizzle-orm';
import * as schema from './schema';
import { StorageError, isAppError } from '../errors';
import { logger } from '../logger';
import { SCHEMA_VERSIONS } from '../schema-versions';
import type { AppConfig } from '../config';

export type EnergyDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  sqlite: Database.Database;
  db: EnergyDatabase;
}

export type MigrationStatus = 'created' | 'current';

const COMPONENT = 'db';

export function openDatabase(dbPath: string): DatabaseHandle {
  try {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    const sqlite = new Database(dbPath);
    sqlite.pragma('foreign_keys = ON');
    logger.debug(`Opened ${dbPath}`, COMPONENT);
    return { sqlite, db: drizzle(sqlite, { schema }) };
  } catch (e) {
    logger.error(`Cannot open database at ${dbPath}`, COMPONENT, e instanceof Error ? e : undefined);
    throw new StorageError(`Cannot open database at ${dbPath}`, e);
  }
}

export function readSchemaVersion(db: EnergyDatabase): string | null {
  const table = db.get<{ name: string } | undefined>(
    sql`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'app_metadata'`
  );
  if (!table) return null;

  const row = db
    .select({ value: schema.appMetadata.value })
    .from(schema.appMetadata)
    .where(eq(schema.appMetadata.key, 'db_version'))
    .get();
  return row?.value ?? null;
}

/**
 * Creates the schema for `config.schemaVersion` unless `db_version` already
 * records it. `onCreate` runs inside the same transaction as the DDL, so a
 * failed first run leaves the file without a version and is retried on the
 * next open. A database recorded under another version is refused.
 */
export function migrateSchema(
  { sqlite, db }: DatabaseHandle,
  config: Pick<AppConfig, 'schemaVersion' | 'sqlDir'>,
  onCreate: () => void = () => undefined
): MigrationStatus {
  const found = readSchemaVersion(db);
  if (found === config.schemaVersion) {
    logger.debug(`Schema ${found} is current`, COMPONENT);
    return 'current';
  }
  if (found !== null) {
    throw new StorageError(
      `Database schema is ${found} but ${config.schemaVersion} is configured; automatic migration is not supported`
    );
  }

  const file = path.join(config.sqlDir, SCHEMA_VERSIONS[config.schemaVersion].sqlFile);
  let ddl: string;
  try {
    ddl = fs.readFileSync(file, 'utf8');
  } catch (e) {
    throw new StorageError(`Schema file not found at ${file}`, e);
  }

  try {
    db.transaction(() => {
      sqlite.exec(ddl);
      onCreate();
    });
  } catch (e) {
    if (isAppError(e)) throw e;
    throw new StorageError(`Failed to initialize schema ${config.schemaVersion}`, e);
  }

  logger.info(`Created schema ${config.schemaVersion}`, COMPONENT);
  return 'created';
}
