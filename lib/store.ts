import { loadConfig, resolveSeedExercises, type AppConfig } from './config';
import { logEnvironmentStatus } from './env-check';
import { logger } from './logger';
import { getLocalDateISO } from './date';
import { migrateSchema, openDatabase, type DatabaseHandle, type MigrationStatus } from './db/client';
import { ExerciseManager } from './managers/exercise-manager';
import { TaskManager } from './managers/task-manager';
import { EventManager } from './managers/event-manager';
import { DailyPointsManager } from './managers/daily-points-manager';
import type { Clock, ManagerContext } from './managers/base';
import type { SchemaVersion } from './types';

export interface EnergyStore {
  readonly schemaVersion: SchemaVersion;
  readonly timeZone: string;
  readonly migration: MigrationStatus;
  readonly exercises: ExerciseManager;
  readonly tasks: TaskManager;
  readonly events: EventManager;
  readonly points: DailyPointsManager;
  today(): string;
  close(): void;
}

export interface OpenStoreOptions {
  clock?: Clock;
}

/**
 * Opens the database, creates the schema on first run and seeds the
 * configured exercises inside that same first-run transaction. The seed file
 * is only read on that first run.
 */
export function openStore(config: AppConfig, options: OpenStoreOptions = {}): EnergyStore {
  logger.setLevel(config.logLevel);

  const handle: DatabaseHandle = openDatabase(config.dbPath);
  const context: ManagerContext = {
    db: handle.db,
    schemaVersion: config.schemaVersion,
    timeZone: config.timeZone,
    clock: options.clock ?? (() => new Date()),
  };

  const exercises = new ExerciseManager(context);
  const tasks = new TaskManager(context);

  let migration: MigrationStatus;
  try {
    migration = migrateSchema(handle, config, () => {
      const seeds = resolveSeedExercises(config);
      seeds.forEach(seed => exercises.create(seed));
      if (seeds.length > 0) {
        logger.info(`Seeded ${seeds.length} exercises`, 'store');
      }
    });
  } catch (e) {
    handle.sqlite.close();
    throw e;
  }

  let open = true;

  return {
    schemaVersion: config.schemaVersion,
    timeZone: config.timeZone,
    migration,
    exercises,
    tasks,
    events: new EventManager(context),
    points: new DailyPointsManager(context),
    today: () => getLocalDateISO(context.timeZone, context.clock()),
    close() {
      if (!open) return;
      open = false;
      handle.sqlite.close();
      logger.debug(`Closed ${config.dbPath}`, 'store');
    },
  };
}

let current: EnergyStore | null = null;

/** Process-wide store for the route handlers, opened on first use. */
export function getStore(): EnergyStore {
  if (!current) {
    logEnvironmentStatus();
    current = openStore(loadConfig());
  }
  return current;
}

export function closeStore(): void {
  current?.close();
  current = null;
}
