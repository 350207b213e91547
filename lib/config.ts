import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { LOG_LEVELS, type LogLevel } from './logger';
import { isValidTimeZone } from './date';
import { readPreferences, type Preferences } from './preferences';
import { LATEST_SCHEMA_VERSION, SCHEMA_VERSION_IDS } from './schema-versions';
import { seedExerciseSchema } from './validation';
import type { ExerciseInput, SchemaVersion } from './types';

export interface AppConfig {
  dbPath: string;
  schemaVersion: SchemaVersion;
  timeZone: string;
  logLevel: LogLevel;
  /**
   * Exercises inserted on the very first open of a new database. When unset
   * they are read from `seedFile` at that moment, and never on later opens.
   */
  seedExercises?: ExerciseInput[];
  seedFile: string | null;
  preferencesFile: string;
  preferences: Preferences;
  sqlDir: string;
}

type Env = Record<string, string | undefined>;

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
  ENERGY_TRACKER_DB_PATH: z.preprocess(emptyToUndefined, z.string().default(path.join('data', 'energy_tracker.db'))),
  ENERGY_TRACKER_SCHEMA_VERSION: z.preprocess(emptyToUndefined, z.enum(SCHEMA_VERSION_IDS).default(LATEST_SCHEMA_VERSION)),
  ENERGY_TRACKER_TIMEZONE: z.preprocess(
    emptyToUndefined,
    z.string().refine(isValidTimeZone, 'ENERGY_TRACKER_TIMEZONE is not a known time zone').optional()
  ),
  ENERGY_TRACKER_LOG_LEVEL: z.preprocess(emptyToUndefined, z.enum(LOG_LEVELS).optional()),
  ENERGY_TRACKER_SEED_FILE: z.preprocess(emptyToUndefined, z.string().optional()),
  ENERGY_TRACKER_PREFERENCES_FILE: z.preprocess(emptyToUndefined, z.string().optional()),
  NODE_ENV: z.string().optional(),
});

const seedFileSchema = z.record(z.string(), z.unknown());

function issues(error: z.ZodError): string {
  return error.issues.map(i => i.message).join(', ');
}

export function systemTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone || 'UTC';
}

export function readSeedExercises(file: string, version: SchemaVersion): ExerciseInput[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    throw new ConfigError(`Cannot read seed exercises from ${file}: ${e instanceof Error ? e.message : String(e)}`, e);
  }
  const byVersion = seedFileSchema.safeParse(raw);
  if (!byVersion.success) {
    throw new ConfigError(`Invalid seed file ${file}: ${issues(byVersion.error)}`);
  }
  const seeds = seedExerciseSchema(version).safeParse(byVersion.data[version] ?? []);
  if (!seeds.success) {
    throw new ConfigError(`Invalid seed exercises for ${version} in ${file}: ${issues(seeds.error)}`);
  }
  return seeds.data;
}

/** Explicit seeds when given, otherwise the seed file's entry for the schema version. */
export function resolveSeedExercises(config: Pick<AppConfig, 'seedExercises' | 'seedFile' | 'schemaVersion'>): ExerciseInput[] {
  if (config.seedExercises) return config.seedExercises;
  return config.seedFile ? readSeedExercises(config.seedFile, config.schemaVersion) : [];
}

export function loadConfig(env: Env = process.env, overrides: Partial<AppConfig> = {}): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${issues(parsed.error)}`);
  }
  const vars = parsed.data;
  const preferencesFile =
    overrides.preferencesFile ?? vars.ENERGY_TRACKER_PREFERENCES_FILE ?? path.join('data', 'preferences.json');

  return {
    dbPath: vars.ENERGY_TRACKER_DB_PATH,
    schemaVersion: vars.ENERGY_TRACKER_SCHEMA_VERSION,
    timeZone: vars.ENERGY_TRACKER_TIMEZONE ?? systemTimeZone(),
    logLevel: vars.ENERGY_TRACKER_LOG_LEVEL ?? (vars.NODE_ENV === 'development' ? 'debug' : 'warn'),
    seedFile: vars.ENERGY_TRACKER_SEED_FILE ?? path.join(process.cwd(), 'config', 'seed-exercises.json'),
    preferencesFile,
    preferences: overrides.preferences ?? readPreferences(preferencesFile),
    sqlDir: path.join(process.cwd(), 'lib', 'db', 'sql'),
    ...overrides,
  };
}
