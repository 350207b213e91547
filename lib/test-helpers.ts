import path from 'node:path';
import { DEFAULT_PREFERENCES } from './preferences';
import { openStore, type EnergyStore } from './store';
import type { AppConfig } from './config';
import type { Clock } from './managers/base';

export const SQL_DIR = path.join(process.cwd(), 'lib', 'db', 'sql');

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    dbPath: ':memory:',
    schemaVersion: '2.0.0',
    timeZone: 'UTC',
    logLevel: 'error',
    seedExercises: [],
    seedFile: null,
    preferencesFile: path.join(process.cwd(), 'data', 'test-preferences.json'),
    preferences: { ...DEFAULT_PREFERENCES },
    sqlDir: SQL_DIR,
    ...overrides,
  };
}

/** A clock that stays put until `set` moves it. */
export function manualClock(iso = '2026-03-10T09:00:00.000Z'): Clock & { set(next: string): void } {
  let current = new Date(iso);
  const clock = () => new Date(current.getTime());
  return Object.assign(clock, {
    set(next: string) {
      current = new Date(next);
    },
  });
}

export function openTestStore(overrides: Partial<AppConfig> = {}, clock: Clock = manualClock()): EnergyStore {
  return openStore(testConfig(overrides), { clock });
}
