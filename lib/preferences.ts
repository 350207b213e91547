import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError, StorageError } from './errors';
import { logger } from './logger';
import { parseInput } from './validation';

export type Preferences = {
  uiScale: number;
  textSizeOffset: number;
  windowWidth: number;
  windowHeight: number;
};

export const DEFAULT_PREFERENCES: Readonly<Preferences> = {
  uiScale: 1,
  textSizeOffset: 0,
  windowWidth: 1200,
  windowHeight: 800,
};

const clamp = (min: number, max: number) => (value: number) => Math.min(max, Math.max(min, value));

// Scale and text offset are clamped into range rather than rejected
const uiScaleSchema = z.number({ invalid_type_error: 'uiScale must be a number' }).finite().transform(clamp(0.5, 2));
const textSizeOffsetSchema = z
  .number({ invalid_type_error: 'textSizeOffset must be a number' })
  .int('textSizeOffset must be a whole number')
  .transform(clamp(-10, 10));
const windowSideSchema = z
  .number()
  .int('Window size must be a whole number')
  .min(200, 'Window size must be between 200 and 10000')
  .max(10000, 'Window size must be between 200 and 10000');

export const preferencesPatchSchema = z
  .object({
    uiScale: uiScaleSchema.optional(),
    textSizeOffset: textSizeOffsetSchema.optional(),
    windowWidth: windowSideSchema.optional(),
    windowHeight: windowSideSchema.optional(),
  })
  .strict();

export type PreferencesPatch = z.input<typeof preferencesPatchSchema>;

function merge(base: Preferences, patch: z.output<typeof preferencesPatchSchema>): Preferences {
  return {
    uiScale: patch.uiScale ?? base.uiScale,
    textSizeOffset: patch.textSizeOffset ?? base.textSizeOffset,
    windowWidth: patch.windowWidth ?? base.windowWidth,
    windowHeight: patch.windowHeight ?? base.windowHeight,
  };
}

/** Stored preferences over the defaults. A missing file means defaults. */
export function readPreferences(file: string): Preferences {
  if (!fs.existsSync(file)) return { ...DEFAULT_PREFERENCES };

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    throw new ConfigError(`Cannot read preferences from ${file}`, e);
  }
  const parsed = preferencesPatchSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid preferences in ${file}: ${parsed.error.issues.map(i => i.message).join(', ')}`);
  }
  return merge(DEFAULT_PREFERENCES, parsed.data);
}

function writePreferences(file: string, preferences: Preferences): Preferences {
  try {
    fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
    fs.writeFileSync(file, `${JSON.stringify(preferences, null, 2)}\n`);
  } catch (e) {
    logger.error(`Cannot write preferences to ${file}`, 'preferences', e instanceof Error ? e : undefined);
    throw new StorageError(`Cannot write preferences to ${file}`, e);
  }
  return preferences;
}

export function updatePreferences(file: string, patch: PreferencesPatch): Preferences {
  const data = parseInput(preferencesPatchSchema, patch);
  const saved = writePreferences(file, merge(readPreferences(file), data));
  logger.info('Preferences updated', 'preferences');
  return saved;
}

export function resetPreferences(file: string): Preferences {
  const saved = writePreferences(file, { ...DEFAULT_PREFERENCES });
  logger.info('Preferences reset to defaults', 'preferences');
  return saved;
}
