/**
 * Checks the ENERGY_TRACKER_* environment before the store opens.
 * Unknown values are logged here; `loadConfig` rejects them with a ConfigError.
 */

import { LOG_LEVELS, logger } from './logger';
import { isValidTimeZone } from './date';
import { SCHEMA_VERSION_IDS } from './schema-versions';

interface EnvValidationResult {
  isValid: boolean;
  invalid: string[];
  warnings: string[];
}

type Env = Record<string, string | undefined>;

const ENUM_ENV_VARS: Record<string, readonly string[]> = {
  ENERGY_TRACKER_SCHEMA_VERSION: SCHEMA_VERSION_IDS,
  ENERGY_TRACKER_LOG_LEVEL: LOG_LEVELS
};

export function validateEnvironmentVariables(env: Env = process.env): EnvValidationResult {
  const invalid: string[] = [];
  const warnings: string[] = [];

  Object.entries(ENUM_ENV_VARS).forEach(([varName, allowed]) => {
    const value = env[varName];
    if (value !== undefined && value !== '' && !allowed.includes(value)) {
      invalid.push(`${varName}=${value} (expected one of ${allowed.join(', ')})`);
    }
  });

  const timeZone = env.ENERGY_TRACKER_TIMEZONE;
  if (timeZone && !isValidTimeZone(timeZone)) {
    invalid.push(`ENERGY_TRACKER_TIMEZONE=${timeZone} (unknown IANA time zone)`);
  }

  if (!env.ENERGY_TRACKER_DB_PATH) {
    warnings.push('ENERGY_TRACKER_DB_PATH is not set, using data/energy_tracker.db');
  } else if (env.ENERGY_TRACKER_DB_PATH === ':memory:') {
    warnings.push('ENERGY_TRACKER_DB_PATH is :memory:, nothing will be kept after exit');
  }

  return {
    isValid: invalid.length === 0,
    invalid,
    warnings
  };
}

export function logEnvironmentStatus(env: Env = process.env): EnvValidationResult {
  const validation = validateEnvironmentVariables(env);

  validation.warnings.forEach(warning => logger.warn(warning, 'env'));

  if (!validation.isValid) {
    validation.invalid.forEach(entry => logger.error(`Invalid environment variable ${entry}`, 'env'));
  } else {
    logger.debug('Environment variables look fine', 'env');
  }

  return validation;
}
