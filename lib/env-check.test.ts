import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { validateEnvironmentVariables } from './env-check';

describe('validateEnvironmentVariables', () => {
  it('warns when no database path is configured', () => {
    assert.deepEqual(validateEnvironmentVariables({}), {
      isValid: true,
      invalid: [],
      warnings: ['ENERGY_TRACKER_DB_PATH is not set, using data/energy_tracker.db'],
    });
  });

  it('warns about in-memory databases', () => {
    assert.deepEqual(validateEnvironmentVariables({ ENERGY_TRACKER_DB_PATH: ':memory:' }).warnings, [
      'ENERGY_TRACKER_DB_PATH is :memory:, nothing will be kept after exit',
    ]);
  });

  it('flags unknown enum values and time zones', () => {
    const result = validateEnvironmentVariables({
      ENERGY_TRACKER_DB_PATH: '/var/lib/energy.db',
      ENERGY_TRACKER_LOG_LEVEL: 'loud',
      ENERGY_TRACKER_TIMEZONE: 'Mars/Olympus',
    });

    assert.equal(result.isValid, false);
    assert.deepEqual(result.invalid, [
      'ENERGY_TRACKER_LOG_LEVEL=loud (expected one of debug, info, warn, error)',
      'ENERGY_TRACKER_TIMEZONE=Mars/Olympus (unknown IANA time zone)',
    ]);
    assert.deepEqual(result.warnings, []);
  });
});
