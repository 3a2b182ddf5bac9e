/**
 * Tests for environment configuration
 */

import { loadEnv } from '../../src/config';
import { AppError } from '../../src/utils/AppError';

describe('loadEnv', () => {
  it('should apply defaults for an empty environment', () => {
    const env = loadEnv({});

    expect(env).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      LOG_DIR: 'logs',
      MATCH_MAX_ALTERNATES: 2,
      MATCH_LEGACY_BARE_UNITS: true,
    });
  });

  it('should coerce numeric and boolean strings', () => {
    const env = loadEnv({ MATCH_MAX_ALTERNATES: '5', MATCH_LEGACY_BARE_UNITS: 'false' });

    expect(env.MATCH_MAX_ALTERNATES).toBe(5);
    expect(env.MATCH_LEGACY_BARE_UNITS).toBe(false);
  });

  it('should accept 1 and 0 as booleans', () => {
    expect(loadEnv({ MATCH_LEGACY_BARE_UNITS: '1' }).MATCH_LEGACY_BARE_UNITS).toBe(true);
    expect(loadEnv({ MATCH_LEGACY_BARE_UNITS: '0' }).MATCH_LEGACY_BARE_UNITS).toBe(false);
  });

  it('should return a frozen object', () => {
    expect(Object.isFrozen(loadEnv({}))).toBe(true);
  });

  it('should reject a negative alternate count', () => {
    expect(() => loadEnv({ MATCH_MAX_ALTERNATES: '-1' })).toThrow(AppError);
    expect(() => loadEnv({ MATCH_MAX_ALTERNATES: '-1' })).toThrow(/MATCH_MAX_ALTERNATES/);
  });

  it('should name every offending variable', () => {
    let caught: unknown;
    try {
      loadEnv({ LOG_LEVEL: 'verbose', MATCH_LEGACY_BARE_UNITS: 'maybe' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AppError);
    if (!(caught instanceof AppError)) return;
    expect(caught.code).toBe('INVALID_INPUT');
    expect(caught.message).toContain('LOG_LEVEL');
    expect(caught.message).toContain('MATCH_LEGACY_BARE_UNITS');
  });
});
