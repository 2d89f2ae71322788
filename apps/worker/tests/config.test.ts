import { describe, expect, it } from 'vitest';
import { loadWorkerConfig, readBoolEnv, readIntEnv, readListEnv } from '../src/config.js';

describe('loadWorkerConfig', () => {
  it('requires DATABASE_URL', () => {
    expect(() => loadWorkerConfig({})).toThrow('DATABASE_URL environment variable is required');
  });

  it('fills defaults around the database url', () => {
    expect(loadWorkerConfig({ DATABASE_URL: 'postgres://localhost/jobfit' })).toEqual({
      databaseUrl: 'postgres://localhost/jobfit',
      redisUrl: 'redis://localhost:6379',
      fetch: {
        keywords: ['support'],
        pages: 3,
        perPage: 50,
        cron: '0 */6 * * *',
        bootstrapNow: false,
      },
      findsgjobs: {
        timeoutMs: 30_000,
        maxRetries: 2,
      },
    });
  });

  it('reads overrides', () => {
    const config = loadWorkerConfig({
      DATABASE_URL: 'postgres://localhost/jobfit',
      REDIS_URL: 'redis://cache:6380',
      FETCH_KEYWORDS: 'driver, clerk ,driver',
      FETCH_PAGES: '5',
      FETCH_CRON: '*/30 * * * *',
      FETCH_BOOTSTRAP_NOW: 'yes',
      FINDSGJOBS_MAX_RETRIES: '0',
    });

    expect(config.redisUrl).toBe('redis://cache:6380');
    expect(config.fetch.keywords).toEqual(['driver', 'clerk']);
    expect(config.fetch.pages).toBe(5);
    expect(config.fetch.cron).toBe('*/30 * * * *');
    expect(config.fetch.bootstrapNow).toBe(true);
    expect(config.findsgjobs.maxRetries).toBe(0);
  });
});

describe('env readers', () => {
  it('falls back on invalid integers', () => {
    expect(readIntEnv({ N: 'abc' }, 'N', 7)).toBe(7);
    expect(readIntEnv({ N: '0' }, 'N', 7)).toBe(7);
    expect(readIntEnv({ N: '12.9' }, 'N', 7)).toBe(12);
  });

  it('falls back on unknown booleans', () => {
    expect(readBoolEnv({ B: 'maybe' }, 'B', true)).toBe(true);
    expect(readBoolEnv({ B: 'off' }, 'B', true)).toBe(false);
  });

  it('uses the fallback list when nothing is set', () => {
    expect(readListEnv({ L: ' , ' }, 'L', ['a'])).toEqual(['a']);
  });
});
