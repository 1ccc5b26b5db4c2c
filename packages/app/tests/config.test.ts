/**
 * Configuration loading tests
 */

import { describe, it, expect } from 'vitest';
import { getConfigSummary, loadConfig, parseEnvValue } from '../src/config/index.js';

describe('loadConfig', () => {
  it('should apply defaults when the environment is empty', () => {
    const config = loadConfig(undefined, {});

    expect(config.storage.backend).toBe('sqlite');
    expect(config.storage.databaseUrl).toBe('sqlite:data/pivot-suite.db');
    expect(config.storage.candleTable).toBe('candles_15m');
    expect(config.analysis.proximityPct).toBe(0.5);
    expect(config.analysis.defaultDateRangeDays).toBe(30);
    expect(config.analysis.sessions.map((s) => s.name)).toEqual(['Asia', 'London', 'New York']);
    expect(config.refresh.enabled).toBe(false);
    expect(config.refresh.overlapMinutes).toBe(30);
    expect(config.refresh.bootstrapHours).toBe(2);
    expect(config.refresh.warmPresets).toEqual([{ timeframe: 'daily', dateRangeDays: 30 }]);
    expect(config.popularPairs.source).toBe('static');
  });

  it('should map and coerce environment variables', () => {
    const config = loadConfig(undefined, {
      STORAGE_BACKEND: 'memory',
      EXCHANGE_TIMEOUT_MS: '5000',
      REFRESH_ENABLED: 'true',
      LOG_LEVEL: 'debug',
      PIVOT_PROXIMITY_PCT: '0.25',
      BYBIT_CATEGORY: 'spot',
    });

    expect(config.storage.backend).toBe('memory');
    expect(config.exchange.timeoutMs).toBe(5000);
    expect(config.exchange.category).toBe('spot');
    expect(config.refresh.enabled).toBe(true);
    expect(config.logging.level).toBe('debug');
    expect(config.analysis.proximityPct).toBe(0.25);
  });

  it('should ignore empty variables', () => {
    expect(loadConfig(undefined, { LOG_LEVEL: '' }).logging.level).toBe('info');
  });

  it('should list invalid settings', () => {
    expect(() => loadConfig(undefined, { LOG_LEVEL: 'verbose' })).toThrow(
      /^Configuration validation failed:\nlogging\.level: Invalid enum value/
    );
  });

  it('should require Supabase credentials for the supabase backend', () => {
    expect(() => loadConfig(undefined, { STORAGE_BACKEND: 'supabase' })).toThrow(
      'storage.supabase: SUPABASE_URL and SUPABASE_SERVICE_KEY are required for the supabase backend'
    );
  });

  it('should require Supabase credentials for the supabase pair source', () => {
    expect(() => loadConfig(undefined, { POPULAR_PAIRS_SOURCE: 'supabase' })).toThrow(
      'SUPABASE_URL and SUPABASE_SERVICE_KEY are required'
    );
  });
});

describe('getConfigSummary', () => {
  it('should not expose the service key', () => {
    const config = loadConfig(undefined, {
      STORAGE_BACKEND: 'supabase',
      SUPABASE_URL: 'https://example.supabase.co',
      SUPABASE_SERVICE_KEY: 'test-secret',
    });

    const summary = getConfigSummary(config);

    expect(JSON.stringify(summary)).not.toContain('test-secret');
    expect(summary['storage']).toEqual({ backend: 'supabase', supabase: 'configured' });
    expect(summary['refresh']).toBe('disabled');
    expect(summary['analysis']).toEqual({
      proximityPct: 0.5,
      defaultDateRangeDays: 30,
      sessions: ['Asia 0-8', 'London 8-16', 'New York 16-24'],
    });
  });

  it('should describe an enabled refresh by its tick', () => {
    const config = loadConfig(undefined, { REFRESH_ENABLED: 'true', REFRESH_TICK_MS: '30000' });

    expect(getConfigSummary(config)['refresh']).toBe('every 30000ms');
  });
});

describe('parseEnvValue', () => {
  it('should coerce booleans and numbers', () => {
    expect(parseEnvValue('true')).toBe(true);
    expect(parseEnvValue('false')).toBe(false);
    expect(parseEnvValue('42')).toBe(42);
    expect(parseEnvValue('0.5')).toBe(0.5);
  });

  it('should keep everything else as a string', () => {
    expect(parseEnvValue('sqlite::memory:')).toBe('sqlite::memory:');
    expect(parseEnvValue('BTCUSDT')).toBe('BTCUSDT');
  });
});
