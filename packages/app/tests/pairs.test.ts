/**
 * Popular pair source tests
 */

import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, vi } from 'vitest';
import type { SupabaseClient } from '@supabase/supabase-js';
import { CacheUnavailableError } from '@pivot-suite/contracts';
import { StaticPairSource, SupabasePairSource, isDue, loadPopularPairs } from '../src/pairs/index.js';
import type { PopularPair } from '../src/pairs/index.js';
import { T0, at } from './fixtures.js';

const MINUTE = 60_000;

function writeTempJson(content: string): string {
  const file = join(mkdtempSync(join(tmpdir(), 'pairs-')), 'pairs.json');
  writeFileSync(file, content);
  return file;
}

describe('loadPopularPairs', () => {
  it('should load the bundled list', () => {
    const pairs = loadPopularPairs();

    expect(pairs).toHaveLength(15);
    expect(at(pairs, 0)).toEqual({ ticker: 'BTCUSDT', priority: 1, autoUpdate: true, updateIntervalMinutes: 15 });
  });

  it('should fill defaults and uppercase tickers', () => {
    const file = writeTempJson('[{ "ticker": "dogeusdt" }]');

    expect(loadPopularPairs(file)).toEqual([
      { ticker: 'DOGEUSDT', priority: 1, autoUpdate: true, updateIntervalMinutes: 15 },
    ]);
  });

  it('should reject an invalid list', () => {
    const file = writeTempJson('[{ "ticker": "BTC/USDT" }]');

    expect(() => loadPopularPairs(file)).toThrow(`Invalid popular pairs in ${file}`);
  });

  it('should name a missing file', () => {
    expect(() => loadPopularPairs('/nonexistent/pairs.json')).toThrow(
      /^Cannot read popular pairs from \/nonexistent\/pairs\.json: /
    );
  });
});

describe('StaticPairSource', () => {
  it('should list pairs by priority and remember refresh times', async () => {
    const source = new StaticPairSource([
      { ticker: 'ETHUSDT', priority: 2, autoUpdate: true, updateIntervalMinutes: 15 },
      { ticker: 'BTCUSDT', priority: 1, autoUpdate: true, updateIntervalMinutes: 15 },
    ]);

    await source.markFetched('ETHUSDT', T0);
    const pairs = await source.list();

    expect(pairs.map((p) => [p.ticker, p.lastFetched])).toEqual([
      ['BTCUSDT', null],
      ['ETHUSDT', T0],
    ]);
  });
});

describe('isDue', () => {
  const pair: PopularPair = {
    ticker: 'BTCUSDT',
    priority: 1,
    autoUpdate: true,
    updateIntervalMinutes: 15,
    lastFetched: null,
  };

  it('should be due when never fetched', () => {
    expect(isDue(pair, T0)).toBe(true);
  });

  it('should be due once the interval has passed', () => {
    const fetched = { ...pair, lastFetched: T0 };

    expect(isDue(fetched, T0 + 14 * MINUTE)).toBe(false);
    expect(isDue(fetched, T0 + 15 * MINUTE)).toBe(true);
  });

  it('should never be due with auto update off', () => {
    expect(isDue({ ...pair, autoUpdate: false }, T0)).toBe(false);
  });
});

describe('SupabasePairSource', () => {
  function listMock(result: { data: unknown; error: { message: string } | null }) {
    const order = vi.fn().mockResolvedValue(result);
    const select = vi.fn().mockReturnValue({ order });
    const from = vi.fn().mockReturnValue({ select });
    return { client: { from } as unknown as SupabaseClient, from, select, order };
  }

  it('should map popular_pairs rows', async () => {
    const { client, from, select, order } = listMock({
      data: [
        {
          ticker: 'BTCUSDT',
          priority: 1,
          auto_update: true,
          update_interval_minutes: 15,
          last_fetched: '2024-01-01T00:00:00.000Z',
        },
        { ticker: 'ETHUSDT', priority: null, auto_update: null, update_interval_minutes: null, last_fetched: null },
      ],
      error: null,
    });

    const pairs = await new SupabasePairSource(client).list();

    expect(from).toHaveBeenCalledWith('popular_pairs');
    expect(select).toHaveBeenCalledWith('ticker,priority,auto_update,update_interval_minutes,last_fetched');
    expect(order).toHaveBeenCalledWith('priority', { ascending: true });
    expect(pairs).toEqual([
      { ticker: 'BTCUSDT', priority: 1, autoUpdate: true, updateIntervalMinutes: 15, lastFetched: T0 },
      { ticker: 'ETHUSDT', priority: 1, autoUpdate: true, updateIntervalMinutes: 15, lastFetched: null },
    ]);
  });

  it('should raise CacheUnavailableError when the table cannot be read', async () => {
    const { client } = listMock({ data: null, error: { message: 'relation does not exist' } });

    const result = new SupabasePairSource(client).list();

    await expect(result).rejects.toBeInstanceOf(CacheUnavailableError);
    await expect(result).rejects.toThrow('Failed to load popular pairs: relation does not exist');
  });

  it('should record the refresh time', async () => {
    const eq = vi.fn().mockResolvedValue({ data: null, error: null });
    const update = vi.fn().mockReturnValue({ eq });
    const from = vi.fn().mockReturnValue({ update });
    const source = new SupabasePairSource({ from } as unknown as SupabaseClient);

    await source.markFetched('BTCUSDT', T0);

    expect(update).toHaveBeenCalledWith({ last_fetched: '2024-01-01T00:00:00.000Z' });
    expect(eq).toHaveBeenCalledWith('ticker', 'BTCUSDT');
  });
});
