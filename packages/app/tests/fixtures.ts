/**
 * Shared helpers for app tests
 */

import { vi } from 'vitest';
import type { AnalysisResult, Candle, CandleStore, ExchangeFetcher, FetchRequest, TimeRange } from '@pivot-suite/contracts';
import { createLogger } from '@pivot-suite/logger';

export const QUARTER = 15 * 60 * 1000;
export const HOUR = 60 * 60 * 1000;
export const DAY = 24 * HOUR;
/** Monday */
export const T0 = Date.UTC(2024, 0, 1);

export function silentLogger() {
  return createLogger({ level: 'error', console: false });
}

/**
 * 15m candles over `range`, drifting up one point each.
 */
export function candlesIn(ticker: string, range: TimeRange): Candle[] {
  const count = Math.floor((range.end - range.start) / QUARTER);
  return Array.from({ length: count }, (_, i) => {
    const open = 100 + i;
    return {
      ticker,
      timestamp: range.start + i * QUARTER,
      open,
      high: open + 1.5,
      low: open - 1,
      close: open + 0.5,
      volume: 10,
    };
  });
}

/**
 * Fetcher answering every request from `candlesIn`, unless `fail` throws for it.
 */
export function stubFetcher(fail?: (request: FetchRequest) => Error | undefined) {
  const fetch = vi.fn(async (request: FetchRequest): Promise<Candle[]> => {
    const error = fail?.(request);
    if (error) throw error;
    return candlesIn(request.ticker, request.range);
  });
  const fetcher: ExchangeFetcher = { name: 'stub', fetch };
  return { fetcher, fetch };
}

export class InMemoryCandleStore implements CandleStore {
  rows = new Map<string, Candle>();

  async read(ticker: string, range: TimeRange): Promise<Candle[]> {
    return [...this.rows.values()]
      .filter((c) => c.ticker === ticker && c.timestamp >= range.start && c.timestamp < range.end)
      .sort((a, b) => a.timestamp - b.timestamp);
  }

  async write(candles: readonly Candle[]): Promise<number> {
    let inserted = 0;
    for (const candle of candles) {
      const key = `${candle.ticker}:${candle.timestamp}`;
      if (!this.rows.has(key)) {
        this.rows.set(key, candle);
        inserted += 1;
      }
    }
    return inserted;
  }

  async latestTimestamp(ticker: string): Promise<number | null> {
    const timestamps = [...this.rows.values()].filter((c) => c.ticker === ticker).map((c) => c.timestamp);
    return timestamps.length === 0 ? null : Math.max(...timestamps);
  }
}

export function emptyResult(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    ticker: 'BTCUSDT',
    timeframe: 'daily',
    dateRangeDays: 30,
    weekdays: [0, 1, 2, 3, 4, 5, 6],
    range: { start: T0, end: T0 + DAY },
    candleCount: 0,
    pivotTable: [],
    distribution: [],
    stats: { status: 'insufficient-data', buckets: 0, degenerate: 0 },
    live: null,
    degraded: false,
    warnings: [],
    lastUpdated: T0 + DAY,
    ...overrides,
  };
}

export function at<T>(items: readonly T[], index: number): T {
  const item = items[index];
  if (item === undefined) {
    throw new Error(`no element at index ${index}`);
  }
  return item;
}
