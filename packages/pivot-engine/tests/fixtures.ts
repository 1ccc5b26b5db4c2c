/**
 * Candle and row builders for pivot-engine tests
 */

import type { Candle, PivotKind, PivotOutcome, PriceBias, ScoredPivotRow } from '@pivot-suite/contracts';

export const QUARTER = 15 * 60 * 1000;
export const HOUR = 60 * 60 * 1000;
export const DAY = 24 * HOUR;
/** Monday */
export const T0 = Date.UTC(2024, 0, 1);

export function candle(timestamp: number, open: number, high: number, low: number, close: number): Candle {
  return { ticker: 'BTCUSDT', timestamp, open, high, low, close, volume: 1 };
}

/**
 * 15m candles tracing a slow sine wave, valid OHLC throughout.
 */
export function waveCandles(start: number, count: number): Candle[] {
  return Array.from({ length: count }, (_, i) => {
    const open = 100 + 10 * Math.sin(i / 15);
    const close = open + 0.3 * Math.cos(i);
    return candle(start + i * QUARTER, open, Math.max(open, close) + 0.5, Math.min(open, close) - 0.5, close);
  });
}

export function scoredRow(
  p1: { kind: PivotKind; outcome: PivotOutcome },
  p2Outcome: PivotOutcome,
  bias: PriceBias,
  bucketStart = T0
): ScoredPivotRow {
  const p2Kind: PivotKind = p1.kind === 'high' ? 'low' : 'high';
  return {
    status: 'scored',
    bucketStart,
    bucketEnd: bucketStart + DAY,
    weekday: 0,
    open: 100,
    high: 110,
    low: 90,
    close: 100,
    p1: { role: 'P1', kind: p1.kind, level: p1.kind === 'high' ? 110 : 90, formedAt: bucketStart, outcome: p1.outcome },
    p2: { role: 'P2', kind: p2Kind, level: p2Kind === 'high' ? 110 : 90, formedAt: bucketStart + HOUR, outcome: p2Outcome },
    bias,
  };
}

export function at<T>(items: readonly T[], index: number): T {
  const item = items[index];
  if (item === undefined) {
    throw new Error(`no element at index ${index}`);
  }
  return item;
}
