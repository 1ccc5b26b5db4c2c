/**
 * Analysis results and stores for analysis-cache tests
 */

import type { AnalysisKey, AnalysisResult } from '@pivot-suite/contracts'

export const HOUR = 60 * 60 * 1000
export const DAY = 24 * HOUR
export const T0 = Date.UTC(2024, 0, 1)
export const AS_OF = T0 + 30 * DAY

export const dailyKey: AnalysisKey = {
  ticker: 'BTCUSDT',
  timeframe: 'daily',
  dateRangeDays: 30,
  weekdays: [0, 1, 2, 3, 4, 5, 6],
}

export function makeResult(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    ...dailyKey,
    range: { start: T0, end: AS_OF },
    candleCount: 2880,
    pivotTable: [
      {
        status: 'scored',
        bucketStart: T0,
        bucketEnd: T0 + DAY,
        weekday: 0,
        open: 100,
        high: 110,
        low: 90,
        close: 95,
        p1: { role: 'P1', kind: 'high', level: 110, formedAt: T0 + 6 * HOUR, outcome: 'untested' },
        p2: { role: 'P2', kind: 'low', level: 90, formedAt: T0 + 12 * HOUR, outcome: 'flipped' },
        bias: 'below',
      },
      {
        status: 'degenerate',
        bucketStart: T0 + DAY,
        bucketEnd: T0 + 2 * DAY,
        weekday: 1,
        candleCount: 1,
        reason: '1 candle(s), needs 2',
      },
    ],
    distribution: [
      { slot: 6, label: '06:00 UTC', p1Count: 1, p2Count: 0, p1Pct: 100, p2Pct: 0, lastP1Ago: 0, lastP2Ago: null },
      { slot: 12, label: '12:00 UTC', p1Count: 0, p2Count: 1, p1Pct: 0, p2Pct: 100, lastP1Ago: null, lastP2Ago: 0 },
    ],
    stats: {
      status: 'ok',
      buckets: 2,
      scored: 1,
      degenerate: 1,
      p1: { scored: 1, held: 0, flipped: 0, untested: 1, heldPct: 0, flippedPct: 0, untestedPct: 100 },
      p2: { scored: 1, held: 0, flipped: 1, untested: 0, heldPct: 0, flippedPct: 100, untestedPct: 0 },
      overall: { scored: 2, held: 0, flipped: 1, untested: 1, heldPct: 0, flippedPct: 50, untestedPct: 50 },
      bias: { above: 0, below: 1, neutral: 0, abovePct: 0, belowPct: 100, ratio: 0 },
      p1Kinds: { high: 1, low: 0 },
    },
    live: {
      bucketStart: AS_OF,
      p1: { kind: 'low', level: 96, formedAt: AS_OF + HOUR, slot: 1 },
      p2: { kind: 'high', level: 101, formedAt: AS_OF + 3 * HOUR, slot: 3 },
      currentSlot: 4,
      p1AfterP1Pct: 100,
      p1FlipRiskPct: 100,
      p1FlipRisk: 'high',
      p2AfterNowPct: 100,
      p2Formation: 'unlikely',
    },
    degraded: false,
    warnings: [],
    lastUpdated: AS_OF,
    ...overrides,
  }
}

export interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (error: Error) => void
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {}
  let reject: (error: Error) => void = () => {}
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}
