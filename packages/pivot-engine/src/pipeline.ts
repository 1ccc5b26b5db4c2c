/**
 * Analysis pipeline: bucket, detect, aggregate.
 *
 * Everything here is a pure function of its input; the caller supplies the
 * candles and the clock.
 */

import { ALL_WEEKDAYS, InsufficientDataError } from '@pivot-suite/contracts';
import type {
  AnalysisKey,
  AnalysisResult,
  Candle,
  PivotTableRow,
  ScoredPivotRow,
  TimeRange,
} from '@pivot-suite/contracts';
import { aggregate } from './aggregator.js';
import { bucketCandles } from './bucketing.js';
import { DEFAULT_PROXIMITY_PCT, detectPivots } from './detector.js';
import { buildDistribution } from './distribution.js';
import { assessLiveBucket } from './insights.js';
import { DEFAULT_SESSIONS } from './sessions.js';
import type { SessionDefinition } from './sessions.js';

const QUARTER_MS = 15 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Candle window of an analysis: from UTC midnight `dateRangeDays` days
 * before `asOf`, up to `asOf` floored to the 15-minute grid.
 *
 * @example
 * ```typescript
 * analysisWindow(Date.UTC(2024, 0, 31, 10, 7), 30);
 * // { start: Date.UTC(2024, 0, 1), end: Date.UTC(2024, 0, 31, 10, 0) }
 * ```
 */
export function analysisWindow(asOf: number, dateRangeDays: number): TimeRange {
  const midnight = Math.floor(asOf / DAY_MS) * DAY_MS;
  return {
    start: midnight - dateRangeDays * DAY_MS,
    end: Math.floor(asOf / QUARTER_MS) * QUARTER_MS,
  };
}

export function isScoredRow(row: PivotTableRow): row is ScoredPivotRow {
  return row.status === 'scored';
}

export interface ComputeAnalysisInput {
  key: AnalysisKey;
  candles: readonly Candle[];
  /** Range the candles cover; the trailing bucket cut by its end is the live one */
  range: TimeRange;
  asOf: number;
  proximityPct?: number;
  sessions?: readonly SessionDefinition[];
  /** Carried through from candle resolution */
  degraded?: boolean;
  warnings?: readonly string[];
}

/**
 * Runs the pivot analysis over resolved candles.
 *
 * @throws InsufficientDataError when no candle lies inside the range
 *
 * @example
 * ```typescript
 * const result = computeAnalysis({
 *   key: { ticker: 'BTCUSDT', timeframe: 'daily', dateRangeDays: 30, weekdays: [0, 1, 2, 3, 4, 5, 6] },
 *   candles,
 *   range: analysisWindow(now, 30),
 *   asOf: now,
 * });
 * ```
 */
export function computeAnalysis(input: ComputeAnalysisInput): AnalysisResult {
  const { key, range, asOf } = input;
  const candles = input.candles.filter((c) => c.timestamp >= range.start && c.timestamp < range.end);
  if (candles.length === 0) {
    throw new InsufficientDataError(`No candles for ${key.ticker} in the requested range`, {
      ticker: key.ticker,
      timeframe: key.timeframe,
      start: range.start,
      end: range.end,
    });
  }

  const series = bucketCandles(candles, key.timeframe, {
    range,
    weekdays: key.weekdays,
    sessions: input.sessions ?? DEFAULT_SESSIONS,
  });

  const proximityPct = input.proximityPct ?? DEFAULT_PROXIMITY_PCT;
  const pivotTable = series.selected.map((bucket) =>
    detectPivots(bucket, series.buckets[bucket.seq + 1] ?? null, { proximityPct })
  );

  const distribution = buildDistribution(pivotTable.filter(isScoredRow), key.timeframe, asOf);
  const stats = aggregate(pivotTable);

  const filter = new Set(key.weekdays.length > 0 ? key.weekdays : ALL_WEEKDAYS);
  const trailing = series.buckets[series.buckets.length - 1];
  const live =
    trailing && trailing.end > range.end && trailing.start >= range.start && filter.has(trailing.weekday)
      ? assessLiveBucket(distribution, trailing, asOf, key.timeframe)
      : null;

  const warnings = [...(input.warnings ?? [])];
  if (stats.status === 'insufficient-data') {
    warnings.push(`No ${key.timeframe} bucket in range could be scored`);
  }

  return {
    ticker: key.ticker,
    timeframe: key.timeframe,
    dateRangeDays: key.dateRangeDays,
    weekdays: key.weekdays,
    range,
    candleCount: candles.length,
    pivotTable,
    distribution,
    stats,
    live,
    degraded: input.degraded ?? false,
    warnings,
    lastUpdated: asOf,
  };
}
