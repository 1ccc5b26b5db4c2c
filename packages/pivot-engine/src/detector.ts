/**
 * Pivot detector: P1/P2 per bucket and their outcome in the next bucket.
 */

import { DegenerateBucketError } from '@pivot-suite/contracts';
import type {
  Candle,
  DegeneratePivotRow,
  PivotKind,
  PivotOutcome,
  PivotPoint,
  PivotTableRow,
  PriceBias,
} from '@pivot-suite/contracts';
import type { Bucket } from './bucketing.js';

/** Default proximity threshold, percent of the pivot level */
export const DEFAULT_PROXIMITY_PCT = 0.5;

/** Fewest candles a bucket needs for two distinct pivots */
export const MIN_BUCKET_CANDLES = 2;

export interface Extreme {
  kind: PivotKind;
  level: number;
  /** Open time of the candle that set the level */
  formedAt: number;
}

export interface BucketExtremes {
  /** The extreme that formed first */
  p1: Extreme;
  p2: Extreme;
}

/**
 * Locates the bucket high and low and orders them in time.
 *
 * The earliest candle wins a tie on the extreme price. When the high and
 * the low are set by the same candle, the low is taken as P1.
 *
 * @returns null for fewer than two candles
 */
export function findExtremes(candles: readonly Candle[]): BucketExtremes | null {
  if (candles.length < MIN_BUCKET_CANDLES) return null;

  let highCandle: Candle | undefined;
  let lowCandle: Candle | undefined;
  for (const candle of candles) {
    if (!highCandle || candle.high > highCandle.high) highCandle = candle;
    if (!lowCandle || candle.low < lowCandle.low) lowCandle = candle;
  }
  if (!highCandle || !lowCandle) return null;

  const high: Extreme = { kind: 'high', level: highCandle.high, formedAt: highCandle.timestamp };
  const low: Extreme = { kind: 'low', level: lowCandle.low, formedAt: lowCandle.timestamp };
  return high.formedAt < low.formedAt ? { p1: high, p2: low } : { p1: low, p2: high };
}

/**
 * Outcome of a pivot level against the following bucket.
 *
 * - high pivot: flipped when `next` closes above it, held when `next` trades
 *   up to within the proximity band below it
 * - low pivot: flipped when `next` closes below it, held when `next` trades
 *   down to within the proximity band above it
 * - untested otherwise, or when there is no usable next bucket
 *
 * @example
 * ```typescript
 * // day 1 low 90, day 2 closes at 88
 * classifyOutcome('low', 90, { high: 95, low: 85, close: 88 }, 0.5); // 'flipped'
 * ```
 */
export function classifyOutcome(
  kind: PivotKind,
  level: number,
  next: Pick<Bucket, 'high' | 'low' | 'close'> | null,
  proximityPct: number
): PivotOutcome {
  if (!next || !Number.isFinite(next.close)) return 'untested';
  const band = proximityPct / 100;

  if (kind === 'high') {
    if (next.close > level) return 'flipped';
    return next.high >= level * (1 - band) ? 'held' : 'untested';
  }
  if (next.close < level) return 'flipped';
  return next.low <= level * (1 + band) ? 'held' : 'untested';
}

/**
 * Where the bucket closed relative to the P1/P2 midpoint.
 */
export function priceBias(close: number, p1: number, p2: number): PriceBias {
  const midpoint = (p1 + p2) / 2;
  if (close > midpoint) return 'above';
  if (close < midpoint) return 'below';
  return 'neutral';
}

export interface DetectOptions {
  proximityPct?: number;
}

/**
 * Scores one bucket.
 *
 * `next` must start where `bucket` ends and lie inside the analysed range;
 * anything else leaves both outcomes untested. Buckets too thin to hold two
 * distinct pivots come back as degenerate rows.
 */
export function detectPivots(bucket: Bucket, next: Bucket | null, options: DetectOptions = {}): PivotTableRow {
  const proximityPct = options.proximityPct ?? DEFAULT_PROXIMITY_PCT;
  const base = { bucketStart: bucket.start, bucketEnd: bucket.end, weekday: bucket.weekday };

  const extremes = findExtremes(bucket.candles);
  if (!extremes || extremes.p1.level === extremes.p2.level) {
    const reason = extremes
      ? 'no price range'
      : `${bucket.candles.length} candle(s), needs ${MIN_BUCKET_CANDLES}`;
    return { ...base, status: 'degenerate', candleCount: bucket.candles.length, reason };
  }

  const usableNext = next && next.start === bucket.end && next.complete ? next : null;
  const toPoint = (role: PivotPoint['role'], extreme: Extreme): PivotPoint => ({
    role,
    kind: extreme.kind,
    level: extreme.level,
    formedAt: extreme.formedAt,
    outcome: classifyOutcome(extreme.kind, extreme.level, usableNext, proximityPct),
  });

  return {
    ...base,
    status: 'scored',
    open: bucket.open,
    high: bucket.high,
    low: bucket.low,
    close: bucket.close,
    p1: toPoint('P1', extremes.p1),
    p2: toPoint('P2', extremes.p2),
    bias: priceBias(bucket.close, extremes.p1.level, extremes.p2.level),
  };
}

/**
 * Typed error for a degenerate row, for logging and error counters.
 */
export function toDegenerateError(row: DegeneratePivotRow): DegenerateBucketError {
  return new DegenerateBucketError(
    `Bucket ${new Date(row.bucketStart).toISOString()} not scored: ${row.reason}`,
    { bucketStart: row.bucketStart, candleCount: row.candleCount }
  );
}
