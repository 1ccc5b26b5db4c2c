/**
 * Time-bucketing engine.
 *
 * Groups a flat candle series into timeframe-aligned buckets. Alignment is
 * pure UTC arithmetic on the timestamps, so the same candles always produce
 * the same bucket boundaries.
 */

import { ALL_WEEKDAYS, weekdayOf } from '@pivot-suite/contracts';
import type { Candle, PivotTimeframe, TimeRange, Weekday } from '@pivot-suite/contracts';
import { DEFAULT_SESSIONS, sessionForHour } from './sessions.js';
import type { SessionDefinition } from './sessions.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/**
 * One timeframe window and the candles that fall in it.
 */
export interface Bucket {
  /** Position in the series, 0-based */
  seq: number;
  start: number;
  end: number;
  /** Weekday of `start` (Monday = 0) */
  weekday: Weekday;
  /** Ascending by timestamp */
  candles: Candle[];
  /** Derived OHLC; NaN when the bucket holds no candles */
  open: number;
  high: number;
  low: number;
  close: number;
  /** Window lies fully inside the analysed range */
  complete: boolean;
  /** Complete and its start weekday passes the filter: eligible for scoring */
  selected: boolean;
}

export interface BucketSeries {
  timeframe: PivotTimeframe;
  range: TimeRange;
  /** Every bucket overlapping the range, in time order */
  buckets: Bucket[];
  /** The buckets to score */
  selected: Bucket[];
}

export interface BucketOptions {
  range: TimeRange;
  /** Empty means every weekday */
  weekdays?: readonly Weekday[];
  sessions?: readonly SessionDefinition[];
}

function utcDayStart(timestamp: number): number {
  return Math.floor(timestamp / DAY_MS) * DAY_MS;
}

/**
 * Start of the bucket containing `timestamp`.
 *
 * @example
 * ```typescript
 * bucketStartOf(Date.UTC(2024, 0, 3, 13, 45), 'weekly');  // Date.UTC(2024, 0, 1), a Monday
 * bucketStartOf(Date.UTC(2024, 0, 3, 13, 45), 'session'); // Date.UTC(2024, 0, 3, 8) with the default table
 * ```
 */
export function bucketStartOf(
  timestamp: number,
  timeframe: PivotTimeframe,
  sessions: readonly SessionDefinition[] = DEFAULT_SESSIONS
): number {
  switch (timeframe) {
    case 'hourly':
      return Math.floor(timestamp / HOUR_MS) * HOUR_MS;
    case '4h':
      return Math.floor(timestamp / (4 * HOUR_MS)) * 4 * HOUR_MS;
    case 'session': {
      const day = utcDayStart(timestamp);
      const hour = Math.floor((timestamp - day) / HOUR_MS);
      return day + sessionForHour(hour, sessions).startHour * HOUR_MS;
    }
    case 'daily':
      return utcDayStart(timestamp);
    case 'weekly': {
      const day = utcDayStart(timestamp);
      return day - weekdayOf(day) * DAY_MS;
    }
    case 'monthly': {
      const date = new Date(timestamp);
      return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1);
    }
  }
}

/**
 * End (exclusive) of the bucket starting at `start`.
 */
export function bucketEndOf(
  start: number,
  timeframe: PivotTimeframe,
  sessions: readonly SessionDefinition[] = DEFAULT_SESSIONS
): number {
  switch (timeframe) {
    case 'hourly':
      return start + HOUR_MS;
    case '4h':
      return start + 4 * HOUR_MS;
    case 'session': {
      const day = utcDayStart(start);
      const hour = Math.floor((start - day) / HOUR_MS);
      return day + sessionForHour(hour, sessions).endHour * HOUR_MS;
    }
    case 'daily':
      return start + DAY_MS;
    case 'weekly':
      return start + 7 * DAY_MS;
    case 'monthly': {
      const date = new Date(start);
      return Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 1);
    }
  }
}

function summarize(candles: readonly Candle[]): Pick<Bucket, 'open' | 'high' | 'low' | 'close'> {
  const first = candles[0];
  const last = candles[candles.length - 1];
  if (!first || !last) {
    return { open: NaN, high: NaN, low: NaN, close: NaN };
  }
  let high = -Infinity;
  let low = Infinity;
  for (const candle of candles) {
    if (candle.high > high) high = candle.high;
    if (candle.low < low) low = candle.low;
  }
  return { open: first.open, high, low, close: last.close };
}

/**
 * Buckets the candles of `options.range` for a timeframe.
 *
 * **Algorithm:**
 * 1. Walk bucket boundaries from the bucket containing `range.start` until
 *    one starts at or after `range.end`
 * 2. Assign each candle inside the range to the bucket its timestamp
 *    truncates to
 * 3. Mark buckets cut by either end of the range as incomplete; they are
 *    kept as neighbours for outcome checks but never scored
 * 4. Select complete buckets whose start falls on a filtered weekday
 *
 * **Edge cases:**
 * - Buckets inside the range with no candles are still emitted (NaN OHLC),
 *   so the series always covers the range
 * - Candles outside the range are ignored
 *
 * @example
 * ```typescript
 * const series = bucketCandles(candles, 'daily', {
 *   range: { start: Date.UTC(2024, 0, 1), end: Date.UTC(2024, 0, 8) },
 *   weekdays: [0],
 * });
 * series.selected.map((b) => b.start); // [Date.UTC(2024, 0, 1)]
 * ```
 */
export function bucketCandles(
  candles: readonly Candle[],
  timeframe: PivotTimeframe,
  options: BucketOptions
): BucketSeries {
  const { range } = options;
  const sessions = options.sessions ?? DEFAULT_SESSIONS;
  const filter = new Set<Weekday>(
    options.weekdays && options.weekdays.length > 0 ? options.weekdays : ALL_WEEKDAYS
  );

  const windows: Array<{ start: number; end: number; candles: Candle[] }> = [];
  const byStart = new Map<number, Candle[]>();
  if (range.end > range.start) {
    for (let start = bucketStartOf(range.start, timeframe, sessions); start < range.end; ) {
      const end = bucketEndOf(start, timeframe, sessions);
      const members: Candle[] = [];
      windows.push({ start, end, candles: members });
      byStart.set(start, members);
      start = end;
    }
  }

  const sorted = [...candles].sort((a, b) => a.timestamp - b.timestamp);
  for (const candle of sorted) {
    if (candle.timestamp < range.start || candle.timestamp >= range.end) continue;
    byStart.get(bucketStartOf(candle.timestamp, timeframe, sessions))?.push(candle);
  }

  const buckets = windows.map((window, seq): Bucket => {
    const weekday = weekdayOf(window.start);
    const complete = window.start >= range.start && window.end <= range.end;
    return {
      seq,
      start: window.start,
      end: window.end,
      weekday,
      candles: window.candles,
      ...summarize(window.candles),
      complete,
      selected: complete && filter.has(weekday),
    };
  });

  return {
    timeframe,
    range,
    buckets,
    selected: buckets.filter((bucket) => bucket.selected),
  };
}
