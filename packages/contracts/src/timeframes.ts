/**
 * @fileoverview Analysis timeframes and weekday conventions.
 *
 * Weekdays follow the ISO convention used throughout the suite:
 * 0 = Monday ... 6 = Sunday.
 *
 * @module @pivot-suite/contracts/timeframes
 */

/**
 * Bucket sizes an analysis can be run over.
 */
export const PIVOT_TIMEFRAMES = ['hourly', '4h', 'session', 'daily', 'weekly', 'monthly'] as const;

export type PivotTimeframe = (typeof PIVOT_TIMEFRAMES)[number];

const TIMEFRAME_LABELS: Record<PivotTimeframe, string> = {
  hourly: 'Hourly',
  '4h': '4 Hours',
  session: 'Session',
  daily: 'Daily',
  weekly: 'Weekly',
  monthly: 'Monthly',
};

const TIMEFRAME_ALIASES: Record<string, PivotTimeframe> = {
  hourly: 'hourly',
  hour: 'hourly',
  '1h': 'hourly',
  '60': 'hourly',
  '4h': '4h',
  h4: '4h',
  '240': '4h',
  session: 'session',
  sessions: 'session',
  daily: 'daily',
  day: 'daily',
  '1d': 'daily',
  d: 'daily',
  weekly: 'weekly',
  week: 'weekly',
  '1w': 'weekly',
  w: 'weekly',
  monthly: 'monthly',
  month: 'monthly',
  '1mo': 'monthly',
};

export function isPivotTimeframe(value: string): value is PivotTimeframe {
  return (PIVOT_TIMEFRAMES as readonly string[]).includes(value);
}

/**
 * Parses a timeframe name or common alias, case-insensitively.
 *
 * @returns The canonical timeframe, or null if the value is not recognised
 *
 * @example
 * ```typescript
 * parsePivotTimeframe('1D')     // 'daily'
 * parsePivotTimeframe('H4')     // '4h'
 * parsePivotTimeframe('minute') // null
 * ```
 */
export function parsePivotTimeframe(value: string): PivotTimeframe | null {
  return TIMEFRAME_ALIASES[value.trim().toLowerCase()] ?? null;
}

export function getTimeframeLabel(timeframe: PivotTimeframe): string {
  return TIMEFRAME_LABELS[timeframe];
}

export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export const ALL_WEEKDAYS: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6];

export const WEEKDAY_NAMES: Record<Weekday, string> = {
  0: 'Monday',
  1: 'Tuesday',
  2: 'Wednesday',
  3: 'Thursday',
  4: 'Friday',
  5: 'Saturday',
  6: 'Sunday',
};

export function isWeekday(value: number): value is Weekday {
  return Number.isInteger(value) && value >= 0 && value <= 6;
}

/**
 * Weekday of a UTC timestamp, Monday = 0.
 */
export function weekdayOf(timestamp: number): Weekday {
  const jsDay = new Date(timestamp).getUTCDay();
  const isoDay = (jsDay + 6) % 7;
  return isWeekday(isoDay) ? isoDay : 0;
}

/**
 * Sorts and deduplicates a weekday set. An empty set means "every day"
 * and normalises to all seven weekdays, so both spellings share one key.
 *
 * @example
 * ```typescript
 * normalizeWeekdays([4, 0, 4]) // [0, 4]
 * normalizeWeekdays([])        // [0, 1, 2, 3, 4, 5, 6]
 * ```
 */
export function normalizeWeekdays(weekdays: readonly Weekday[]): Weekday[] {
  if (weekdays.length === 0) {
    return [...ALL_WEEKDAYS];
  }
  return [...new Set(weekdays)].sort((a, b) => a - b);
}
