/**
 * Analysis cache keys.
 */

import { normalizeWeekdays } from '@pivot-suite/contracts'
import type { AnalysisKey } from '@pivot-suite/contracts'

/**
 * Upper-cases the ticker and sorts and deduplicates the weekdays, so that
 * equivalent requests share one entry.
 */
export function normalizeKey(key: AnalysisKey): AnalysisKey {
  return {
    ticker: key.ticker.trim().toUpperCase(),
    timeframe: key.timeframe,
    dateRangeDays: key.dateRangeDays,
    weekdays: normalizeWeekdays(key.weekdays),
  }
}

/**
 * Stable string form of a normalised key.
 *
 * @example
 * serializeKey({ ticker: 'BTCUSDT', timeframe: 'daily', dateRangeDays: 30, weekdays: [0, 4] })
 * // 'BTCUSDT:daily:30:0,4'
 */
export function serializeKey(key: AnalysisKey): string {
  return `${key.ticker}:${key.timeframe}:${key.dateRangeDays}:${key.weekdays.join(',')}`
}

export function keyOf(result: AnalysisKey): AnalysisKey {
  return {
    ticker: result.ticker,
    timeframe: result.timeframe,
    dateRangeDays: result.dateRangeDays,
    weekdays: result.weekdays,
  }
}
