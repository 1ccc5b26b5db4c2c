/**
 * Candle integrity checks.
 *
 * A row that breaks an OHLCV invariant is rejected with a DataIntegrityError;
 * the rest of its batch is kept.
 */

import { DataIntegrityError, intervalToMillis, SOURCE_INTERVAL } from '@pivot-suite/contracts'
import type { Candle, CandleInterval } from '@pivot-suite/contracts'

export interface IntegrityReport {
  /** Accepted candles, in input order, with identical duplicates collapsed */
  valid: Candle[]
  rejected: DataIntegrityError[]
}

function sameValues(a: Candle, b: Candle): boolean {
  return (
    a.open === b.open &&
    a.high === b.high &&
    a.low === b.low &&
    a.close === b.close &&
    a.volume === b.volume &&
    a.turnover === b.turnover
  )
}

/**
 * Name of the first invariant `candle` breaks, or null if it is well formed.
 */
export function findViolation(candle: Candle, intervalMs: number): string | null {
  const values = [candle.open, candle.high, candle.low, candle.close, candle.volume]
  if (candle.turnover !== undefined) values.push(candle.turnover)

  if (!Number.isFinite(candle.timestamp) || values.some((value) => !Number.isFinite(value))) {
    return 'non-finite'
  }
  if (values.some((value) => value < 0)) return 'negative-value'
  if (candle.high < candle.low) return 'high-below-low'
  if (candle.high < Math.max(candle.open, candle.close)) return 'high-below-body'
  if (candle.low > Math.min(candle.open, candle.close)) return 'low-above-body'
  if (candle.timestamp % intervalMs !== 0) return 'misaligned-timestamp'
  return null
}

/**
 * Splits a batch into valid candles and rejections.
 *
 * A second row for an already accepted (ticker, timestamp) is dropped silently
 * when its values match, and rejected as `duplicate-mismatch` otherwise.
 *
 * @example
 * const { valid, rejected } = validateCandles(batch, '15m')
 * for (const error of rejected) logger.warn(error.message, error.data)
 */
export function validateCandles(
  candles: readonly Candle[],
  interval: CandleInterval = SOURCE_INTERVAL
): IntegrityReport {
  const intervalMs = intervalToMillis(interval)
  const accepted = new Map<string, Candle>()
  const valid: Candle[] = []
  const rejected: DataIntegrityError[] = []

  for (const candle of candles) {
    const rule = findViolation(candle, intervalMs)
    if (rule !== null) {
      rejected.push(
        new DataIntegrityError(`Rejected ${candle.ticker} candle at ${candle.timestamp}: ${rule}`, {
          ticker: candle.ticker,
          timestamp: candle.timestamp,
          rule,
        })
      )
      continue
    }

    const key = `${candle.ticker}:${candle.timestamp}`
    const existing = accepted.get(key)
    if (existing) {
      if (!sameValues(existing, candle)) {
        rejected.push(
          new DataIntegrityError(
            `Rejected ${candle.ticker} candle at ${candle.timestamp}: duplicate-mismatch`,
            { ticker: candle.ticker, timestamp: candle.timestamp, rule: 'duplicate-mismatch' }
          )
        )
      }
      continue
    }

    accepted.set(key, candle)
    valid.push(candle)
  }

  return { valid, rejected }
}
