/**
 * Shared candle fixtures for candle-cache tests
 */

import { vi } from 'vitest'
import type { Candle, CandleStore, TimeRange } from '@pivot-suite/contracts'

export const QUARTER = 15 * 60 * 1000
export const HOUR = 60 * 60 * 1000
export const DAY = 24 * HOUR
export const T0 = Date.UTC(2024, 0, 1)

/**
 * `count` well-formed 15m candles starting at `start`, drifting up one point each.
 */
export function makeCandles(ticker: string, start: number, count: number): Candle[] {
  return Array.from({ length: count }, (_, i) => {
    const open = 100 + i
    const close = open + 0.5
    return {
      ticker,
      timestamp: start + i * QUARTER,
      open,
      high: close + 1,
      low: open - 1,
      close,
      volume: 10,
    }
  })
}

export function candlesIn(ticker: string, range: TimeRange): Candle[] {
  return makeCandles(ticker, range.start, Math.floor((range.end - range.start) / QUARTER))
}

/**
 * CandleStore over a Map with spies on every method.
 */
export class InMemoryCandleStore implements CandleStore {
  rows = new Map<string, Candle>()

  read = vi.fn(async (ticker: string, range: TimeRange): Promise<Candle[]> => {
    return [...this.rows.values()]
      .filter((c) => c.ticker === ticker && c.timestamp >= range.start && c.timestamp < range.end)
      .sort((a, b) => a.timestamp - b.timestamp)
  })

  write = vi.fn(async (candles: readonly Candle[]): Promise<number> => {
    let inserted = 0
    for (const candle of candles) {
      const key = `${candle.ticker}:${candle.timestamp}`
      if (!this.rows.has(key)) {
        this.rows.set(key, candle)
        inserted += 1
      }
    }
    return inserted
  })

  latestTimestamp = vi.fn(async (ticker: string): Promise<number | null> => {
    const timestamps = [...this.rows.values()].filter((c) => c.ticker === ticker).map((c) => c.timestamp)
    return timestamps.length === 0 ? null : Math.max(...timestamps)
  })

  seed(candles: readonly Candle[]): void {
    for (const candle of candles) {
      this.rows.set(`${candle.ticker}:${candle.timestamp}`, candle)
    }
  }
}

/**
 * Element at `index`, failing the test when it is missing.
 */
export function at<T>(items: readonly T[], index: number): T {
  const item = items[index]
  if (item === undefined) {
    throw new Error(`no element at index ${index}`)
  }
  return item
}
