/**
 * In-memory LRU tier for candles.
 *
 * Keys are `{ticker}:{timestamp}`. A Map keeps insertion order, so moving a
 * touched entry to the end and evicting from the front gives LRU behaviour.
 */

import { intervalToMillis, SOURCE_INTERVAL } from '@pivot-suite/contracts'
import type { Candle, CandleInterval, TimeRange } from '@pivot-suite/contracts'
import { firstSlot } from './coverage.js'

const DEFAULT_MAX_SIZE = 50_000

export interface MemoryCandleCacheOptions {
  /** Maximum number of candles held (default: 50000) */
  maxSize?: number
  /** Grid the cached candles sit on (default: 15m) */
  interval?: CandleInterval
}

function serializeKey(ticker: string, timestamp: number): string {
  return `${ticker}:${timestamp}`
}

/**
 * Not shared between processes; each process warms its own copy.
 *
 * @example
 * const memory = new MemoryCandleCache({ maxSize: 10_000 })
 * memory.write(candles)
 * const hit = memory.read('BTCUSDT', { start, end })
 */
export class MemoryCandleCache {
  private cache = new Map<string, Candle>()
  private maxSize: number
  private widthMs: number

  constructor(options: MemoryCandleCacheOptions = {}) {
    this.maxSize = options.maxSize ?? DEFAULT_MAX_SIZE
    this.widthMs = intervalToMillis(options.interval ?? SOURCE_INTERVAL)
  }

  /**
   * Candles of `ticker` in `[range.start, range.end)`, ascending.
   * Every returned entry becomes most recently used.
   */
  read(ticker: string, range: TimeRange): Candle[] {
    const found: Candle[] = []
    for (let slot = firstSlot(range, this.widthMs); slot < range.end; slot += this.widthMs) {
      const key = serializeKey(ticker, slot)
      const candle = this.cache.get(key)
      if (candle !== undefined) {
        this.cache.delete(key)
        this.cache.set(key, candle)
        found.push(candle)
      }
    }
    return found
  }

  /**
   * Adds or refreshes candles, evicting the least recently used beyond capacity.
   *
   * @returns Number of candles that were not cached before
   */
  write(candles: readonly Candle[]): number {
    let added = 0
    for (const candle of candles) {
      const key = serializeKey(candle.ticker, candle.timestamp)
      if (this.cache.has(key)) {
        this.cache.delete(key)
      } else {
        added += 1
      }
      this.cache.set(key, candle)

      if (this.cache.size > this.maxSize) {
        const oldest = this.cache.keys().next().value
        if (oldest !== undefined) this.cache.delete(oldest)
      }
    }
    return added
  }

  clear(): void {
    this.cache.clear()
  }

  size(): number {
    return this.cache.size
  }
}
