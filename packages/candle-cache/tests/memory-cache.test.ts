/**
 * Tests for the in-memory LRU candle tier
 */

import { describe, it, expect } from 'vitest'
import { MemoryCandleCache } from '../src/memoryCandleCache.js'
import { HOUR, QUARTER, T0, makeCandles } from './fixtures.js'

describe('MemoryCandleCache', () => {
  it('should return candles of one ticker within the range in order', () => {
    const cache = new MemoryCandleCache()
    cache.write([...makeCandles('ETHUSDT', T0, 4), ...makeCandles('BTCUSDT', T0, 8)].reverse())

    const hit = cache.read('BTCUSDT', { start: T0 + QUARTER, end: T0 + HOUR })
    expect(hit.map((c) => c.timestamp)).toEqual([T0 + QUARTER, T0 + 2 * QUARTER, T0 + 3 * QUARTER])
    expect(hit.every((c) => c.ticker === 'BTCUSDT')).toBe(true)
  })

  it('should count only new candles as added', () => {
    const cache = new MemoryCandleCache()
    const candles = makeCandles('BTCUSDT', T0, 4)

    expect(cache.write(candles)).toBe(4)
    expect(cache.write(candles)).toBe(0)
    expect(cache.size()).toBe(4)
  })

  it('should evict the least recently used candle at capacity', () => {
    const cache = new MemoryCandleCache({ maxSize: 3 })
    cache.write(makeCandles('BTCUSDT', T0, 3))

    // touch the oldest so the second becomes least recently used
    cache.read('BTCUSDT', { start: T0, end: T0 + QUARTER })
    cache.write(makeCandles('BTCUSDT', T0 + 3 * QUARTER, 1))

    const remaining = cache.read('BTCUSDT', { start: T0, end: T0 + HOUR }).map((c) => c.timestamp)
    expect(remaining).toEqual([T0, T0 + 2 * QUARTER, T0 + 3 * QUARTER])
  })

  it('should clear everything', () => {
    const cache = new MemoryCandleCache()
    cache.write(makeCandles('BTCUSDT', T0, 2))
    cache.clear()
    expect(cache.size()).toBe(0)
  })
})
