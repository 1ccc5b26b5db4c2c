/**
 * Tests for the SQL analysis store against in-memory SQLite
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { connect } from '@pivot-suite/db-simple'
import type { DbConnection } from '@pivot-suite/db-simple'
import { CacheUnavailableError } from '@pivot-suite/contracts'
import { createLogger } from '@pivot-suite/logger'
import { SqlAnalysisStore } from '../src/sqlAnalysisStore.js'
import { AS_OF, HOUR, dailyKey, makeResult } from './fixtures.js'

const logger = createLogger({ level: 'error', console: false })

describe('SqlAnalysisStore', () => {
  let db: DbConnection
  let store: SqlAnalysisStore

  beforeEach(async () => {
    db = await connect('sqlite::memory:')
    store = new SqlAnalysisStore(db, { logger })
    await store.init()
  })

  afterEach(async () => {
    await db.close()
  })

  it('should round-trip a result', async () => {
    const result = makeResult()
    await store.upsert(result)

    expect(await store.read(dailyKey)).toEqual(result)
  })

  it('should return null for an unknown key', async () => {
    await store.upsert(makeResult())

    expect(await store.read({ ...dailyKey, weekdays: [0] })).toBeNull()
    expect(await store.read({ ...dailyKey, ticker: 'ETHUSDT' })).toBeNull()
  })

  it('should keep one row per key and overwrite it', async () => {
    await store.upsert(makeResult())
    await store.upsert(makeResult({ lastUpdated: AS_OF + HOUR, candleCount: 2884 }))

    expect(await store.count()).toBe(1)
    const stored = await store.read(dailyKey)
    expect(stored?.lastUpdated).toBe(AS_OF + HOUR)
    expect(stored?.candleCount).toBe(2884)
  })

  it('should find a result under any spelling of its key', async () => {
    await store.upsert(makeResult())

    const stored = await store.read({ ticker: 'btcusdt', timeframe: 'daily', dateRangeDays: 30, weekdays: [] })

    expect(stored?.ticker).toBe('BTCUSDT')
  })

  it('should store the weekday set comma-joined', async () => {
    await store.upsert(makeResult({ weekdays: [4, 0] }))

    const rows = await db.query('SELECT weekdays FROM pivot_analysis_cache')

    expect(rows).toEqual([{ weekdays: '0,4' }])
  })

  it('should treat an unreadable payload as a miss', async () => {
    await db.exec(
      `INSERT INTO pivot_analysis_cache (ticker, timeframe, date_range_days, weekdays, result, last_updated)
       VALUES (?, ?, ?, ?, ?, ?)`,
      ['BTCUSDT', 'daily', 30, '0,1,2,3,4,5,6', '{"ticker":"BTCUSDT"', AS_OF]
    )

    expect(await store.read(dailyKey)).toBeNull()
  })

  it('should treat a payload of the wrong shape as a miss', async () => {
    await db.exec(
      `INSERT INTO pivot_analysis_cache (ticker, timeframe, date_range_days, weekdays, result, last_updated)
       VALUES (?, ?, ?, ?, ?, ?)`,
      ['BTCUSDT', 'daily', 30, '0,1,2,3,4,5,6', JSON.stringify({ ticker: 'BTCUSDT', stats: 'ok' }), AS_OF]
    )

    expect(await store.read(dailyKey)).toBeNull()
  })

  it('should raise CacheUnavailableError when the table is gone', async () => {
    await db.exec('DROP TABLE pivot_analysis_cache')

    await expect(store.read(dailyKey)).rejects.toBeInstanceOf(CacheUnavailableError)
    await expect(store.upsert(makeResult())).rejects.toThrow(/^Failed to store analysis: /)
  })

  it('should reject an invalid table name', () => {
    expect(() => new SqlAnalysisStore(db, { logger, table: 'cache; DROP' })).toThrow(
      'Invalid analysis table name: cache; DROP'
    )
  })
})
