/**
 * SQL candle store (SQLite or PostgreSQL through db-simple).
 *
 * Stored candles are immutable: inserts use ON CONFLICT (ticker, timestamp)
 * DO NOTHING, so writing a batch twice leaves the table unchanged.
 */

import { z } from 'zod'
import { CacheUnavailableError, errorMessage } from '@pivot-suite/contracts'
import type { Candle, CandleStore, TimeRange } from '@pivot-suite/contracts'
import type { DbConnection } from '@pivot-suite/db-simple'

export const DEFAULT_CANDLE_TABLE = 'candles_15m'

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/

/**
 * Row shape as the drivers return it. PostgreSQL hands BIGINT and NUMERIC
 * back as strings, hence the coercion.
 */
const candleRowSchema = z.object({
  ticker: z.string(),
  timestamp: z.coerce.number(),
  open: z.coerce.number(),
  high: z.coerce.number(),
  low: z.coerce.number(),
  close: z.coerce.number(),
  volume: z.coerce.number(),
  turnover: z.coerce.number().nullable().optional(),
})

type CandleRow = z.infer<typeof candleRowSchema>

function toCandle(row: CandleRow): Candle {
  const candle: Candle = {
    ticker: row.ticker,
    timestamp: row.timestamp,
    open: row.open,
    high: row.high,
    low: row.low,
    close: row.close,
    volume: row.volume,
  }
  if (row.turnover !== null && row.turnover !== undefined) {
    candle.turnover = row.turnover
  }
  return candle
}

export interface SqlCandleStoreOptions {
  /** Table name (default: candles_15m) */
  table?: string
}

/**
 * @example
 * const db = await connect('sqlite:data/candles.db')
 * const store = new SqlCandleStore(db)
 * await store.init()
 * const inserted = await store.write(candles)
 */
export class SqlCandleStore implements CandleStore {
  private db: DbConnection
  private table: string

  constructor(db: DbConnection, options: SqlCandleStoreOptions = {}) {
    const table = options.table ?? DEFAULT_CANDLE_TABLE
    if (!TABLE_NAME_PATTERN.test(table)) {
      throw new Error(`Invalid candle table name: ${table}`)
    }
    this.db = db
    this.table = table
  }

  /**
   * Creates the table and its lookup index. Safe to call repeatedly.
   */
  async init(): Promise<void> {
    await this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        ticker TEXT NOT NULL,
        timestamp BIGINT NOT NULL,
        open DOUBLE PRECISION NOT NULL,
        high DOUBLE PRECISION NOT NULL,
        low DOUBLE PRECISION NOT NULL,
        close DOUBLE PRECISION NOT NULL,
        volume DOUBLE PRECISION NOT NULL,
        turnover DOUBLE PRECISION,
        UNIQUE (ticker, timestamp)
      )
    `)
    await this.db.exec(
      `CREATE INDEX IF NOT EXISTS idx_${this.table}_lookup ON ${this.table} (ticker, timestamp)`
    )
  }

  async read(ticker: string, range: TimeRange): Promise<Candle[]> {
    try {
      const rows = await this.db.query(
        `SELECT ticker, timestamp, open, high, low, close, volume, turnover
         FROM ${this.table}
         WHERE ticker = ? AND timestamp >= ? AND timestamp < ?
         ORDER BY timestamp ASC`,
        [ticker, range.start, range.end]
      )
      return rows.map((row) => toCandle(candleRowSchema.parse(row)))
    } catch (error) {
      throw new CacheUnavailableError(`Failed to read candles: ${errorMessage(error)}`, {
        store: 'sql',
        operation: 'read',
        ticker,
      })
    }
  }

  /**
   * Inserts candles, skipping (ticker, timestamp) pairs already stored.
   *
   * @returns Rows actually inserted
   */
  async write(candles: readonly Candle[]): Promise<number> {
    if (candles.length === 0) return 0
    try {
      return await this.db.transaction(async (tx) => {
        let inserted = 0
        for (const candle of candles) {
          inserted += await tx.exec(
            `INSERT INTO ${this.table} (ticker, timestamp, open, high, low, close, volume, turnover)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)
             ON CONFLICT (ticker, timestamp) DO NOTHING`,
            [
              candle.ticker,
              candle.timestamp,
              candle.open,
              candle.high,
              candle.low,
              candle.close,
              candle.volume,
              candle.turnover ?? null,
            ]
          )
        }
        return inserted
      })
    } catch (error) {
      throw new CacheUnavailableError(`Failed to write candles: ${errorMessage(error)}`, {
        store: 'sql',
        operation: 'write',
        count: candles.length,
      })
    }
  }

  async latestTimestamp(ticker: string): Promise<number | null> {
    try {
      const rows = await this.db.query(`SELECT MAX(timestamp) AS latest FROM ${this.table} WHERE ticker = ?`, [
        ticker,
      ])
      const latest = rows[0]?.['latest']
      return latest === null || latest === undefined ? null : Number(latest)
    } catch (error) {
      throw new CacheUnavailableError(`Failed to read latest candle: ${errorMessage(error)}`, {
        store: 'sql',
        operation: 'latest',
        ticker,
      })
    }
  }

  /**
   * Stored candle count, for one ticker or the whole table.
   */
  async count(ticker?: string): Promise<number> {
    const rows =
      ticker === undefined
        ? await this.db.query(`SELECT COUNT(*) AS n FROM ${this.table}`)
        : await this.db.query(`SELECT COUNT(*) AS n FROM ${this.table} WHERE ticker = ?`, [ticker])
    return Number(rows[0]?.['n'] ?? 0)
  }
}
