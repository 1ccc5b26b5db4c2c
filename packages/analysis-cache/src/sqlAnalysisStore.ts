/**
 * SQL analysis store (SQLite or PostgreSQL through db-simple).
 *
 * One row per normalised key; the result is kept as a JSON document and
 * replaced wholesale on upsert.
 */

import { z } from 'zod'
import { CacheUnavailableError, errorMessage } from '@pivot-suite/contracts'
import type { AnalysisKey, AnalysisResult, AnalysisStore } from '@pivot-suite/contracts'
import type { DbConnection, DbRow } from '@pivot-suite/db-simple'
import type { Logger } from '@pivot-suite/logger'
import { keyOf, normalizeKey, serializeKey } from './key.js'
import { analysisResultSchema } from './resultSchema.js'

export const DEFAULT_ANALYSIS_TABLE = 'pivot_analysis_cache'

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/

const storedRowSchema = z.object({
  result: z.string(),
  last_updated: z.coerce.number(),
})

export interface SqlAnalysisStoreOptions {
  logger: Logger
  /** Table name (default: pivot_analysis_cache) */
  table?: string
}

/**
 * @example
 * const store = new SqlAnalysisStore(await connect('sqlite:data/pivots.db'), { logger })
 * await store.init()
 */
export class SqlAnalysisStore implements AnalysisStore {
  private logger: Logger
  private table: string

  constructor(
    private db: DbConnection,
    options: SqlAnalysisStoreOptions
  ) {
    const table = options.table ?? DEFAULT_ANALYSIS_TABLE
    if (!TABLE_NAME_PATTERN.test(table)) {
      throw new Error(`Invalid analysis table name: ${table}`)
    }
    this.table = table
    this.logger = options.logger
  }

  async init(): Promise<void> {
    await this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        ticker TEXT NOT NULL,
        timeframe TEXT NOT NULL,
        date_range_days INTEGER NOT NULL,
        weekdays TEXT NOT NULL,
        result TEXT NOT NULL,
        last_updated BIGINT NOT NULL,
        UNIQUE (ticker, timeframe, date_range_days, weekdays)
      )
    `)
  }

  async read(key: AnalysisKey): Promise<AnalysisResult | null> {
    const normalized = normalizeKey(key)
    let rows: DbRow[]
    try {
      rows = await this.db.query(
        `SELECT result, last_updated FROM ${this.table}
         WHERE ticker = ? AND timeframe = ? AND date_range_days = ? AND weekdays = ?`,
        [normalized.ticker, normalized.timeframe, normalized.dateRangeDays, normalized.weekdays.join(',')]
      )
    } catch (error) {
      throw new CacheUnavailableError(`Failed to read analysis: ${errorMessage(error)}`, {
        store: 'sql',
        operation: 'read',
        key: serializeKey(normalized),
      })
    }

    const row = storedRowSchema.safeParse(rows[0])
    if (!row.success) return null

    const parsed = analysisResultSchema.safeParse(parseJson(row.data.result))
    if (!parsed.success) {
      this.logger.warn('Discarding unreadable cached analysis', {
        key: serializeKey(normalized),
        error: parsed.error.message,
      })
      return null
    }
    return parsed.data
  }

  async upsert(result: AnalysisResult): Promise<void> {
    const key = normalizeKey(keyOf(result))
    try {
      await this.db.exec(
        `INSERT INTO ${this.table} (ticker, timeframe, date_range_days, weekdays, result, last_updated)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT (ticker, timeframe, date_range_days, weekdays)
         DO UPDATE SET result = excluded.result, last_updated = excluded.last_updated`,
        [
          key.ticker,
          key.timeframe,
          key.dateRangeDays,
          key.weekdays.join(','),
          JSON.stringify({ ...result, ...key }),
          result.lastUpdated,
        ]
      )
    } catch (error) {
      throw new CacheUnavailableError(`Failed to store analysis: ${errorMessage(error)}`, {
        store: 'sql',
        operation: 'upsert',
        key: serializeKey(key),
      })
    }
  }

  async count(): Promise<number> {
    const rows = await this.db.query(`SELECT COUNT(*) AS n FROM ${this.table}`)
    return Number(rows[0]?.['n'] ?? 0)
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}
