/**
 * Supabase-backed analysis store.
 *
 * The pivot table and stats get JSONB columns of their own so dashboards can
 * query them; everything else of the result rides along in `details`.
 */

import type { SupabaseClient } from '@supabase/supabase-js'
import { z } from 'zod'
import { CacheUnavailableError, PIVOT_TIMEFRAMES } from '@pivot-suite/contracts'
import type { AnalysisKey, AnalysisResult, AnalysisStore } from '@pivot-suite/contracts'
import type { Logger } from '@pivot-suite/logger'
import { keyOf, normalizeKey, serializeKey } from './key.js'
import { DEFAULT_ANALYSIS_TABLE } from './sqlAnalysisStore.js'
import { analysisDetailsSchema, analysisResultSchema } from './resultSchema.js'

const COLUMNS = 'ticker,timeframe,date_range_days,weekdays,pivot_table,stats,details,last_updated'

const supabaseAnalysisRowSchema = z.object({
  ticker: z.string(),
  timeframe: z.enum(PIVOT_TIMEFRAMES),
  date_range_days: z.number(),
  weekdays: z.array(z.number()),
  pivot_table: z.unknown(),
  stats: z.unknown(),
  details: analysisDetailsSchema,
  last_updated: z.string(),
})

/** PostgreSQL array literal, e.g. `{0,4}` */
function toArrayLiteral(values: readonly number[]): string {
  return `{${values.join(',')}}`
}

export interface SupabaseAnalysisStoreOptions {
  logger: Logger
  /** Table name (default: pivot_analysis_cache) */
  table?: string
}

export class SupabaseAnalysisStore implements AnalysisStore {
  private logger: Logger
  private table: string

  constructor(
    private supabase: SupabaseClient,
    options: SupabaseAnalysisStoreOptions
  ) {
    this.logger = options.logger
    this.table = options.table ?? DEFAULT_ANALYSIS_TABLE
  }

  async read(key: AnalysisKey): Promise<AnalysisResult | null> {
    const normalized = normalizeKey(key)
    const { data, error } = await this.supabase
      .from(this.table)
      .select(COLUMNS)
      .eq('ticker', normalized.ticker)
      .eq('timeframe', normalized.timeframe)
      .eq('date_range_days', normalized.dateRangeDays)
      .eq('weekdays', toArrayLiteral(normalized.weekdays))
      .maybeSingle()

    if (error) {
      throw new CacheUnavailableError(`Supabase analysis read failed: ${error.message}`, {
        store: 'supabase',
        operation: 'read',
        key: serializeKey(normalized),
      })
    }
    if (data === null) return null

    const row = supabaseAnalysisRowSchema.safeParse(data)
    const result = row.success
      ? analysisResultSchema.safeParse({
          ...row.data.details,
          ticker: row.data.ticker,
          timeframe: row.data.timeframe,
          dateRangeDays: row.data.date_range_days,
          weekdays: row.data.weekdays,
          pivotTable: row.data.pivot_table,
          stats: row.data.stats,
          lastUpdated: Date.parse(row.data.last_updated),
        })
      : row
    if (!result.success) {
      this.logger.warn('Discarding unreadable cached analysis', {
        key: serializeKey(normalized),
        error: result.error.message,
      })
      return null
    }
    return result.data
  }

  async upsert(result: AnalysisResult): Promise<void> {
    const key = normalizeKey(keyOf(result))
    const { error } = await this.supabase.from(this.table).upsert(
      {
        ticker: key.ticker,
        timeframe: key.timeframe,
        date_range_days: key.dateRangeDays,
        weekdays: key.weekdays,
        pivot_table: result.pivotTable,
        stats: result.stats,
        details: {
          range: result.range,
          candleCount: result.candleCount,
          distribution: result.distribution,
          live: result.live,
          degraded: result.degraded,
          warnings: result.warnings,
        },
        last_updated: new Date(result.lastUpdated).toISOString(),
      },
      { onConflict: 'ticker,timeframe,date_range_days,weekdays' }
    )

    if (error) {
      throw new CacheUnavailableError(`Supabase analysis upsert failed: ${error.message}`, {
        store: 'supabase',
        operation: 'upsert',
        key: serializeKey(key),
      })
    }
  }
}
