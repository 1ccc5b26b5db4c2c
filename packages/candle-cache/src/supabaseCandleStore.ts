/**
 * Supabase-backed candle store.
 *
 * Reads page through the table by timestamp (Supabase caps a response at
 * 1000 rows); writes upsert in chunks and ignore rows already stored.
 */

import type { SupabaseClient } from '@supabase/supabase-js'
import { z } from 'zod'
import { CacheUnavailableError } from '@pivot-suite/contracts'
import type { Candle, CandleStore, TimeRange } from '@pivot-suite/contracts'
import type { Logger } from '@pivot-suite/logger'
import { DEFAULT_CANDLE_TABLE } from './sqlCandleStore.js'

const DEFAULT_PAGE_SIZE = 1000
const DEFAULT_WRITE_CHUNK = 500

const COLUMNS = 'ticker,timestamp,open,high,low,close,volume,turnover'

const supabaseCandleRowSchema = z.object({
  ticker: z.string(),
  timestamp: z.string().transform((value, ctx) => {
    const ms = Date.parse(value)
    if (Number.isNaN(ms)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp ${value}` })
      return z.NEVER
    }
    return ms
  }),
  open: z.coerce.number(),
  high: z.coerce.number(),
  low: z.coerce.number(),
  close: z.coerce.number(),
  volume: z.coerce.number(),
  turnover: z.coerce.number().nullable().optional(),
})

type SupabaseCandleRow = z.infer<typeof supabaseCandleRowSchema>

function toCandle(row: SupabaseCandleRow): Candle {
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

function toIso(ms: number): string {
  return new Date(ms).toISOString()
}

export interface SupabaseCandleStoreOptions {
  logger: Logger
  /** Table name (default: candles_15m) */
  table?: string
  /** Rows per read page (default: 1000) */
  pageSize?: number
  /** Rows per upsert call (default: 500) */
  writeChunkSize?: number
}

/**
 * @example
 * const store = new SupabaseCandleStore(createClient(url, serviceKey), { logger })
 * const candles = await store.read('BTCUSDT', { start, end })
 */
export class SupabaseCandleStore implements CandleStore {
  private logger: Logger
  private table: string
  private pageSize: number
  private writeChunkSize: number

  constructor(
    private supabase: SupabaseClient,
    options: SupabaseCandleStoreOptions
  ) {
    this.logger = options.logger
    this.table = options.table ?? DEFAULT_CANDLE_TABLE
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE
    this.writeChunkSize = options.writeChunkSize ?? DEFAULT_WRITE_CHUNK
  }

  async read(ticker: string, range: TimeRange): Promise<Candle[]> {
    const candles: Candle[] = []
    let cursor = range.start

    for (;;) {
      const { data, error } = await this.supabase
        .from(this.table)
        .select(COLUMNS)
        .eq('ticker', ticker)
        .gte('timestamp', toIso(cursor))
        .lt('timestamp', toIso(range.end))
        .order('timestamp', { ascending: true })
        .limit(this.pageSize)

      if (error) {
        throw new CacheUnavailableError(`Supabase candle read failed: ${error.message}`, {
          store: 'supabase',
          operation: 'read',
          ticker,
        })
      }

      const parsed = z.array(supabaseCandleRowSchema).safeParse(data ?? [])
      if (!parsed.success) {
        throw new CacheUnavailableError(`Supabase returned malformed candle rows: ${parsed.error.message}`, {
          store: 'supabase',
          operation: 'read',
          ticker,
        })
      }

      const page = parsed.data.map(toCandle)
      candles.push(...page)

      const last = page[page.length - 1]
      if (page.length < this.pageSize || last === undefined) break
      cursor = last.timestamp + 1
    }

    this.logger.debug('Supabase candles read', { ticker, count: candles.length })
    return candles
  }

  /**
   * @returns Rows inserted, as counted by PostgREST
   */
  async write(candles: readonly Candle[]): Promise<number> {
    let inserted = 0

    for (let offset = 0; offset < candles.length; offset += this.writeChunkSize) {
      const rows = candles.slice(offset, offset + this.writeChunkSize).map((candle) => ({
        ticker: candle.ticker,
        timestamp: toIso(candle.timestamp),
        open: candle.open,
        high: candle.high,
        low: candle.low,
        close: candle.close,
        volume: candle.volume,
        turnover: candle.turnover ?? null,
      }))

      const { error, count } = await this.supabase.from(this.table).upsert(rows, {
        onConflict: 'ticker,timestamp',
        ignoreDuplicates: true,
        count: 'exact',
      })

      if (error) {
        throw new CacheUnavailableError(`Supabase candle upsert failed: ${error.message}`, {
          store: 'supabase',
          operation: 'write',
          count: rows.length,
        })
      }
      inserted += count ?? rows.length
    }

    return inserted
  }

  async latestTimestamp(ticker: string): Promise<number | null> {
    const { data, error } = await this.supabase
      .from(this.table)
      .select('timestamp')
      .eq('ticker', ticker)
      .order('timestamp', { ascending: false })
      .limit(1)

    if (error) {
      throw new CacheUnavailableError(`Supabase latest candle lookup failed: ${error.message}`, {
        store: 'supabase',
        operation: 'latest',
        ticker,
      })
    }

    const parsed = z.array(z.object({ timestamp: z.string() })).safeParse(data ?? [])
    const latest = parsed.success ? parsed.data[0] : undefined
    if (latest === undefined) return null
    const ms = Date.parse(latest.timestamp)
    return Number.isNaN(ms) ? null : ms
  }
}
