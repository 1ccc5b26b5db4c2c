/**
 * Candle resolver: serves a candle range from the cheapest tier that has it.
 *
 * Tiers are tried in order (memory, store, exchange). Each tier is only asked
 * for what the earlier tiers could not supply; store hits warm the memory
 * tier and exchange fetches are written through to both.
 */

import {
  CacheUnavailableError,
  FetchError,
  SOURCE_INTERVAL,
  errorMessage,
  intervalToMillis,
  isFetchError,
  noopAuditSink,
} from '@pivot-suite/contracts'
import type {
  AuditSink,
  Candle,
  CandleInterval,
  CandleStore,
  ExchangeFetcher,
  TimeRange,
} from '@pivot-suite/contracts'
import type { Logger } from '@pivot-suite/logger'
import { startTimer } from '@pivot-suite/logger'
import {
  findMissingRanges,
  firstSlot,
  formatRange,
  hull,
  pickLongestCoveredSegment,
  subtractRanges,
} from './coverage.js'
import { validateCandles } from './integrity.js'
import type { MemoryCandleCache } from './memoryCandleCache.js'

export interface ResolveRequest {
  ticker: string
  range: TimeRange
  /** Candle grid (default: 15m) */
  interval?: CandleInterval
  /** Aborts pending exchange fetches */
  signal?: AbortSignal
}

/**
 * Where the returned candles came from.
 */
export interface ResolveSources {
  memory: number
  store: number
  exchange: number
}

export interface ResolvedCandles {
  ticker: string
  interval: CandleInterval
  /** Ascending, unique per timestamp, all inside `span` */
  candles: Candle[]
  /**
   * The requested range, starting no earlier than the ticker's first listed
   * candle; only the gap-free covered part of it when degraded
   */
  span: TimeRange
  /** True when part of the range could not be filled */
  degraded: boolean
  warnings: string[]
  /** Gaps the exchange was asked for and answered */
  fetchedRanges: TimeRange[]
  /** Holes left in the range after fetching */
  missingRanges: TimeRange[]
  /** Rows newly written to the store */
  rowsWritten: number
  sources: ResolveSources
}

export interface CandleResolverOptions {
  store: CandleStore
  fetcher: ExchangeFetcher
  logger: Logger
  memory?: MemoryCandleCache
  audit?: AuditSink
}

/**
 * Wraps anything a fetcher throws into a FetchError.
 */
export function toFetchError(error: unknown): FetchError {
  if (isFetchError(error)) return error
  return new FetchError(`Exchange fetch failed: ${errorMessage(error)}`, {
    reason: 'upstream',
    retryable: false,
  })
}

function notListedBefore(ticker: string, listedAt: number): string {
  return `No exchange candles for ${ticker} before ${new Date(listedAt).toISOString()}; range starts at the first listed candle`
}

/**
 * Earliest grid-aligned row the exchange returned inside `gap`, malformed or not.
 */
function earliestSlot(rows: readonly Candle[], gap: TimeRange, widthMs: number): number | null {
  let earliest: number | null = null
  for (const row of rows) {
    const inGap = row.timestamp >= gap.start && row.timestamp < gap.end && row.timestamp % widthMs === 0
    if (inGap && (earliest === null || row.timestamp < earliest)) earliest = row.timestamp
  }
  return earliest
}

/**
 * @example
 * const resolver = new CandleResolver({ store, fetcher, logger, memory })
 * const { candles, degraded } = await resolver.resolve({
 *   ticker: 'BTCUSDT',
 *   range: { start: Date.UTC(2024, 0, 1), end: Date.UTC(2024, 0, 31) },
 * })
 */
export class CandleResolver {
  private store: CandleStore
  private fetcher: ExchangeFetcher
  private logger: Logger
  private memory: MemoryCandleCache | undefined
  private audit: AuditSink
  /** First candle the exchange has for a ticker, learned from leading gaps it answered short */
  private listedFrom = new Map<string, number>()

  constructor(options: CandleResolverOptions) {
    this.store = options.store
    this.fetcher = options.fetcher
    this.logger = options.logger.child({ component: 'candle-resolver' })
    this.memory = options.memory
    this.audit = options.audit ?? noopAuditSink
  }

  /**
   * Returns the candles of `range`, fetching only what no cache tier holds.
   *
   * @throws FetchError when a fetch fails and nothing in the range is covered,
   *   or when the request is cancelled
   */
  async resolve(request: ResolveRequest): Promise<ResolvedCandles> {
    const timer = startTimer()
    const { ticker, signal } = request
    const interval = request.interval ?? SOURCE_INTERVAL
    const widthMs = intervalToMillis(interval)

    const collected = new Map<number, Candle>()
    const sources: ResolveSources = { memory: 0, store: 0, exchange: 0 }
    const warnings: string[] = []

    let range = request.range
    const listedFrom = this.listedFrom.get(ticker)
    if (listedFrom !== undefined && listedFrom > range.start) {
      range = { start: Math.min(listedFrom, range.end), end: range.end }
      warnings.push(notListedBefore(ticker, listedFrom))
    }

    const collect = (candles: readonly Candle[]): number => {
      let added = 0
      for (const candle of candles) {
        const inRange = candle.timestamp >= range.start && candle.timestamp + widthMs <= range.end
        if (inRange && candle.timestamp % widthMs === 0 && !collected.has(candle.timestamp)) {
          collected.set(candle.timestamp, candle)
          added += 1
        }
      }
      return added
    }
    const missingIn = (span: TimeRange): TimeRange[] => findMissingRanges(new Set(collected.keys()), span, widthMs)
    const missing = (): TimeRange[] => missingIn(range)

    if (this.memory) {
      sources.memory = collect(this.memory.read(ticker, range))
    }

    const storeGaps = hull(missing())
    if (storeGaps) {
      try {
        const stored = await this.store.read(ticker, storeGaps)
        sources.store = collect(stored)
        this.memory?.write(stored)
      } catch (error) {
        const message = `Candle store unavailable, falling back to the exchange: ${errorMessage(error)}`
        this.logger.warn(message, { ticker })
        warnings.push(message)
      }
    }

    const fetchedRanges: TimeRange[] = []
    const failures: Array<{ range: TimeRange; error: FetchError }> = []
    const fetched: Candle[] = []
    const leadingSlot = firstSlot(range, widthMs)
    let leadingAnswer: { earliest: number | null } | undefined

    for (const gap of missing()) {
      try {
        const rows = await this.fetcher.fetch({ ticker, interval, range: gap, signal })
        if (gap.start === leadingSlot) {
          leadingAnswer = { earliest: earliestSlot(rows, gap, widthMs) }
        }
        const { valid, rejected } = validateCandles(rows, interval)
        for (const rejection of rejected) {
          this.logger.warn(rejection.message, rejection.data)
        }
        if (rejected.length > 0) {
          warnings.push(`${rejected.length} malformed candle(s) rejected for ${formatRange(gap)}`)
        }
        const inGap = valid.filter((candle) => candle.timestamp >= gap.start && candle.timestamp < gap.end)
        sources.exchange += collect(inGap)
        fetched.push(...inGap)
        fetchedRanges.push(gap)
        this.logger.debug('Gap fetched', { ticker, gap: formatRange(gap), count: inGap.length })
      } catch (error) {
        const fetchError = toFetchError(error)
        if (fetchError.reason === 'cancelled') {
          throw fetchError
        }
        this.logger.error('Gap fetch failed', {
          ticker,
          gap: formatRange(gap),
          reason: fetchError.reason,
          retryable: fetchError.retryable,
          error: fetchError.message,
        })
        failures.push({ range: gap, error: fetchError })
      }
    }

    const rowsWritten = await this.persist(ticker, fetched, warnings)

    let all = [...collected.values()].sort((a, b) => a.timestamp - b.timestamp)
    let span = range
    let holes = missingIn(span)

    const leadingHole = holes[0]
    if (leadingAnswer && leadingHole && leadingHole.start === leadingSlot) {
      const listedAt = leadingAnswer.earliest ?? all[0]?.timestamp
      if (listedAt !== undefined && listedAt > leadingHole.start) {
        this.listedFrom.set(ticker, listedAt)
        span = { start: listedAt, end: range.end }
        holes = missingIn(span)
        warnings.push(notListedBefore(ticker, listedAt))
        this.logger.info('Exchange has no earlier candles', { ticker, listedFrom: new Date(listedAt).toISOString() })
      }
    }

    const firstFailure = failures[0]
    let degraded = false
    let missingRanges: TimeRange[] = []

    if (holes.length > 0) {
      const covered = pickLongestCoveredSegment(subtractRanges(span, holes), all)
      if (covered === null) {
        if (firstFailure) {
          this.recordAudit(ticker, rowsWritten, timer.stop(), firstFailure.error.message)
          throw firstFailure.error
        }
        warnings.push(`Exchange has no candles for ${ticker} in ${formatRange(span)}`)
        span = { start: span.end, end: span.end }
      } else {
        const unanswered = holes.filter(
          (hole) => !failures.some((failure) => hole.start >= failure.range.start && hole.end <= failure.range.end)
        )
        const firstUnanswered = unanswered[0]
        if (firstUnanswered) {
          warnings.push(
            `No usable exchange candles for ${unanswered.length} range(s), first ${formatRange(firstUnanswered)}`
          )
        }
        if (firstFailure) {
          warnings.push(
            `Exchange fetch failed for ${failures.length} gap(s) (${firstFailure.error.message}); ` +
              `returning partial coverage ${formatRange(covered)}`
          )
        } else {
          warnings.push(`Returning partial coverage ${formatRange(covered)}`)
        }
        span = covered
        degraded = true
        missingRanges = holes
        this.logger.warn('Returning degraded candle range', { ticker, span: formatRange(span) })
      }
      all = all.filter((candle) => candle.timestamp >= span.start && candle.timestamp < span.end)
    }

    const result: ResolvedCandles = {
      ticker,
      interval,
      candles: all,
      span,
      degraded,
      warnings,
      fetchedRanges,
      missingRanges,
      rowsWritten,
      sources,
    }

    const durationMs = timer.stop()
    this.recordAudit(ticker, rowsWritten, durationMs, firstFailure?.error.message ?? (degraded ? warnings.at(-1) : undefined))
    this.logger.debug('Candles resolved', {
      ticker,
      count: result.candles.length,
      duration_ms: durationMs,
      ...sources,
    })
    return result
  }

  private async persist(ticker: string, candles: readonly Candle[], warnings: string[]): Promise<number> {
    if (candles.length === 0) return 0
    this.memory?.write(candles)
    try {
      return await this.store.write(candles)
    } catch (error) {
      const failure =
        error instanceof CacheUnavailableError
          ? error
          : new CacheUnavailableError(errorMessage(error), { store: 'candles', operation: 'write' })
      this.logger.warn('Fetched candles not persisted', { ticker, error: failure.message })
      warnings.push(`Fetched candles were not persisted: ${failure.message}`)
      return 0
    }
  }

  private recordAudit(ticker: string, rowsAffected: number, durationMs: number, failure?: string): void {
    this.audit.record({
      ticker,
      operation: 'resolve',
      rowsAffected,
      success: failure === undefined,
      errorMessage: failure,
      durationMs,
    })
  }
}
