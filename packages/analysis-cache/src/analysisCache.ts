/**
 * Analysis cache: serve a fresh stored result or compute, store and return
 * a new one.
 *
 * Concurrent misses for one key share a single computation. A caller that
 * aborts stops waiting, but the computation runs on and stores its result
 * for whoever asks next.
 */

import { FetchError, errorMessage } from '@pivot-suite/contracts'
import type { AnalysisKey, AnalysisResult, AnalysisStore } from '@pivot-suite/contracts'
import type { Logger } from '@pivot-suite/logger'
import { DEFAULT_FRESHNESS_POLICIES, isStale, resolvePolicies } from './freshness.js'
import type { FreshnessPolicies } from './freshness.js'
import { normalizeKey, serializeKey } from './key.js'
import { SingleFlight, waitUnlessAborted } from './singleFlight.js'

/**
 * How a result was obtained.
 * - hit: fresh stored result
 * - miss: computed by this call and stored
 * - coalesced: computed by a concurrent call for the same key
 * - bypass: computed by this call but not stored (degraded, or the store
 *   refused the write)
 */
export type CacheStatus = 'hit' | 'miss' | 'coalesced' | 'bypass'

export interface CacheLookup {
  value: AnalysisResult
  status: CacheStatus
}

export interface AnalysisCacheOptions {
  store: AnalysisStore
  logger: Logger
  /** Per-timeframe TTL overrides in milliseconds */
  ttlOverrides?: Partial<FreshnessPolicies>
  now?: () => number
}

export interface GetOrComputeOptions {
  /** Stops this caller waiting; a computation already running carries on */
  signal?: AbortSignal
  /** Skip the stored result and recompute */
  forceRefresh?: boolean
}

interface FlightResult {
  value: AnalysisResult
  stored: boolean
}

function abandoned(key: string): FetchError {
  return new FetchError(`Analysis request for ${key} was cancelled`, { reason: 'cancelled', retryable: false })
}

/**
 * @example
 * const cache = new AnalysisCache({ store: new MemoryAnalysisStore(), logger })
 * const { value, status } = await cache.getOrCompute(key, () => pipeline(key))
 */
export class AnalysisCache {
  private store: AnalysisStore
  private logger: Logger
  private policies: FreshnessPolicies
  private now: () => number
  private flights = new SingleFlight<FlightResult>()

  constructor(options: AnalysisCacheOptions) {
    this.store = options.store
    this.logger = options.logger.child({ component: 'analysis-cache' })
    this.policies = options.ttlOverrides ? resolvePolicies(options.ttlOverrides) : { ...DEFAULT_FRESHNESS_POLICIES }
    this.now = options.now ?? Date.now
  }

  async getOrCompute(
    key: AnalysisKey,
    compute: (key: AnalysisKey) => Promise<AnalysisResult>,
    options: GetOrComputeOptions = {}
  ): Promise<CacheLookup> {
    const normalized = normalizeKey(key)
    const id = serializeKey(normalized)
    const { signal } = options
    if (signal?.aborted) throw abandoned(id)

    const running = this.flights.get(id)
    if (running) {
      this.logger.debug('Joining in-flight analysis', { key: id })
      const { value } = await waitUnlessAborted(running, signal, () => abandoned(id))
      return { value, status: 'coalesced' }
    }

    if (!options.forceRefresh) {
      const stored = await this.readStore(normalized, id)
      if (stored && !isStale(stored, this.now(), this.policies)) {
        this.logger.debug('Analysis cache hit', { key: id })
        return { value: stored, status: 'hit' }
      }
    }

    const flight = this.flights.run(id, () => this.computeAndStore(normalized, id, compute))
    const { value, stored } = await waitUnlessAborted(flight.promise, signal, () => abandoned(id))
    if (flight.shared) return { value, status: 'coalesced' }
    return { value, status: stored ? 'miss' : 'bypass' }
  }

  /**
   * Stored result for a key regardless of freshness.
   */
  async peek(key: AnalysisKey): Promise<AnalysisResult | null> {
    const normalized = normalizeKey(key)
    return this.readStore(normalized, serializeKey(normalized))
  }

  isFresh(result: AnalysisResult): boolean {
    return !isStale(result, this.now(), this.policies)
  }

  inFlight(): number {
    return this.flights.size()
  }

  private async readStore(key: AnalysisKey, id: string): Promise<AnalysisResult | null> {
    try {
      return await this.store.read(key)
    } catch (error) {
      this.logger.warn('Analysis store read failed, computing without it', { key: id, error: errorMessage(error) })
      return null
    }
  }

  private async computeAndStore(
    key: AnalysisKey,
    id: string,
    compute: (key: AnalysisKey) => Promise<AnalysisResult>
  ): Promise<FlightResult> {
    const value = await compute(key)
    if (value.degraded) {
      this.logger.warn('Degraded analysis not cached', { key: id, warnings: value.warnings })
      return { value, stored: false }
    }
    try {
      await this.store.upsert(value)
      this.logger.debug('Analysis cached', { key: id })
      return { value, stored: true }
    } catch (error) {
      this.logger.warn('Analysis store write failed, result not cached', { key: id, error: errorMessage(error) })
      return { value, stored: false }
    }
  }
}
