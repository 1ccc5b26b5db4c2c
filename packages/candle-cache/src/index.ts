/**
 * @pivot-suite/candle-cache
 *
 * Candle storage tiers and the resolver that fills gaps from the exchange.
 */

export { MemoryCandleCache } from './memoryCandleCache.js'
export type { MemoryCandleCacheOptions } from './memoryCandleCache.js'

export { SqlCandleStore, DEFAULT_CANDLE_TABLE } from './sqlCandleStore.js'
export type { SqlCandleStoreOptions } from './sqlCandleStore.js'

export { SupabaseCandleStore } from './supabaseCandleStore.js'
export type { SupabaseCandleStoreOptions } from './supabaseCandleStore.js'

export { validateCandles, findViolation } from './integrity.js'
export type { IntegrityReport } from './integrity.js'

export {
  expectedSlotCount,
  findMissingRanges,
  firstSlot,
  formatRange,
  hull,
  pickLongestCoveredSegment,
  subtractRanges,
} from './coverage.js'

export { CandleResolver, toFetchError } from './resolver.js'
export type { CandleResolverOptions, ResolveRequest, ResolvedCandles, ResolveSources } from './resolver.js'
