/**
 * @pivot-suite/analysis-cache
 *
 * Freshness-checked, singleflight cache of finished pivot analyses.
 */

export { AnalysisCache } from './analysisCache.js'
export type { AnalysisCacheOptions, CacheLookup, CacheStatus, GetOrComputeOptions } from './analysisCache.js'

export { DEFAULT_FRESHNESS_POLICIES, getTTL, isStale, resolvePolicies } from './freshness.js'
export type { FreshnessPolicies } from './freshness.js'

export { keyOf, normalizeKey, serializeKey } from './key.js'

export { SingleFlight, waitUnlessAborted } from './singleFlight.js'

export { MemoryAnalysisStore } from './memoryAnalysisStore.js'

export { SqlAnalysisStore, DEFAULT_ANALYSIS_TABLE } from './sqlAnalysisStore.js'
export type { SqlAnalysisStoreOptions } from './sqlAnalysisStore.js'

export { SupabaseAnalysisStore } from './supabaseAnalysisStore.js'
export type { SupabaseAnalysisStoreOptions } from './supabaseAnalysisStore.js'

export { analysisResultSchema, analysisDetailsSchema, pivotStatsSchema, pivotTableRowSchema } from './resultSchema.js'
