export { byPriority, isDue, popularPairConfigSchema } from './types.js';
export type { PopularPair, PopularPairConfig, PopularPairSource } from './types.js';
export { DEFAULT_POPULAR_PAIRS_FILE, StaticPairSource, loadPopularPairs } from './static-pair-source.js';
export { SupabasePairSource } from './supabase-pair-source.js';
