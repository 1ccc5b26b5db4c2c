/**
 * @pivot-suite/pivot-engine
 *
 * Pure pivot analysis over candle series: bucketing, P1/P2 detection,
 * statistics, formation distribution and live insight.
 */

export { DEFAULT_SESSIONS, sessionForHour, sessionTableSchema, validateSessions } from './sessions.js';
export type { SessionDefinition } from './sessions.js';

export { bucketCandles, bucketEndOf, bucketStartOf } from './bucketing.js';
export type { Bucket, BucketOptions, BucketSeries } from './bucketing.js';

export {
  DEFAULT_PROXIMITY_PCT,
  MIN_BUCKET_CANDLES,
  classifyOutcome,
  detectPivots,
  findExtremes,
  priceBias,
  toDegenerateError,
} from './detector.js';
export type { BucketExtremes, DetectOptions, Extreme } from './detector.js';

export { accumulate, aggregate, emptyAccumulator, finalizeStats, mergeAccumulators } from './aggregator.js';
export type { OutcomeCounts, StatsAccumulator } from './aggregator.js';

export { buildDistribution, roundTo1, slotLabel, slotOf, slotsFor } from './distribution.js';
export { assessLiveBucket, classifyFlipRisk, classifyP2Formation } from './insights.js';

export { analysisWindow, computeAnalysis, isScoredRow } from './pipeline.js';
export type { ComputeAnalysisInput } from './pipeline.js';
