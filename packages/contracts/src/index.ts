/**
 * @fileoverview Public API of @pivot-suite/contracts.
 */

export {
  CANDLE_INTERVALS,
  SOURCE_INTERVAL,
  alignToInterval,
  intervalToMillis,
  isCandleInterval,
} from './market.js';
export type {
  Candle,
  CandleInterval,
  CandleStore,
  ExchangeFetcher,
  FetchRequest,
  TimeRange,
} from './market.js';

export {
  ALL_WEEKDAYS,
  PIVOT_TIMEFRAMES,
  WEEKDAY_NAMES,
  getTimeframeLabel,
  isPivotTimeframe,
  isWeekday,
  normalizeWeekdays,
  parsePivotTimeframe,
  weekdayOf,
} from './timeframes.js';
export type { PivotTimeframe, Weekday } from './timeframes.js';

export type {
  AnalysisKey,
  AnalysisResult,
  AnalysisStore,
  DegeneratePivotRow,
  DirectionalBias,
  DistributionRow,
  FlipRisk,
  FormationLikelihood,
  InsufficientStats,
  LiveBucketInsight,
  OutcomeRates,
  PivotKind,
  PivotOutcome,
  PivotPoint,
  PivotRole,
  PivotStats,
  PivotTableRow,
  PriceBias,
  ProvisionalPivot,
  ScoredPivotRow,
  ScoredStats,
} from './analysis.js';

export {
  CacheUnavailableError,
  DataIntegrityError,
  DegenerateBucketError,
  FetchError,
  InsufficientDataError,
  InvalidRequestError,
  PivotSuiteError,
  errorMessage,
  isCacheUnavailableError,
  isDataIntegrityError,
  isDegenerateBucketError,
  isFetchError,
  isInsufficientDataError,
  isInvalidRequestError,
  isPivotSuiteError,
} from './errors.js';
export type { FetchFailureReason } from './errors.js';

export { noopAuditSink } from './audit.js';
export type { AuditEntry, AuditOperation, AuditSink } from './audit.js';

export { MAX_DATE_RANGE_DAYS, analysisRequestSchema, parseAnalysisRequest } from './request.js';
export type { AnalysisRequest, AnalysisRequestInput } from './request.js';
