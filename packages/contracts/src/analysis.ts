/**
 * @fileoverview Pivot analysis types: per-bucket pivot points, aggregate
 * statistics and the cached analysis artifact.
 *
 * @module @pivot-suite/contracts/analysis
 */

import type { TimeRange } from './market.js';
import type { PivotTimeframe, Weekday } from './timeframes.js';

/** P1 formed first within its bucket, P2 is the opposite extreme formed later. */
export type PivotRole = 'P1' | 'P2';

/** Which bucket extreme the pivot sits on. */
export type PivotKind = 'high' | 'low';

/**
 * Behaviour of a pivot level during the following bucket.
 * - held: approached within the proximity threshold without closing beyond it
 * - flipped: the following bucket closed beyond the level
 * - untested: never came within the proximity threshold, or no following bucket
 */
export type PivotOutcome = 'held' | 'flipped' | 'untested';

export interface PivotPoint {
  role: PivotRole;
  kind: PivotKind;
  level: number;
  /** Open time of the candle that set the level */
  formedAt: number;
  outcome: PivotOutcome;
}

/** Where a bucket closed relative to the P1/P2 midpoint. */
export type PriceBias = 'above' | 'below' | 'neutral';

interface PivotTableRowBase {
  bucketStart: number;
  bucketEnd: number;
  weekday: Weekday;
}

export interface ScoredPivotRow extends PivotTableRowBase {
  status: 'scored';
  open: number;
  high: number;
  low: number;
  close: number;
  p1: PivotPoint;
  p2: PivotPoint;
  bias: PriceBias;
}

export interface DegeneratePivotRow extends PivotTableRowBase {
  status: 'degenerate';
  candleCount: number;
  reason: string;
}

export type PivotTableRow = ScoredPivotRow | DegeneratePivotRow;

/**
 * Outcome counts and their shares of `scored`. Percentages are unrounded so
 * the three of them sum to 100.
 */
export interface OutcomeRates {
  scored: number;
  held: number;
  flipped: number;
  untested: number;
  heldPct: number;
  flippedPct: number;
  untestedPct: number;
}

export interface DirectionalBias {
  above: number;
  below: number;
  neutral: number;
  abovePct: number;
  belowPct: number;
  /** above / (above + below); null when every bucket closed on the midpoint */
  ratio: number | null;
}

export interface ScoredStats {
  status: 'ok';
  buckets: number;
  scored: number;
  degenerate: number;
  p1: OutcomeRates;
  p2: OutcomeRates;
  overall: OutcomeRates;
  bias: DirectionalBias;
  /** How often P1 was the bucket high versus the bucket low */
  p1Kinds: Record<PivotKind, number>;
}

export interface InsufficientStats {
  status: 'insufficient-data';
  buckets: number;
  degenerate: number;
}

export type PivotStats = ScoredStats | InsufficientStats;

/**
 * One row of the formation distribution: how often P1 and P2 formed in a
 * given slot (hour of day, weekday, ... depending on the timeframe).
 */
export interface DistributionRow {
  slot: number;
  label: string;
  p1Count: number;
  p2Count: number;
  p1Pct: number;
  p2Pct: number;
  /** UTC calendar days since P1 last formed in this slot; null if it never did */
  lastP1Ago: number | null;
  /** UTC calendar days since P2 last formed in this slot; null if it never did */
  lastP2Ago: number | null;
}

export type FlipRisk = 'low' | 'moderate' | 'high';

export type FormationLikelihood = 'likely' | 'moderate' | 'unlikely';

export interface ProvisionalPivot {
  kind: PivotKind;
  level: number;
  formedAt: number;
  slot: number;
}

/**
 * Read-out for the in-progress trailing bucket against the historical
 * distribution.
 */
export interface LiveBucketInsight {
  bucketStart: number;
  p1: ProvisionalPivot;
  p2: ProvisionalPivot;
  currentSlot: number;
  p1AfterP1Pct: number;
  p1FlipRiskPct: number;
  p1FlipRisk: FlipRisk;
  p2AfterNowPct: number;
  p2Formation: FormationLikelihood;
}

/**
 * Identity of a cached analysis. `weekdays` is always normalised.
 */
export interface AnalysisKey {
  ticker: string;
  timeframe: PivotTimeframe;
  dateRangeDays: number;
  weekdays: Weekday[];
}

export interface AnalysisResult extends AnalysisKey {
  range: TimeRange;
  candleCount: number;
  pivotTable: PivotTableRow[];
  distribution: DistributionRow[];
  stats: PivotStats;
  live: LiveBucketInsight | null;
  /** True when candle coverage was partial because a fetch failed */
  degraded: boolean;
  warnings: string[];
  /** Epoch milliseconds the analysis was computed */
  lastUpdated: number;
}

/**
 * Persistent analysis storage, unique on the normalised key.
 */
export interface AnalysisStore {
  read(key: AnalysisKey): Promise<AnalysisResult | null>;
  upsert(result: AnalysisResult): Promise<void>;
}
