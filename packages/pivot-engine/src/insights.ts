/**
 * Live read-out for the bucket still in progress.
 */

import type {
  DistributionRow,
  FlipRisk,
  FormationLikelihood,
  LiveBucketInsight,
  PivotTimeframe,
} from '@pivot-suite/contracts';
import type { Bucket } from './bucketing.js';
import { findExtremes } from './detector.js';
import type { Extreme } from './detector.js';
import { roundTo1, slotOf } from './distribution.js';

export function classifyFlipRisk(pct: number): FlipRisk {
  if (pct < 20) return 'low';
  if (pct < 50) return 'moderate';
  return 'high';
}

/**
 * How likely the current P2 is to stand, from the share of historical P2s
 * that formed later than now.
 */
export function classifyP2Formation(pct: number): FormationLikelihood {
  if (pct < 20) return 'likely';
  if (pct < 50) return 'moderate';
  return 'unlikely';
}

function shareOf(
  distribution: readonly DistributionRow[],
  pick: (row: DistributionRow) => number,
  include: (slot: number) => boolean
): number {
  const total = distribution.reduce((sum, row) => sum + pick(row), 0);
  if (total === 0) return 0;
  const part = distribution.filter((row) => include(row.slot)).reduce((sum, row) => sum + pick(row), 0);
  return roundTo1((part / total) * 100);
}

/**
 * Compares the provisional pivots of the in-progress bucket with the
 * historical formation distribution.
 *
 * - `p1AfterP1Pct`: share of historical P1s formed in a later slot than the
 *   current P1
 * - `p1FlipRiskPct`: share of historical P1s formed at or after the current
 *   P2 slot, i.e. how often P1 shows up that late
 * - `p2AfterNowPct`: share of historical P2s formed after the slot of `asOf`
 *
 * @returns null when the bucket has fewer than two candles or there is no
 *   scored history to compare against
 */
export function assessLiveBucket(
  distribution: readonly DistributionRow[],
  bucket: Bucket,
  asOf: number,
  timeframe: PivotTimeframe
): LiveBucketInsight | null {
  const hasHistory = distribution.some((row) => row.p1Count > 0);
  const extremes = findExtremes(bucket.candles);
  if (!hasHistory || !extremes) return null;

  const provisional = (extreme: Extreme) => ({
    kind: extreme.kind,
    level: extreme.level,
    formedAt: extreme.formedAt,
    slot: slotOf(extreme.formedAt, timeframe, bucket.start),
  });
  const p1 = provisional(extremes.p1);
  const p2 = provisional(extremes.p2);
  const currentSlot = slotOf(asOf, timeframe, bucket.start);

  const p1AfterP1Pct = shareOf(distribution, (row) => row.p1Count, (slot) => slot > p1.slot);
  const p1FlipRiskPct = shareOf(distribution, (row) => row.p1Count, (slot) => slot >= p2.slot);
  const p2AfterNowPct = shareOf(distribution, (row) => row.p2Count, (slot) => slot > currentSlot);

  return {
    bucketStart: bucket.start,
    p1,
    p2,
    currentSlot,
    p1AfterP1Pct,
    p1FlipRiskPct,
    p1FlipRisk: classifyFlipRisk(p1FlipRiskPct),
    p2AfterNowPct,
    p2Formation: classifyP2Formation(p2AfterNowPct),
  };
}
