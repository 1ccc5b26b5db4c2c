/**
 * Statistics aggregator.
 *
 * A pure reduction over pivot table rows. Accumulators hold only counts, so
 * partial accumulators over disjoint row sets merge by addition and the
 * percentages are computed once, in `finalizeStats`.
 */

import type {
  DirectionalBias,
  OutcomeRates,
  PivotKind,
  PivotOutcome,
  PivotPoint,
  PivotStats,
  PivotTableRow,
} from '@pivot-suite/contracts';

export type OutcomeCounts = Record<PivotOutcome, number>;

export interface StatsAccumulator {
  buckets: number;
  degenerate: number;
  p1: OutcomeCounts;
  p2: OutcomeCounts;
  above: number;
  below: number;
  neutral: number;
  p1Kinds: Record<PivotKind, number>;
}

export function emptyAccumulator(): StatsAccumulator {
  return {
    buckets: 0,
    degenerate: 0,
    p1: { held: 0, flipped: 0, untested: 0 },
    p2: { held: 0, flipped: 0, untested: 0 },
    above: 0,
    below: 0,
    neutral: 0,
    p1Kinds: { high: 0, low: 0 },
  };
}

function addOutcome(counts: OutcomeCounts, pivot: PivotPoint): OutcomeCounts {
  return { ...counts, [pivot.outcome]: counts[pivot.outcome] + 1 };
}

/**
 * Folds one row into an accumulator without mutating it.
 */
export function accumulate(acc: StatsAccumulator, row: PivotTableRow): StatsAccumulator {
  if (row.status === 'degenerate') {
    return { ...acc, buckets: acc.buckets + 1, degenerate: acc.degenerate + 1 };
  }
  return {
    ...acc,
    buckets: acc.buckets + 1,
    p1: addOutcome(acc.p1, row.p1),
    p2: addOutcome(acc.p2, row.p2),
    above: acc.above + (row.bias === 'above' ? 1 : 0),
    below: acc.below + (row.bias === 'below' ? 1 : 0),
    neutral: acc.neutral + (row.bias === 'neutral' ? 1 : 0),
    p1Kinds: { ...acc.p1Kinds, [row.p1.kind]: acc.p1Kinds[row.p1.kind] + 1 },
  };
}

function addCounts(a: OutcomeCounts, b: OutcomeCounts): OutcomeCounts {
  return {
    held: a.held + b.held,
    flipped: a.flipped + b.flipped,
    untested: a.untested + b.untested,
  };
}

/**
 * Combines accumulators of disjoint row sets. Associative and commutative,
 * with `emptyAccumulator()` as identity.
 */
export function mergeAccumulators(a: StatsAccumulator, b: StatsAccumulator): StatsAccumulator {
  return {
    buckets: a.buckets + b.buckets,
    degenerate: a.degenerate + b.degenerate,
    p1: addCounts(a.p1, b.p1),
    p2: addCounts(a.p2, b.p2),
    above: a.above + b.above,
    below: a.below + b.below,
    neutral: a.neutral + b.neutral,
    p1Kinds: { high: a.p1Kinds.high + b.p1Kinds.high, low: a.p1Kinds.low + b.p1Kinds.low },
  };
}

function toRates(counts: OutcomeCounts): OutcomeRates {
  const scored = counts.held + counts.flipped + counts.untested;
  const pct = (n: number): number => (scored === 0 ? 0 : (n / scored) * 100);
  return {
    scored,
    ...counts,
    heldPct: pct(counts.held),
    flippedPct: pct(counts.flipped),
    untestedPct: pct(counts.untested),
  };
}

/**
 * Turns counts into the published statistics.
 *
 * With no scored bucket the result is `insufficient-data`; percentages are
 * never computed over an empty denominator.
 */
export function finalizeStats(acc: StatsAccumulator): PivotStats {
  const scored = acc.buckets - acc.degenerate;
  if (scored === 0) {
    return { status: 'insufficient-data', buckets: acc.buckets, degenerate: acc.degenerate };
  }

  const directional = acc.above + acc.below;
  const bias: DirectionalBias = {
    above: acc.above,
    below: acc.below,
    neutral: acc.neutral,
    abovePct: (acc.above / scored) * 100,
    belowPct: (acc.below / scored) * 100,
    ratio: directional === 0 ? null : acc.above / directional,
  };

  return {
    status: 'ok',
    buckets: acc.buckets,
    scored,
    degenerate: acc.degenerate,
    p1: toRates(acc.p1),
    p2: toRates(acc.p2),
    overall: toRates(addCounts(acc.p1, acc.p2)),
    bias,
    p1Kinds: { ...acc.p1Kinds },
  };
}

/**
 * @example
 * ```typescript
 * const stats = aggregate(pivotTable);
 * if (stats.status === 'ok') {
 *   console.log(stats.p1.heldPct, stats.bias.ratio);
 * }
 * ```
 */
export function aggregate(rows: readonly PivotTableRow[]): PivotStats {
  return finalizeStats(rows.reduce(accumulate, emptyAccumulator()));
}
