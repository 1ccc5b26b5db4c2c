/**
 * Freshness policies for cached analyses.
 *
 * Finer timeframes change within minutes as the live bucket moves, so their
 * analyses go stale quickly; weekly and monthly ones barely move in a day.
 */

import type { AnalysisResult, PivotTimeframe } from '@pivot-suite/contracts'

const MINUTE_MS = 60 * 1000
const HOUR_MS = 60 * MINUTE_MS

export type FreshnessPolicies = Record<PivotTimeframe, number>

export const DEFAULT_FRESHNESS_POLICIES: Readonly<FreshnessPolicies> = {
  hourly: 5 * MINUTE_MS,
  '4h': 15 * MINUTE_MS,
  session: 30 * MINUTE_MS,
  daily: HOUR_MS,
  weekly: 6 * HOUR_MS,
  monthly: 24 * HOUR_MS,
}

/**
 * Default policies with per-timeframe overrides applied.
 *
 * @example
 * const policies = resolvePolicies({ daily: 10 * 60 * 1000 })
 * getTTL('daily', policies) // 600000
 */
export function resolvePolicies(overrides: Partial<FreshnessPolicies> = {}): FreshnessPolicies {
  const defined = Object.entries(overrides).filter((entry): entry is [string, number] => entry[1] !== undefined)
  return { ...DEFAULT_FRESHNESS_POLICIES, ...Object.fromEntries(defined) }
}

export function getTTL(timeframe: PivotTimeframe, policies: Readonly<FreshnessPolicies> = DEFAULT_FRESHNESS_POLICIES): number {
  return policies[timeframe]
}

/**
 * A result is stale once its age exceeds the TTL of its timeframe.
 */
export function isStale(
  result: Pick<AnalysisResult, 'timeframe' | 'lastUpdated'>,
  now: number,
  policies: Readonly<FreshnessPolicies> = DEFAULT_FRESHNESS_POLICIES
): boolean {
  return now - result.lastUpdated > getTTL(result.timeframe, policies)
}
