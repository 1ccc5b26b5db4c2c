/**
 * Zod schema for stored analysis results.
 *
 * Payloads come back from a database as JSON; anything that does not parse
 * into an `AnalysisResult` is treated as a cache miss.
 */

import { z } from 'zod'
import { PIVOT_TIMEFRAMES, isWeekday } from '@pivot-suite/contracts'
import type { AnalysisResult, Weekday } from '@pivot-suite/contracts'

const weekdaySchema = z.custom<Weekday>((value) => typeof value === 'number' && isWeekday(value), {
  message: 'weekday must be an integer 0-6',
})

const rangeSchema = z.object({ start: z.number(), end: z.number() })

const pivotPointSchema = z.object({
  role: z.enum(['P1', 'P2']),
  kind: z.enum(['high', 'low']),
  level: z.number(),
  formedAt: z.number(),
  outcome: z.enum(['held', 'flipped', 'untested']),
})

const rowBase = {
  bucketStart: z.number(),
  bucketEnd: z.number(),
  weekday: weekdaySchema,
}

export const pivotTableRowSchema = z.discriminatedUnion('status', [
  z.object({
    ...rowBase,
    status: z.literal('scored'),
    open: z.number(),
    high: z.number(),
    low: z.number(),
    close: z.number(),
    p1: pivotPointSchema,
    p2: pivotPointSchema,
    bias: z.enum(['above', 'below', 'neutral']),
  }),
  z.object({
    ...rowBase,
    status: z.literal('degenerate'),
    candleCount: z.number(),
    reason: z.string(),
  }),
])

const outcomeRatesSchema = z.object({
  scored: z.number(),
  held: z.number(),
  flipped: z.number(),
  untested: z.number(),
  heldPct: z.number(),
  flippedPct: z.number(),
  untestedPct: z.number(),
})

export const pivotStatsSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('ok'),
    buckets: z.number(),
    scored: z.number(),
    degenerate: z.number(),
    p1: outcomeRatesSchema,
    p2: outcomeRatesSchema,
    overall: outcomeRatesSchema,
    bias: z.object({
      above: z.number(),
      below: z.number(),
      neutral: z.number(),
      abovePct: z.number(),
      belowPct: z.number(),
      ratio: z.number().nullable(),
    }),
    p1Kinds: z.object({ high: z.number(), low: z.number() }),
  }),
  z.object({
    status: z.literal('insufficient-data'),
    buckets: z.number(),
    degenerate: z.number(),
  }),
])

const distributionRowSchema = z.object({
  slot: z.number(),
  label: z.string(),
  p1Count: z.number(),
  p2Count: z.number(),
  p1Pct: z.number(),
  p2Pct: z.number(),
  lastP1Ago: z.number().nullable(),
  lastP2Ago: z.number().nullable(),
})

const provisionalPivotSchema = z.object({
  kind: z.enum(['high', 'low']),
  level: z.number(),
  formedAt: z.number(),
  slot: z.number(),
})

const liveInsightSchema = z.object({
  bucketStart: z.number(),
  p1: provisionalPivotSchema,
  p2: provisionalPivotSchema,
  currentSlot: z.number(),
  p1AfterP1Pct: z.number(),
  p1FlipRiskPct: z.number(),
  p1FlipRisk: z.enum(['low', 'moderate', 'high']),
  p2AfterNowPct: z.number(),
  p2Formation: z.enum(['likely', 'moderate', 'unlikely']),
})

/**
 * The parts of a result that are not columns of their own in the Supabase
 * table.
 */
export const analysisDetailsSchema = z.object({
  range: rangeSchema,
  candleCount: z.number(),
  distribution: z.array(distributionRowSchema),
  live: liveInsightSchema.nullable(),
  degraded: z.boolean(),
  warnings: z.array(z.string()),
})

export const analysisResultSchema: z.ZodType<AnalysisResult, z.ZodTypeDef, unknown> = analysisDetailsSchema.extend({
  ticker: z.string(),
  timeframe: z.enum(PIVOT_TIMEFRAMES),
  dateRangeDays: z.number(),
  weekdays: z.array(weekdaySchema),
  pivotTable: z.array(pivotTableRowSchema),
  stats: pivotStatsSchema,
  lastUpdated: z.number(),
})
