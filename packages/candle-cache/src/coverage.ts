/**
 * Coverage arithmetic over a fixed candle grid.
 *
 * A range `[start, end)` expects one candle for every grid slot `t` with
 * `t >= start` and `t + width <= end`: only closed candles are expected.
 */

import type { Candle, TimeRange } from '@pivot-suite/contracts'

/**
 * First grid slot at or after `range.start`.
 */
export function firstSlot(range: TimeRange, widthMs: number): number {
  return Math.ceil(range.start / widthMs) * widthMs
}

/**
 * Number of candles a fully covered range holds.
 */
export function expectedSlotCount(range: TimeRange, widthMs: number): number {
  const first = firstSlot(range, widthMs)
  if (first + widthMs > range.end) return 0
  return Math.floor((range.end - first) / widthMs)
}

/**
 * Contiguous runs of expected slots absent from `present`, each as the
 * range from the first missing slot's open to the last missing slot's close.
 *
 * @example
 * // 15m grid, slots 00:00..00:45 expected, 00:15 and 00:30 stored
 * findMissingRanges(new Set([t15, t30]), { start: t0, end: t60 }, 900_000)
 * // [{ start: t0, end: t15 }, { start: t45, end: t60 }]
 */
export function findMissingRanges(
  present: ReadonlySet<number>,
  range: TimeRange,
  widthMs: number
): TimeRange[] {
  const missing: TimeRange[] = []
  let runStart: number | null = null

  for (let slot = firstSlot(range, widthMs); slot + widthMs <= range.end; slot += widthMs) {
    if (present.has(slot)) {
      if (runStart !== null) {
        missing.push({ start: runStart, end: slot })
        runStart = null
      }
    } else if (runStart === null) {
      runStart = slot
    }
  }

  if (runStart !== null) {
    const lastEnd = firstSlot(range, widthMs) + expectedSlotCount(range, widthMs) * widthMs
    missing.push({ start: runStart, end: lastEnd })
  }
  return missing
}

/**
 * Smallest range covering every range given. Null for an empty list.
 */
export function hull(ranges: readonly TimeRange[]): TimeRange | null {
  const first = ranges[0]
  if (!first) return null
  let start = first.start
  let end = first.end
  for (const range of ranges) {
    start = Math.min(start, range.start)
    end = Math.max(end, range.end)
  }
  return { start, end }
}

/**
 * The parts of `range` left after removing the `holes`.
 */
export function subtractRanges(range: TimeRange, holes: readonly TimeRange[]): TimeRange[] {
  const sorted = [...holes].sort((a, b) => a.start - b.start)
  const segments: TimeRange[] = []
  let cursor = range.start

  for (const hole of sorted) {
    if (hole.end <= cursor || hole.start >= range.end) continue
    if (hole.start > cursor) segments.push({ start: cursor, end: hole.start })
    cursor = Math.max(cursor, hole.end)
  }
  if (cursor < range.end) segments.push({ start: cursor, end: range.end })
  return segments
}

/**
 * Picks the longest segment that holds at least one candle; ties go to the
 * most recent segment. Null when no segment holds a candle.
 */
export function pickLongestCoveredSegment(
  segments: readonly TimeRange[],
  candles: readonly Candle[]
): TimeRange | null {
  let best: TimeRange | null = null
  for (const segment of segments) {
    const covered = candles.some(
      (candle) => candle.timestamp >= segment.start && candle.timestamp < segment.end
    )
    if (!covered) continue
    if (best === null || segment.end - segment.start >= best.end - best.start) {
      best = segment
    }
  }
  return best
}

export function formatRange(range: TimeRange): string {
  return `${new Date(range.start).toISOString()}..${new Date(range.end).toISOString()}`
}
