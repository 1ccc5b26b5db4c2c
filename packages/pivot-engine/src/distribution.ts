/**
 * Formation distribution: in which slot of its bucket P1 and P2 tend to form.
 *
 * Slot granularity depends on the timeframe:
 * - hourly: 15-minute quarter of the hour (0-3)
 * - 4h: hour offset within the block (0-3)
 * - session, daily: UTC hour of day (0-23)
 * - weekly: weekday, Monday = 0 (0-6)
 * - monthly: day of month (1-31)
 */

import { WEEKDAY_NAMES, isWeekday, weekdayOf } from '@pivot-suite/contracts';
import type { DistributionRow, PivotTimeframe, ScoredPivotRow } from '@pivot-suite/contracts';

const QUARTER_MS = 15 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/**
 * Slot of `timestamp` inside the bucket starting at `bucketStart`.
 */
export function slotOf(timestamp: number, timeframe: PivotTimeframe, bucketStart: number): number {
  switch (timeframe) {
    case 'hourly':
      return Math.floor((timestamp - bucketStart) / QUARTER_MS);
    case '4h':
      return Math.floor((timestamp - bucketStart) / HOUR_MS);
    case 'session':
    case 'daily':
      return new Date(timestamp).getUTCHours();
    case 'weekly':
      return weekdayOf(timestamp);
    case 'monthly':
      return new Date(timestamp).getUTCDate();
  }
}

/**
 * Every slot of a timeframe, in chronological order within a bucket.
 */
export function slotsFor(timeframe: PivotTimeframe): number[] {
  const range = (from: number, count: number): number[] => Array.from({ length: count }, (_, i) => from + i);
  switch (timeframe) {
    case 'hourly':
    case '4h':
      return range(0, 4);
    case 'session':
    case 'daily':
      return range(0, 24);
    case 'weekly':
      return range(0, 7);
    case 'monthly':
      return range(1, 31);
  }
}

export function slotLabel(slot: number, timeframe: PivotTimeframe): string {
  switch (timeframe) {
    case 'hourly':
      return `:${String(slot * 15).padStart(2, '0')}`;
    case '4h':
      return `+${slot}h`;
    case 'session':
    case 'daily':
      return `${String(slot).padStart(2, '0')}:00 UTC`;
    case 'weekly':
      return isWeekday(slot) ? WEEKDAY_NAMES[slot] : String(slot);
    case 'monthly':
      return `Day ${slot}`;
  }
}

export function roundTo1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Counts P1 and P2 formations per slot over scored rows.
 *
 * Percentages are shares of all scored rows, rounded to one decimal.
 * `lastP1Ago` / `lastP2Ago` are calendar days (UTC) from the most recent
 * formation in the slot to `asOf`; 0 means it formed on the day of `asOf`.
 *
 * @param rows - Scored rows in bucket order
 */
export function buildDistribution(
  rows: readonly ScoredPivotRow[],
  timeframe: PivotTimeframe,
  asOf: number
): DistributionRow[] {
  const total = rows.length;
  const p1Counts = new Map<number, number>();
  const p2Counts = new Map<number, number>();
  const lastP1 = new Map<number, number>();
  const lastP2 = new Map<number, number>();

  const note = (latest: Map<number, number>, slot: number, formedAt: number): void => {
    latest.set(slot, Math.max(latest.get(slot) ?? formedAt, formedAt));
  };

  for (const row of rows) {
    const p1Slot = slotOf(row.p1.formedAt, timeframe, row.bucketStart);
    const p2Slot = slotOf(row.p2.formedAt, timeframe, row.bucketStart);
    p1Counts.set(p1Slot, (p1Counts.get(p1Slot) ?? 0) + 1);
    p2Counts.set(p2Slot, (p2Counts.get(p2Slot) ?? 0) + 1);
    note(lastP1, p1Slot, row.p1.formedAt);
    note(lastP2, p2Slot, row.p2.formedAt);
  }

  const today = Math.floor(asOf / DAY_MS);
  const pct = (count: number): number => (total === 0 ? 0 : roundTo1((count / total) * 100));
  const ago = (formedAt: number | undefined): number | null =>
    formedAt === undefined ? null : today - Math.floor(formedAt / DAY_MS);

  return slotsFor(timeframe).map((slot) => {
    const p1Count = p1Counts.get(slot) ?? 0;
    const p2Count = p2Counts.get(slot) ?? 0;
    return {
      slot,
      label: slotLabel(slot, timeframe),
      p1Count,
      p2Count,
      p1Pct: pct(p1Count),
      p2Pct: pct(p2Count),
      lastP1Ago: ago(lastP1.get(slot)),
      lastP2Ago: ago(lastP2.get(slot)),
    };
  });
}
