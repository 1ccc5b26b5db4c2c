/**
 * Live bucket insight tests
 */

import { describe, it, expect } from 'vitest';
import type { DistributionRow } from '@pivot-suite/contracts';
import { bucketCandles } from '../src/bucketing.js';
import { slotLabel, slotsFor } from '../src/distribution.js';
import { assessLiveBucket, classifyFlipRisk, classifyP2Formation } from '../src/insights.js';
import { HOUR, T0, at, candle } from './fixtures.js';

function hourlyDistribution(p1: Record<number, number>, p2: Record<number, number>): DistributionRow[] {
  return slotsFor('daily').map((slot) => ({
    slot,
    label: slotLabel(slot, 'daily'),
    p1Count: p1[slot] ?? 0,
    p2Count: p2[slot] ?? 0,
    p1Pct: 0,
    p2Pct: 0,
    lastP1Ago: null,
    lastP2Ago: null,
  }));
}

// Low at 03:00 forms P1, high at 09:00 forms P2
const liveCandles = [
  candle(T0, 100, 101, 99, 100),
  candle(T0 + 3 * HOUR, 100, 100.5, 95, 96),
  candle(T0 + 9 * HOUR, 96, 108, 96, 107),
  candle(T0 + 12 * HOUR, 107, 107.5, 104, 105),
];
const liveBucket = at(
  bucketCandles(liveCandles, 'daily', { range: { start: T0, end: T0 + 12 * HOUR + 15 * 60 * 1000 } }).buckets,
  0
);
const history = hourlyDistribution({ 3: 2, 9: 5, 15: 3 }, { 10: 4, 18: 6 });

describe('classifiers', () => {
  it('should bucket flip risk at 20 and 50 percent', () => {
    expect(classifyFlipRisk(19.9)).toBe('low');
    expect(classifyFlipRisk(20)).toBe('moderate');
    expect(classifyFlipRisk(49.9)).toBe('moderate');
    expect(classifyFlipRisk(50)).toBe('high');
  });

  it('should bucket P2 formation at 20 and 50 percent', () => {
    expect(classifyP2Formation(0)).toBe('likely');
    expect(classifyP2Formation(20)).toBe('moderate');
    expect(classifyP2Formation(60)).toBe('unlikely');
  });
});

describe('assessLiveBucket', () => {
  it('should compare provisional pivots with the history', () => {
    const insight = assessLiveBucket(history, liveBucket, T0 + 12 * HOUR + 5 * 60 * 1000, 'daily');

    expect(insight).toEqual({
      bucketStart: T0,
      p1: { kind: 'low', level: 95, formedAt: T0 + 3 * HOUR, slot: 3 },
      p2: { kind: 'high', level: 108, formedAt: T0 + 9 * HOUR, slot: 9 },
      currentSlot: 12,
      p1AfterP1Pct: 80,
      p1FlipRiskPct: 80,
      p1FlipRisk: 'high',
      p2AfterNowPct: 60,
      p2Formation: 'unlikely',
    });
  });

  it('should call P2 likely once the usual formation hours have passed', () => {
    const insight = assessLiveBucket(history, liveBucket, T0 + 19 * HOUR, 'daily');

    expect(insight?.currentSlot).toBe(19);
    expect(insight?.p2AfterNowPct).toBe(0);
    expect(insight?.p2Formation).toBe('likely');
  });

  it('should return null without scored history', () => {
    expect(assessLiveBucket(hourlyDistribution({}, {}), liveBucket, T0 + 12 * HOUR, 'daily')).toBeNull();
  });

  it('should return null for a bucket with a single candle', () => {
    const thin = at(bucketCandles([candle(T0, 100, 101, 99, 100)], 'daily', { range: { start: T0, end: T0 + HOUR } }).buckets, 0);
    expect(assessLiveBucket(history, thin, T0 + HOUR, 'daily')).toBeNull();
  });
});
