/**
 * @fileoverview Tests for timeframe, weekday and interval helpers.
 */

import { describe, it, expect } from 'vitest';
import {
  getTimeframeLabel,
  isPivotTimeframe,
  normalizeWeekdays,
  parsePivotTimeframe,
  weekdayOf,
} from '../src/timeframes.js';
import { alignToInterval, intervalToMillis, isCandleInterval } from '../src/market.js';

describe('parsePivotTimeframe', () => {
  it('should accept canonical names and aliases', () => {
    expect(parsePivotTimeframe('daily')).toBe('daily');
    expect(parsePivotTimeframe('1D')).toBe('daily');
    expect(parsePivotTimeframe(' H4 ')).toBe('4h');
    expect(parsePivotTimeframe('1h')).toBe('hourly');
    expect(parsePivotTimeframe('Sessions')).toBe('session');
    expect(parsePivotTimeframe('1mo')).toBe('monthly');
  });

  it('should reject unknown values', () => {
    expect(parsePivotTimeframe('minute')).toBeNull();
    expect(isPivotTimeframe('1d')).toBe(false);
    expect(isPivotTimeframe('weekly')).toBe(true);
  });

  it('should label timeframes', () => {
    expect(getTimeframeLabel('4h')).toBe('4 Hours');
  });
});

describe('weekdays', () => {
  it('should number Monday as 0 and Sunday as 6', () => {
    expect(weekdayOf(Date.UTC(2024, 0, 1, 12))).toBe(0);
    expect(weekdayOf(Date.UTC(2024, 0, 7, 23, 45))).toBe(6);
  });

  it('should sort and deduplicate', () => {
    expect(normalizeWeekdays([4, 0, 4, 2])).toEqual([0, 2, 4]);
  });

  it('should expand an empty set to every day', () => {
    expect(normalizeWeekdays([])).toEqual([0, 1, 2, 3, 4, 5, 6]);
  });
});

describe('candle intervals', () => {
  it('should convert intervals to milliseconds', () => {
    expect(intervalToMillis('15m')).toBe(900_000);
    expect(intervalToMillis('4h')).toBe(14_400_000);
  });

  it('should align timestamps down to the interval', () => {
    expect(alignToInterval(Date.UTC(2024, 0, 1, 10, 29, 59), '15m')).toBe(Date.UTC(2024, 0, 1, 10, 15));
    expect(alignToInterval(Date.UTC(2024, 0, 1, 10, 29), '4h')).toBe(Date.UTC(2024, 0, 1, 8));
  });

  it('should validate interval names', () => {
    expect(isCandleInterval('15m')).toBe(true);
    expect(isCandleInterval('5m')).toBe(false);
  });
});
