/**
 * @fileoverview Tests for analysis request validation.
 */

import { describe, it, expect } from 'vitest';
import { parseAnalysisRequest } from '../src/request.js';
import { InvalidRequestError } from '../src/errors.js';

describe('parseAnalysisRequest', () => {
  it('should normalise ticker, timeframe and weekdays', () => {
    const request = parseAnalysisRequest({
      ticker: ' btcusdt ',
      timeframe: '1d',
      dateRangeDays: 14,
      weekdays: [4, 0, 4],
    });

    expect(request).toEqual({
      ticker: 'BTCUSDT',
      timeframe: 'daily',
      dateRangeDays: 14,
      weekdays: [0, 4],
    });
  });

  it('should apply defaults', () => {
    expect(parseAnalysisRequest({ ticker: 'ETHUSDT' })).toEqual({
      ticker: 'ETHUSDT',
      timeframe: 'daily',
      dateRangeDays: 30,
      weekdays: [0, 1, 2, 3, 4, 5, 6],
    });
  });

  it('should reject invalid fields with every issue listed', () => {
    try {
      parseAnalysisRequest({ ticker: 'BTC/USDT', timeframe: 'minute', dateRangeDays: 0, weekdays: [7] });
      expect.fail('expected InvalidRequestError');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidRequestError);
      if (error instanceof InvalidRequestError) {
        expect(error.data?.['issues']).toHaveLength(4);
        expect(error.message).toContain('timeframe: unknown timeframe "minute"');
      }
    }
  });
});
