/**
 * @fileoverview Boundary validation for analysis requests.
 *
 * Requests are validated once here; everything downstream works with the
 * typed, normalised `AnalysisRequest`.
 */

import { z } from 'zod';
import { InvalidRequestError } from './errors.js';
import { isWeekday, normalizeWeekdays, parsePivotTimeframe } from './timeframes.js';

export const MAX_DATE_RANGE_DAYS = 3650;

export const analysisRequestSchema = z.object({
  ticker: z
    .string()
    .trim()
    .min(1, 'ticker is required')
    .max(32)
    .regex(/^[A-Za-z0-9]+$/, 'ticker must be alphanumeric')
    .transform((ticker) => ticker.toUpperCase()),
  timeframe: z
    .string()
    .transform((value, ctx) => {
      const timeframe = parsePivotTimeframe(value);
      if (timeframe === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown timeframe "${value}"` });
        return z.NEVER;
      }
      return timeframe;
    })
    .default('daily'),
  dateRangeDays: z.number().int().positive().max(MAX_DATE_RANGE_DAYS).default(30),
  weekdays: z
    .array(z.number().int().min(0).max(6))
    .default([])
    .transform((weekdays) => normalizeWeekdays(weekdays.filter(isWeekday))),
});

export type AnalysisRequestInput = z.input<typeof analysisRequestSchema>;

export type AnalysisRequest = z.output<typeof analysisRequestSchema>;

/**
 * Validates untrusted input into an `AnalysisRequest`.
 *
 * @throws InvalidRequestError listing every failed field
 *
 * @example
 * ```typescript
 * parseAnalysisRequest({ ticker: 'btcusdt', timeframe: '1d', weekdays: [4, 0] });
 * // { ticker: 'BTCUSDT', timeframe: 'daily', dateRangeDays: 30, weekdays: [0, 4] }
 * ```
 */
export function parseAnalysisRequest(input: unknown): AnalysisRequest {
  const result = analysisRequestSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.errors.map(
      (issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`
    );
    throw new InvalidRequestError(`Invalid analysis request: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}
