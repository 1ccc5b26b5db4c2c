/**
 * Session table for the `session` timeframe.
 *
 * A session is a fixed window of UTC hours. The table must tile the day:
 * sorted by start hour, the first session starts at 0, each one starts where
 * the previous ended and the last ends at 24.
 */

import { z } from 'zod';

export interface SessionDefinition {
  name: string;
  /** Inclusive, 0-23 */
  startHour: number;
  /** Exclusive, 1-24 */
  endHour: number;
}

export const DEFAULT_SESSIONS: readonly SessionDefinition[] = [
  { name: 'Asia', startHour: 0, endHour: 8 },
  { name: 'London', startHour: 8, endHour: 16 },
  { name: 'New York', startHour: 16, endHour: 24 },
];

const sessionSchema = z
  .object({
    name: z.string().min(1),
    startHour: z.number().int().min(0).max(23),
    endHour: z.number().int().min(1).max(24),
  })
  .refine((session) => session.endHour > session.startHour, {
    message: 'endHour must be after startHour',
  });

/**
 * Validates a session table and returns it sorted by start hour.
 */
export const sessionTableSchema = z
  .array(sessionSchema)
  .min(1)
  .transform((sessions) => [...sessions].sort((a, b) => a.startHour - b.startHour))
  .superRefine((sessions, ctx) => {
    let expectedStart = 0;
    for (const session of sessions) {
      if (session.startHour !== expectedStart) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `session "${session.name}" starts at ${session.startHour}:00, expected ${expectedStart}:00`,
        });
        return;
      }
      expectedStart = session.endHour;
    }
    if (expectedStart !== 24) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `sessions end at ${expectedStart}:00 instead of covering the day to 24:00`,
      });
    }
  });

/**
 * @throws Error naming every gap or overlap in the table
 *
 * @example
 * ```typescript
 * validateSessions([{ name: 'Asia', startHour: 0, endHour: 12 }]);
 * // Error: Invalid session table: sessions end at 12:00 instead of covering the day to 24:00
 * ```
 */
export function validateSessions(sessions: readonly SessionDefinition[]): SessionDefinition[] {
  const result = sessionTableSchema.safeParse(sessions);
  if (!result.success) {
    throw new Error(`Invalid session table: ${result.error.issues.map((issue) => issue.message).join('; ')}`);
  }
  return result.data;
}

/**
 * Session containing a UTC hour of day.
 */
export function sessionForHour(hour: number, sessions: readonly SessionDefinition[]): SessionDefinition {
  const session = sessions.find((s) => hour >= s.startHour && hour < s.endHour);
  if (!session) {
    throw new Error(`No session covers hour ${hour}`);
  }
  return session;
}
