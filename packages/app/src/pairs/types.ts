/**
 * Popular pairs: the tickers kept warm by the background refresh.
 */

import { z } from 'zod';

export interface PopularPair {
  ticker: string;
  /** 1 is refreshed first */
  priority: number;
  autoUpdate: boolean;
  updateIntervalMinutes: number;
  /** Epoch milliseconds of the last successful refresh */
  lastFetched: number | null;
}

export interface PopularPairSource {
  /** Pairs ordered by priority */
  list(): Promise<PopularPair[]>;
  markFetched(ticker: string, at: number): Promise<void>;
}

export const popularPairConfigSchema = z.object({
  ticker: z
    .string()
    .regex(/^[A-Za-z0-9]+$/)
    .transform((ticker) => ticker.toUpperCase()),
  priority: z.number().int().positive().default(1),
  autoUpdate: z.boolean().default(true),
  updateIntervalMinutes: z.number().int().positive().default(15),
});

export type PopularPairConfig = z.output<typeof popularPairConfigSchema>;

export function byPriority(a: PopularPair, b: PopularPair): number {
  return a.priority - b.priority || a.ticker.localeCompare(b.ticker);
}

/**
 * A pair is due once its refresh interval has passed since the last fetch.
 */
export function isDue(pair: PopularPair, now: number): boolean {
  if (!pair.autoUpdate) return false;
  if (pair.lastFetched === null) return true;
  return now - pair.lastFetched >= pair.updateIntervalMinutes * 60_000;
}
