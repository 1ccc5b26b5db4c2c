/**
 * Popular pairs from a JSON file, with refresh times kept in memory.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { errorMessage } from '@pivot-suite/contracts';
import { byPriority, popularPairConfigSchema } from './types.js';
import type { PopularPair, PopularPairConfig, PopularPairSource } from './types.js';

export const DEFAULT_POPULAR_PAIRS_FILE = fileURLToPath(new URL('../../config/popular-pairs.json', import.meta.url));

/**
 * Reads and validates a popular-pairs file.
 *
 * @throws Error naming the file when it is missing or invalid
 */
export function loadPopularPairs(file: string = DEFAULT_POPULAR_PAIRS_FILE): PopularPairConfig[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (error) {
    throw new Error(`Cannot read popular pairs from ${file}: ${errorMessage(error)}`);
  }

  const result = z.array(popularPairConfigSchema).safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid popular pairs in ${file}: ${result.error.errors.map((e) => e.message).join('; ')}`);
  }
  return result.data;
}

export class StaticPairSource implements PopularPairSource {
  private lastFetched = new Map<string, number>();

  constructor(private pairs: readonly PopularPairConfig[]) {}

  async list(): Promise<PopularPair[]> {
    return this.pairs
      .map((pair) => ({ ...pair, lastFetched: this.lastFetched.get(pair.ticker) ?? null }))
      .sort(byPriority);
  }

  async markFetched(ticker: string, at: number): Promise<void> {
    this.lastFetched.set(ticker, at);
  }
}
