/**
 * Popular pairs from the Supabase `popular_pairs` table.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { CacheUnavailableError } from '@pivot-suite/contracts';
import type { PopularPair, PopularPairSource } from './types.js';

const popularPairRowSchema = z.object({
  ticker: z.string(),
  priority: z.number().nullable(),
  auto_update: z.boolean().nullable(),
  update_interval_minutes: z.number().nullable(),
  last_fetched: z.string().nullable(),
});

export class SupabasePairSource implements PopularPairSource {
  constructor(
    private supabase: SupabaseClient,
    private table = 'popular_pairs'
  ) {}

  async list(): Promise<PopularPair[]> {
    const { data, error } = await this.supabase
      .from(this.table)
      .select('ticker,priority,auto_update,update_interval_minutes,last_fetched')
      .order('priority', { ascending: true });

    if (error) {
      throw new CacheUnavailableError(`Failed to load popular pairs: ${error.message}`, {
        store: 'supabase',
        operation: 'list-pairs',
      });
    }

    const rows = z.array(popularPairRowSchema).safeParse(data ?? []);
    if (!rows.success) {
      throw new CacheUnavailableError(`Malformed popular pairs: ${rows.error.message}`, {
        store: 'supabase',
        operation: 'list-pairs',
      });
    }

    return rows.data.map((row) => {
      const lastFetched = row.last_fetched === null ? NaN : Date.parse(row.last_fetched);
      return {
        ticker: row.ticker,
        priority: row.priority ?? 1,
        autoUpdate: row.auto_update ?? true,
        updateIntervalMinutes: row.update_interval_minutes ?? 15,
        lastFetched: Number.isNaN(lastFetched) ? null : lastFetched,
      };
    });
  }

  async markFetched(ticker: string, at: number): Promise<void> {
    const { error } = await this.supabase
      .from(this.table)
      .update({ last_fetched: new Date(at).toISOString() })
      .eq('ticker', ticker);

    if (error) {
      throw new CacheUnavailableError(`Failed to mark ${ticker} fetched: ${error.message}`, {
        store: 'supabase',
        operation: 'mark-fetched',
        ticker,
      });
    }
  }
}
