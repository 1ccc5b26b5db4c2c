/**
 * Audit sink writing to the Supabase `update_logs` table.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { AuditEntry } from '@pivot-suite/contracts';
import type { Logger } from '@pivot-suite/logger';
import { AsyncAuditSink, UPDATE_TYPES } from './async-audit-sink.js';

export class SupabaseAuditSink extends AsyncAuditSink {
  constructor(
    private supabase: SupabaseClient,
    logger: Logger,
    private table = 'update_logs'
  ) {
    super(logger);
  }

  protected async write(entry: AuditEntry): Promise<void> {
    const { error } = await this.supabase.from(this.table).insert([
      {
        ticker: entry.ticker,
        update_type: UPDATE_TYPES[entry.operation],
        rows_affected: entry.rowsAffected,
        success: entry.success,
        error_message: entry.errorMessage ?? null,
        execution_time_ms: Math.round(entry.durationMs),
      },
    ]);

    if (error) {
      throw new Error(`Supabase audit insert failed: ${error.message}`);
    }
  }
}
