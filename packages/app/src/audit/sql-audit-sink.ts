/**
 * Audit sink writing an `update_logs` table through db-simple.
 */

import type { AuditEntry } from '@pivot-suite/contracts';
import type { DbConnection } from '@pivot-suite/db-simple';
import type { Logger } from '@pivot-suite/logger';
import { AsyncAuditSink, UPDATE_TYPES } from './async-audit-sink.js';

export class SqlAuditSink extends AsyncAuditSink {
  constructor(
    private db: DbConnection,
    logger: Logger,
    private now: () => number = Date.now
  ) {
    super(logger);
  }

  async init(): Promise<void> {
    await this.db.exec(`
      CREATE TABLE IF NOT EXISTS update_logs (
        ticker TEXT NOT NULL,
        update_type TEXT NOT NULL,
        rows_affected INTEGER,
        success BOOLEAN NOT NULL,
        error_message TEXT,
        execution_time_ms INTEGER,
        created_at BIGINT NOT NULL
      )
    `);
  }

  protected async write(entry: AuditEntry): Promise<void> {
    await this.db.exec(
      `INSERT INTO update_logs (ticker, update_type, rows_affected, success, error_message, execution_time_ms, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        entry.ticker,
        UPDATE_TYPES[entry.operation],
        entry.rowsAffected,
        this.db.dbType === 'sqlite' ? Number(entry.success) : entry.success,
        entry.errorMessage ?? null,
        Math.round(entry.durationMs),
        this.now(),
      ]
    );
  }
}
