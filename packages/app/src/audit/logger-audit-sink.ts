/**
 * Audit sink that only logs. Used when no database is configured.
 */

import type { AuditEntry, AuditSink } from '@pivot-suite/contracts';
import type { Logger } from '@pivot-suite/logger';

export class LoggerAuditSink implements AuditSink {
  constructor(private logger: Logger) {}

  record(entry: AuditEntry): void {
    const meta = {
      ticker: entry.ticker,
      operation: entry.operation,
      count: entry.rowsAffected,
      duration_ms: entry.durationMs,
    };
    if (entry.success) {
      this.logger.info('Audit', meta);
    } else {
      this.logger.warn('Audit', { ...meta, error: entry.errorMessage });
    }
  }

  async flush(): Promise<void> {}
}
