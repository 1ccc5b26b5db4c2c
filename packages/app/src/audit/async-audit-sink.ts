/**
 * Base class for audit sinks that write somewhere slow.
 *
 * `record` starts the write and returns at once; a failed write is logged
 * and dropped. `flush` waits for every write still pending.
 */

import { errorMessage } from '@pivot-suite/contracts';
import type { AuditEntry, AuditSink } from '@pivot-suite/contracts';
import type { Logger } from '@pivot-suite/logger';

export abstract class AsyncAuditSink implements AuditSink {
  private pending = new Set<Promise<void>>();

  constructor(protected logger: Logger) {}

  record(entry: AuditEntry): void {
    const write: Promise<void> = this.write(entry)
      .catch((error: unknown) => {
        this.logger.warn('Audit entry not recorded', {
          ticker: entry.ticker,
          operation: entry.operation,
          error: errorMessage(error),
        });
      })
      .finally(() => {
        this.pending.delete(write);
      });
    this.pending.add(write);
  }

  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  protected abstract write(entry: AuditEntry): Promise<void>;
}

/**
 * `update_type` values of the audit table.
 */
export const UPDATE_TYPES: Record<AuditEntry['operation'], string> = {
  resolve: 'candles',
  refresh: 'refresh',
  compute: 'pivot_cache',
};
