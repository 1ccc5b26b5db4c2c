/**
 * @fileoverview Write-only operational audit trail.
 */

export type AuditOperation = 'resolve' | 'compute' | 'refresh';

/**
 * One resolve, compute or refresh operation.
 */
export interface AuditEntry {
  ticker: string;
  operation: AuditOperation;
  rowsAffected: number;
  success: boolean;
  errorMessage?: string;
  durationMs: number;
}

/**
 * Fire-and-forget sink. `record` never throws and never blocks the caller.
 */
export interface AuditSink {
  record(entry: AuditEntry): void;
}

/** Sink that discards entries. */
export const noopAuditSink: AuditSink = {
  record: () => {},
};
