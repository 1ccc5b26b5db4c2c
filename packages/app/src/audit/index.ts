export { AsyncAuditSink, UPDATE_TYPES } from './async-audit-sink.js';
export { SupabaseAuditSink } from './supabase-audit-sink.js';
export { SqlAuditSink } from './sql-audit-sink.js';
export { LoggerAuditSink } from './logger-audit-sink.js';
