/**
 * @pivot-suite/db-simple
 *
 * Minimal database connection for SQLite and PostgreSQL
 */

export {
  connect,
  isRetryableError,
  parseConnectionString,
  toPositionalParams,
  type ConnectOptions,
  type DbConnection,
  type DbRow,
  type Logger,
} from './connect.js'
