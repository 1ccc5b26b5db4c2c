/**
 * @fileoverview Type definitions for the suite logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity that reaches the transports.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Options for `createLogger`.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env['NODE_ENV'] === 'production',
 *   filePath: './logs/pivot-suite.log',
 * };
 * ```
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * JSON lines when true, a coloured single-line format otherwise.
   * @default true in production
   */
  json?: boolean;

  /** Also write to this file */
  filePath?: string;

  /**
   * Write to stdout/stderr.
   * @default true
   */
  console?: boolean;
}

/**
 * Fields the suite puts on log entries. Anything else is allowed too.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;

  /** Exchange symbol, e.g. "BTCUSDT" */
  ticker?: string;

  /** Analysis timeframe, e.g. "daily" */
  timeframe?: string;

  request_id?: string;

  /** Set by child loggers */
  component?: string;

  operation?: string;

  duration_ms?: number;

  /** Rows written or candles returned */
  count?: number;

  cache?: 'hit' | 'miss' | 'stale' | 'coalesced' | 'bypass';

  [key: string]: unknown;
}

/**
 * Context bound to a child logger.
 */
export interface ChildLoggerContext {
  component?: string;
  ticker?: string;
  timeframe?: string;
  request_id?: string;
  [key: string]: unknown;
}

export type Logger = WinstonLogger;
