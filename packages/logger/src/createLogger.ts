/**
 * @fileoverview Logger factory for the pivot suite.
 */

import winston, { format } from 'winston';
import type { ChildLoggerContext, LoggerConfig, Logger } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a winston logger. Secrets are redacted before standard fields are
 * added; the console writes JSON or pretty single lines, files always get JSON.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: false });
 * const resolverLog = logger.child({ component: 'candle-resolver' });
 * resolverLog.info('Gap fetched', { ticker: 'BTCUSDT', count: 96 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: json ? format.json() : prettyPrint,
        // diagnostics go to stderr so JSON output on stdout stays parseable
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: format.json(),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    format: format.combine(redactPII(), standardFields),
    transports,
    // global handlers in errorHandler.ts decide when to exit
    exitOnError: false,
    // a logger with every transport disabled must not warn about it
    silent: transports.length === 0,
  });
}

/**
 * Child logger that adds `context` to every entry.
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
