/**
 * @fileoverview Public API of @pivot-suite/logger.
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { attachGlobalHandlers, exitAfterFlush } from './errorHandler.js';

export {
  generateRequestId,
  getRequestContext,
  getRequestId,
  withRequestContext,
  setRequestContext,
} from './request-context.js';

export { startTimer, measureAsync } from './perf-timer.js';

export { redactPII, redactValue, isSensitiveFieldName } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, LogEntry, ChildLoggerContext } from './types.js';
export type { RequestContext } from './request-context.js';
export type { PerfTimer } from './perf-timer.js';
