/**
 * @fileoverview Winston formats: secret redaction, standard fields with
 * request id injection, and the pretty-print line format.
 */

import { format } from 'winston';
import { getRequestId } from './request-context.js';

/**
 * Field names whose values never reach a transport. Matched case-insensitively.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /service[_-]?key/i,
  /token/i,
  /authorization/i,
  /^auth$/i,
  /private[_-]?key/i,
  /cookie/i,
];

const REDACTED = '[REDACTED]';

const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveFieldName(name: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(name));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Returns a copy of `value` with sensitive keys replaced at any depth.
 * Errors, dates and other class instances are passed through untouched.
 *
 * @example
 * ```typescript
 * redactValue({ url: 'https://x.supabase.co', serviceKey: 'abc' });
 * // { url: 'https://x.supabase.co', serviceKey: '[REDACTED]' }
 * ```
 */
export function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }
  if (!isPlainObject(value)) {
    return value;
  }
  const copy: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    copy[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(nested);
  }
  return copy;
}

/**
 * Redacts metadata fields. Must run before anything serialises the entry.
 */
export const redactPII = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * ISO timestamp, error stacks, and `request_id` from the active request context.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const requestId = getRequestId();
    if (requestId && !info['request_id']) {
      info['request_id'] = requestId;
    }
    return info;
  })()
);

const LEADING_FIELDS = ['component', 'ticker', 'timeframe', 'request_id'] as const;

const SKIPPED_FIELDS = new Set(['level', 'message', 'timestamp', 'stack', 'splat', ...LEADING_FIELDS]);

/**
 * One line per entry:
 * `[2024-03-01T10:00:00.000Z] info: Analysis computed component=pivot-analysis ticker=BTCUSDT count=31`
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const context: string[] = [];
    for (const field of LEADING_FIELDS) {
      const value = info[field];
      if (value !== undefined && value !== null && value !== '') {
        context.push(`${field}=${String(value)}`);
      }
    }
    for (const [key, value] of Object.entries(info)) {
      if (!SKIPPED_FIELDS.has(key)) {
        context.push(`${key}=${JSON.stringify(value)}`);
      }
    }

    const suffix = context.length > 0 ? ` ${context.join(' ')}` : '';
    const line = `[${String(info['timestamp'])}] ${info.level}: ${String(info.message)}${suffix}`;
    const stack = info['stack'];
    return typeof stack === 'string' ? `${line}\n${stack}` : line;
  })
);
