/**
 * @fileoverview Request-scoped context carried through async calls with
 * AsyncLocalStorage, so every log line of one analysis shares a request id.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  request_id: string;
  [key: string]: unknown;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

export function generateRequestId(): string {
  return randomUUID();
}

export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore();
}

export function getRequestId(): string | undefined {
  return requestContextStorage.getStore()?.request_id;
}

/**
 * Runs `fn` inside a new request context.
 *
 * @example
 * ```typescript
 * await withRequestContext(async () => {
 *   logger.info('Analyzing'); // includes request_id
 *   return service.analyze(input);
 * }, undefined, { command: 'analyze' });
 * ```
 */
export async function withRequestContext<T>(
  fn: () => Promise<T> | T,
  requestId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: RequestContext = {
    ...additionalContext,
    request_id: requestId ?? generateRequestId(),
  };
  return requestContextStorage.run(context, fn);
}

/**
 * Adds fields to the active context. Returns false outside of one.
 */
export function setRequestContext(fields: Record<string, unknown>): boolean {
  const context = requestContextStorage.getStore();
  if (!context) {
    return false;
  }
  Object.assign(context, fields);
  return true;
}
