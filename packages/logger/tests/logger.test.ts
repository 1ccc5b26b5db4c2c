/**
 * @fileoverview Tests for logger creation, file output, redaction and request ids.
 */

import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createLogger, createChildLogger } from '../src/createLogger.js';
import { withRequestContext, getRequestId, setRequestContext, getRequestContext } from '../src/request-context.js';
import type { LoggerConfig } from '../src/types.js';

const testLogFile = path.join(os.tmpdir(), `pivot-suite-logger-${process.pid}.log`);

function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 150));
}

describe('createLogger', () => {
  afterEach(() => {
    if (fs.existsSync(testLogFile)) {
      fs.unlinkSync(testLogFile);
    }
  });

  it('should honour the configured level', () => {
    const levels: LoggerConfig['level'][] = ['error', 'warn', 'info', 'debug'];
    for (const level of levels) {
      expect(createLogger({ level, console: false }).level).toBe(level);
    }
  });

  it('should write JSON lines to the file transport', async () => {
    const logger = createLogger({ level: 'info', console: false, filePath: testLogFile });

    logger.info('Candles resolved', { ticker: 'BTCUSDT', count: 96 });
    await flush();

    const line = fs.readFileSync(testLogFile, 'utf-8').trim();
    const entry = JSON.parse(line);
    expect(entry.message).toBe('Candles resolved');
    expect(entry.ticker).toBe('BTCUSDT');
    expect(entry.count).toBe(96);
    expect(entry.level).toBe('info');
  });

  it('should redact secrets at any depth', async () => {
    const logger = createLogger({ level: 'info', console: false, filePath: testLogFile });

    logger.info('Config loaded', {
      supabase: { url: 'https://example.test', serviceKey: 'test-secret' },
      token: 'test-secret',
    });
    await flush();

    const entry = JSON.parse(fs.readFileSync(testLogFile, 'utf-8').trim());
    expect(entry.supabase).toEqual({ url: 'https://example.test', serviceKey: '[REDACTED]' });
    expect(entry.token).toBe('[REDACTED]');
  });

  it('should include child context and the active request id', async () => {
    const logger = createLogger({ level: 'info', console: false, filePath: testLogFile });
    const child = createChildLogger(logger, { component: 'candle-resolver' });

    await withRequestContext(() => {
      child.info('Inside request');
    }, 'req-123');
    await flush();

    const entry = JSON.parse(fs.readFileSync(testLogFile, 'utf-8').trim());
    expect(entry.component).toBe('candle-resolver');
    expect(entry.request_id).toBe('req-123');
  });

  it('should drop entries below the level', async () => {
    const logger = createLogger({ level: 'warn', console: false, filePath: testLogFile });

    logger.info('hidden');
    logger.warn('shown');
    await flush();

    const lines = fs.readFileSync(testLogFile, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}').message).toBe('shown');
  });
});

describe('request context', () => {
  it('should be absent outside a request', () => {
    expect(getRequestId()).toBeUndefined();
    expect(setRequestContext({ ticker: 'BTCUSDT' })).toBe(false);
  });

  it('should generate an id and accept extra fields', async () => {
    await withRequestContext(async () => {
      expect(getRequestId()).toMatch(/^[0-9a-f-]{36}$/);
      expect(setRequestContext({ ticker: 'ETHUSDT' })).toBe(true);
      expect(getRequestContext()).toMatchObject({ command: 'analyze', ticker: 'ETHUSDT' });
    }, undefined, { command: 'analyze' });
  });
});
