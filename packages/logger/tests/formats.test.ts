/**
 * @fileoverview Tests for secret redaction helpers.
 */

import { describe, it, expect } from 'vitest';
import { isSensitiveFieldName, redactValue } from '../src/formats.js';

describe('isSensitiveFieldName', () => {
  it('should match secret-like names case-insensitively', () => {
    expect(isSensitiveFieldName('password')).toBe(true);
    expect(isSensitiveFieldName('SUPABASE_SERVICE_KEY')).toBe(true);
    expect(isSensitiveFieldName('apiKey')).toBe(true);
    expect(isSensitiveFieldName('Authorization')).toBe(true);
    expect(isSensitiveFieldName('ticker')).toBe(false);
    expect(isSensitiveFieldName('author')).toBe(false);
  });
});

describe('redactValue', () => {
  it('should copy rather than mutate', () => {
    const input = { url: 'https://example.test', nested: { apiKey: 'test-secret' } };
    const output = redactValue(input);

    expect(output).toEqual({ url: 'https://example.test', nested: { apiKey: '[REDACTED]' } });
    expect(input.nested.apiKey).toBe('test-secret');
  });

  it('should walk arrays and leave primitives and errors alone', () => {
    const error = new Error('boom');
    expect(redactValue([{ token: 'x' }, 3])).toEqual([{ token: '[REDACTED]' }, 3]);
    expect(redactValue('plain')).toBe('plain');
    expect(redactValue(error)).toBe(error);
  });
});
