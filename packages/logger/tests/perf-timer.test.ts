/**
 * @fileoverview Tests for performance timers.
 */

import { describe, it, expect } from 'vitest';
import { startTimer, measureAsync } from '../src/perf-timer.js';

describe('startTimer', () => {
  it('should stop once and keep the final duration', async () => {
    const timer = startTimer();
    await new Promise((resolve) => setTimeout(resolve, 20));

    const duration = timer.stop();
    expect(timer.isRunning()).toBe(false);
    expect(duration).toBeGreaterThanOrEqual(15);

    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(timer.stop()).toBe(duration);
    expect(timer.elapsed()).toBe(duration);
  });
});

describe('measureAsync', () => {
  it('should return the result with its duration', async () => {
    const { result, duration_ms } = await measureAsync(async () => 42);
    expect(result).toBe(42);
    expect(duration_ms).toBeGreaterThanOrEqual(0);
  });
});
