/**
 * @fileoverview Timing helpers built on performance.now().
 */

export interface PerfTimer {
  readonly startTime: number;

  /** Milliseconds since start, or the final duration once stopped */
  elapsed(): number;

  /** Freezes and returns the duration; later calls return the same value */
  stop(): number;

  isRunning(): boolean;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * const candles = await resolver.resolve(request);
 * logger.info('Candles resolved', { duration_ms: timer.stop(), count: candles.length });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,
    elapsed(): number {
      return Math.round((endTime ?? performance.now()) - startTime);
    },
    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },
    isRunning(): boolean {
      return endTime === null;
    },
  };
}

/**
 * Awaits `fn` and reports how long it took.
 */
export async function measureAsync<T>(fn: () => Promise<T>): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}
