/**
 * Minimum-spacing throttle for outbound requests.
 */

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolves after `ms`, or rejects with the signal's reason when it aborts first.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Hands out request slots at least `minIntervalMs` apart. Slots are reserved
 * synchronously, so concurrent callers queue in call order.
 *
 * @example
 * ```typescript
 * const throttle = new RequestThrottle(100);
 * await throttle.acquire(); // immediate
 * await throttle.acquire(); // ~100ms later
 * ```
 */
export class RequestThrottle {
  private nextSlot = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly wait: Sleep = sleep,
    private readonly now: () => number = Date.now
  ) {}

  async acquire(signal?: AbortSignal): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;
    if (slot > now) {
      await this.wait(slot - now, signal);
    }
  }
}
