/**
 * Collapses concurrent calls for the same key into one in-flight promise.
 */

export class SingleFlight<T> {
  private inflight = new Map<string, Promise<T>>()

  /**
   * Runs `fn` unless a call for `key` is already in flight, in which case
   * its promise is shared.
   */
  run(key: string, fn: () => Promise<T>): { promise: Promise<T>; shared: boolean } {
    const existing = this.inflight.get(key)
    if (existing) {
      return { promise: existing, shared: true }
    }

    const promise = (async () => {
      try {
        return await fn()
      } finally {
        this.inflight.delete(key)
      }
    })()
    this.inflight.set(key, promise)
    return { promise, shared: false }
  }

  get(key: string): Promise<T> | undefined {
    return this.inflight.get(key)
  }

  size(): number {
    return this.inflight.size
  }
}

/**
 * Waits for `promise` until `signal` aborts. Aborting only stops the wait;
 * the promise keeps running and its outcome is still observed.
 */
export function waitUnlessAborted<T>(promise: Promise<T>, signal: AbortSignal | undefined, onAbort: () => Error): Promise<T> {
  if (!signal) return promise
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(onAbort())
    }
    const abort = () => reject(onAbort())
    signal.addEventListener('abort', abort, { once: true })
    void promise.then(resolve, reject).finally(() => signal.removeEventListener('abort', abort))
  })
}
