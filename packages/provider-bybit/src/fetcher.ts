/**
 * Bybit implementation of the `ExchangeFetcher` contract.
 */

import { FetchError, errorMessage, intervalToMillis } from "@pivot-suite/contracts";
import type { Candle, ExchangeFetcher, FetchRequest } from "@pivot-suite/contracts";
import type { Logger } from "@pivot-suite/logger";
import { BybitClient, DEFAULT_BYBIT_BASE_URL } from "./client.js";
import { cancelledError } from "./errors.js";
import { parseKlineRows } from "./parser.js";
import { RequestThrottle, sleep as defaultSleep } from "./throttle.js";
import type { Sleep } from "./throttle.js";
import { BYBIT_MAX_LIMIT } from "./types.js";
import type { BybitFetcherOptions, BybitKlineRow, KlineQuery } from "./types.js";

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_BASE_DELAY_MS = 1_000;
const DEFAULT_MIN_REQUEST_INTERVAL_MS = 100;

/**
 * Fetches candles for a range, paging backward from the range end.
 *
 * Bybit answers a kline query with the newest `limit` rows at or before
 * `end`, so each page moves `end` to just before the oldest row received
 * until `start` is reached or a short page comes back.
 *
 * Calls are independent: each `fetch` owns its paging and retries, and only
 * the request throttle is shared between calls on one instance.
 *
 * @example
 * ```typescript
 * const fetcher = new BybitFetcher({ logger, timeoutMs: 5000 });
 * const candles = await fetcher.fetch({
 *   ticker: "BTCUSDT",
 *   interval: "15m",
 *   range: { start: Date.UTC(2024, 0, 1), end: Date.UTC(2024, 0, 2) },
 * });
 * ```
 */
export class BybitFetcher implements ExchangeFetcher {
  readonly name = "bybit";

  private readonly client: BybitClient;
  private readonly logger: Logger;
  private readonly throttle: RequestThrottle;
  private readonly sleep: Sleep;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly pageLimit: number;

  constructor(options: BybitFetcherOptions) {
    this.logger = options.logger.child({ component: "bybit-fetcher" });
    this.sleep = options.sleep ?? defaultSleep;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    this.pageLimit = Math.min(options.pageLimit ?? BYBIT_MAX_LIMIT, BYBIT_MAX_LIMIT);
    this.throttle = new RequestThrottle(
      options.minRequestIntervalMs ?? DEFAULT_MIN_REQUEST_INTERVAL_MS,
      this.sleep,
      options.now ?? Date.now
    );
    this.client = new BybitClient({
      baseUrl: options.baseUrl ?? DEFAULT_BYBIT_BASE_URL,
      category: options.category ?? "linear",
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      fetchImpl: options.fetchImpl ?? ((input, init) => fetch(input, init)),
      logger: this.logger,
    });
  }

  /**
   * @returns Candles with open time in `[range.start, range.end)`, ascending
   * @throws FetchError once retries are exhausted or on a non-retryable failure
   */
  async fetch(request: FetchRequest): Promise<Candle[]> {
    const { ticker, interval, range, signal } = request;
    const widthMs = intervalToMillis(interval);
    const collected = new Map<number, Candle>();
    let skipped = 0;
    let pages = 0;
    let end = range.end - 1;

    while (end >= range.start) {
      const rows = await this.requestWithRetry(
        { symbol: ticker, interval, start: range.start, end, limit: this.pageLimit },
        signal
      );
      pages++;

      const page = parseKlineRows(rows, ticker, range);
      skipped += page.skipped;
      for (const candle of page.candles) {
        collected.set(candle.timestamp, candle);
      }

      const oldest = page.candles[0];
      if (rows.length < this.pageLimit || oldest === undefined || oldest.timestamp <= range.start) {
        break;
      }
      end = oldest.timestamp - 1;
    }

    if (skipped > 0) {
      this.logger.warn("Skipped malformed kline rows", { ticker, skipped });
    }

    const candles = [...collected.values()].sort((a, b) => a.timestamp - b.timestamp);
    this.logger.debug("Bybit candles fetched", {
      ticker,
      interval,
      pages,
      count: candles.length,
      expected: Math.floor((range.end - range.start) / widthMs),
    });
    return candles;
  }

  private async requestWithRetry(
    query: KlineQuery,
    signal: AbortSignal | undefined
  ): Promise<BybitKlineRow[]> {
    for (let attempt = 0; ; attempt++) {
      try {
        await this.throttle.acquire(signal);
        return await this.client.getKlines(query, signal);
      } catch (error) {
        const fetchError = this.toFetchError(error, query.symbol, signal);
        if (!fetchError.retryable || attempt >= this.maxRetries) {
          throw fetchError;
        }

        const delayMs = this.retryBaseDelayMs * 2 ** attempt;
        this.logger.warn("Bybit request failed, retrying", {
          ticker: query.symbol,
          attempt: attempt + 1,
          max_retries: this.maxRetries,
          delay_ms: delayMs,
          reason: fetchError.reason,
          error: fetchError.message,
        });
        try {
          await this.sleep(delayMs, signal);
        } catch {
          throw cancelledError(query.symbol);
        }
      }
    }
  }

  private toFetchError(error: unknown, symbol: string, signal: AbortSignal | undefined): FetchError {
    if (error instanceof FetchError) return error;
    if (signal?.aborted) return cancelledError(symbol);
    return new FetchError(`Bybit request failed: ${errorMessage(error)}`, {
      reason: "upstream",
      retryable: false,
      ticker: symbol,
    });
  }
}
