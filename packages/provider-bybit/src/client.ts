/**
 * HTTP client for the Bybit v5 kline endpoint.
 *
 * One call is one HTTP request: no paging, no retries. Every failure leaves
 * as a `FetchError`.
 */

import { isFetchError } from "@pivot-suite/contracts";
import type { FetchError } from "@pivot-suite/contracts";
import type { Logger } from "@pivot-suite/logger";
import { cancelledError, httpStatusError, networkError, parseError, retCodeError, timeoutError } from "./errors.js";
import { BYBIT_INTERVALS, klineResponseSchema } from "./types.js";
import type { BybitKlineRow, FetchLike, KlineQuery } from "./types.js";

export const DEFAULT_BYBIT_BASE_URL = "https://api.bybit.com";

export interface ClientConfig {
  baseUrl: string;
  category: string;
  timeoutMs: number;
  fetchImpl: FetchLike;
  logger?: Logger;
}

/**
 * @internal
 */
export class BybitClient {
  private readonly config: ClientConfig;

  constructor(config: ClientConfig) {
    this.config = config;
  }

  /**
   * Requests one page of klines.
   *
   * The request aborts after `timeoutMs` or when `signal` fires, whichever
   * comes first; the two surface as `timeout` and `cancelled` respectively.
   *
   * @returns Raw rows, newest first
   */
  async getKlines(query: KlineQuery, signal?: AbortSignal): Promise<BybitKlineRow[]> {
    if (signal?.aborted) {
      throw cancelledError(query.symbol);
    }

    const url = this.buildKlineUrl(query);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    this.config.logger?.debug("Bybit API request", {
      symbol: query.symbol,
      interval: query.interval,
      start: new Date(query.start).toISOString(),
      end: new Date(query.end).toISOString(),
      limit: query.limit,
    });

    try {
      const response = await this.config.fetchImpl(url, {
        method: "GET",
        headers: { Accept: "application/json", "User-Agent": "pivot-suite/0.1.0" },
        signal: controller.signal,
      });
      if (!response.ok) {
        throw httpStatusError(response.status, query.symbol);
      }
      const body = await response.text();
      return this.parseBody(body, query.symbol);
    } catch (error) {
      throw this.classify(error, query.symbol, signal, controller.signal);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private parseBody(body: string, symbol: string): BybitKlineRow[] {
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw parseError("body is not JSON", symbol);
    }

    const parsed = klineResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw parseError(parsed.error.issues.map((issue) => issue.message).join("; "), symbol);
    }
    if (parsed.data.retCode !== 0) {
      throw retCodeError(parsed.data.retCode, parsed.data.retMsg, symbol);
    }
    return parsed.data.result?.list ?? [];
  }

  private classify(
    error: unknown,
    symbol: string,
    callerSignal: AbortSignal | undefined,
    requestSignal: AbortSignal
  ): FetchError {
    if (callerSignal?.aborted) return cancelledError(symbol);
    if (isFetchError(error)) return error;
    if (requestSignal.aborted) return timeoutError(this.config.timeoutMs, symbol);
    return networkError(error, symbol);
  }

  private buildKlineUrl(query: KlineQuery): string {
    const url = new URL("/v5/market/kline", this.config.baseUrl);
    url.searchParams.set("category", this.config.category);
    url.searchParams.set("symbol", query.symbol);
    url.searchParams.set("interval", BYBIT_INTERVALS[query.interval]);
    url.searchParams.set("start", String(query.start));
    url.searchParams.set("end", String(query.end));
    url.searchParams.set("limit", String(query.limit));
    return url.toString();
  }
}
