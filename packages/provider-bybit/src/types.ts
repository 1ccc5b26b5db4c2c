/**
 * Types and response schemas for the Bybit v5 market API.
 */

import { z } from "zod";
import type { CandleInterval } from "@pivot-suite/contracts";
import type { Logger } from "@pivot-suite/logger";

/**
 * Kline interval codes accepted by `/v5/market/kline`.
 */
export const BYBIT_INTERVALS: Record<CandleInterval, string> = {
  "15m": "15",
  "1h": "60",
  "4h": "240",
  "1d": "D",
};

/**
 * Bybit's documented maximum rows per kline request.
 */
export const BYBIT_MAX_LIMIT = 1000;

/**
 * retCode Bybit returns when the request rate limit is exceeded.
 */
export const BYBIT_RATE_LIMIT_RET_CODE = 10006;

/**
 * One kline row: `[startTime, open, high, low, close, volume, turnover]`,
 * all encoded as strings, newest row first.
 */
export type BybitKlineRow = string[];

export const klineResponseSchema = z.object({
  retCode: z.number(),
  retMsg: z.string(),
  result: z
    .object({
      symbol: z.string().optional(),
      category: z.string().optional(),
      list: z.array(z.array(z.string())).optional(),
    })
    .optional(),
  time: z.number().optional(),
});

export type BybitKlineResponse = z.infer<typeof klineResponseSchema>;

/**
 * Minimal fetch signature, so tests can pass a stub.
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Query for one kline page.
 */
export interface KlineQuery {
  symbol: string;
  interval: CandleInterval;
  /** Inclusive start, epoch ms */
  start: number;
  /** Inclusive end, epoch ms */
  end: number;
  limit: number;
}

export interface BybitFetcherOptions {
  logger: Logger;

  /**
   * API host. Defaults to https://api.bybit.com
   */
  baseUrl?: string;

  /**
   * Product category (default: "linear").
   */
  category?: "linear" | "spot" | "inverse";

  /**
   * Per-request timeout in milliseconds (default: 10000).
   */
  timeoutMs?: number;

  /**
   * Retries after the first attempt, for retryable errors only (default: 3).
   */
  maxRetries?: number;

  /**
   * Base backoff delay; attempt n waits `retryBaseDelayMs * 2^n` (default: 1000).
   */
  retryBaseDelayMs?: number;

  /**
   * Minimum spacing between requests of this fetcher (default: 100).
   */
  minRequestIntervalMs?: number;

  /**
   * Rows per page, capped at 1000 (default: 1000).
   */
  pageLimit?: number;

  fetchImpl?: FetchLike;

  /** Injectable delay, for tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;

  /** Injectable clock, for tests */
  now?: () => number;
}
