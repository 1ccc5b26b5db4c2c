/**
 * Mapping of Bybit transport and API failures onto `FetchError`.
 *
 * Everything the client raises is a `FetchError`; the `retryable` flag drives
 * the fetcher's retry loop.
 */

import { FetchError, errorMessage } from "@pivot-suite/contracts";
import { BYBIT_RATE_LIMIT_RET_CODE } from "./types.js";

/**
 * Builds the error for a non-2xx HTTP response.
 *
 * 429 is a rate limit and 5xx an upstream fault, both retryable; any other
 * status means the request itself is wrong and will fail again.
 *
 * @example
 * ```typescript
 * httpStatusError(503, "BTCUSDT").retryable; // true
 * httpStatusError(400, "BTCUSDT").reason;    // 'http'
 * ```
 */
export function httpStatusError(status: number, ticker: string): FetchError {
  if (status === 429) {
    return new FetchError("Bybit rate limit exceeded (HTTP 429)", {
      reason: "rate-limit",
      retryable: true,
      status,
      ticker,
    });
  }
  if (status >= 500) {
    return new FetchError(`Bybit upstream error (HTTP ${status})`, {
      reason: "upstream",
      retryable: true,
      status,
      ticker,
    });
  }
  return new FetchError(`Bybit rejected the request (HTTP ${status})`, {
    reason: "http",
    retryable: false,
    status,
    ticker,
  });
}

/**
 * Builds the error for a 200 response carrying a non-zero `retCode`.
 */
export function retCodeError(retCode: number, retMsg: string, ticker: string): FetchError {
  if (retCode === BYBIT_RATE_LIMIT_RET_CODE) {
    return new FetchError(`Bybit rate limit exceeded: ${retMsg}`, {
      reason: "rate-limit",
      retryable: true,
      retCode,
      ticker,
    });
  }
  return new FetchError(`Bybit API error ${retCode}: ${retMsg}`, {
    reason: "upstream",
    retryable: false,
    retCode,
    ticker,
  });
}

export function parseError(detail: string, ticker: string): FetchError {
  return new FetchError(`Bybit response could not be parsed: ${detail}`, {
    reason: "parse",
    retryable: false,
    ticker,
  });
}

export function cancelledError(ticker: string): FetchError {
  return new FetchError(`Bybit request for ${ticker} was cancelled`, {
    reason: "cancelled",
    retryable: false,
    ticker,
  });
}

export function timeoutError(timeoutMs: number, ticker: string): FetchError {
  return new FetchError(`Bybit request timed out after ${timeoutMs}ms`, {
    reason: "timeout",
    retryable: true,
    timeoutMs,
    ticker,
  });
}

export function networkError(cause: unknown, ticker: string): FetchError {
  return new FetchError(`Bybit request failed: ${errorMessage(cause)}`, {
    reason: "network",
    retryable: true,
    ticker,
  });
}
