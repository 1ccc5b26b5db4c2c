/**
 * @pivot-suite/provider-bybit
 *
 * Exchange fetcher for Bybit v5 klines.
 */

export { BybitFetcher } from "./fetcher.js";
export { BybitClient, DEFAULT_BYBIT_BASE_URL } from "./client.js";
export type { ClientConfig } from "./client.js";
export { parseKlineRow, parseKlineRows } from "./parser.js";
export type { ParsedKlines } from "./parser.js";
export { RequestThrottle, sleep } from "./throttle.js";
export type { Sleep } from "./throttle.js";
export { httpStatusError, retCodeError } from "./errors.js";
export {
  BYBIT_INTERVALS,
  BYBIT_MAX_LIMIT,
  BYBIT_RATE_LIMIT_RET_CODE,
  klineResponseSchema,
} from "./types.js";
export type { BybitFetcherOptions, BybitKlineResponse, BybitKlineRow, FetchLike, KlineQuery } from "./types.js";
