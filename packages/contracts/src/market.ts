/**
 * @fileoverview Candle types and the narrow contracts around candle storage
 * and the upstream exchange.
 *
 * @module @pivot-suite/contracts/market
 */

/**
 * One OHLCV record for a fixed interval.
 *
 * @invariant unique per (ticker, timestamp)
 * @invariant high >= max(open, close) and low <= min(open, close)
 * @invariant prices and volume are >= 0
 *
 * @example
 * ```typescript
 * const candle: Candle = {
 *   ticker: 'BTCUSDT',
 *   timestamp: Date.UTC(2024, 0, 1, 0, 15),
 *   open: 42000,
 *   high: 42150.5,
 *   low: 41980,
 *   close: 42110,
 *   volume: 312.4,
 * };
 * ```
 */
export interface Candle {
  /** Exchange symbol, upper case (e.g. "BTCUSDT") */
  ticker: string;

  /** Interval open time, epoch milliseconds UTC */
  timestamp: number;

  open: number;
  high: number;
  low: number;
  close: number;

  /** Base-asset volume */
  volume: number;

  /** Quote-asset volume, when the source reports it */
  turnover?: number;
}

/**
 * Half-open time range `[start, end)` in epoch milliseconds.
 */
export interface TimeRange {
  start: number;
  end: number;
}

/**
 * Candle intervals the resolver understands. `15m` is the source granularity.
 */
export const CANDLE_INTERVALS = ['15m', '1h', '4h', '1d'] as const;

export type CandleInterval = (typeof CANDLE_INTERVALS)[number];

const INTERVAL_MS: Record<CandleInterval, number> = {
  '15m': 15 * 60 * 1000,
  '1h': 60 * 60 * 1000,
  '4h': 4 * 60 * 60 * 1000,
  '1d': 24 * 60 * 60 * 1000,
};

/** Interval stored and fetched by default. */
export const SOURCE_INTERVAL: CandleInterval = '15m';

export function isCandleInterval(value: string): value is CandleInterval {
  return (CANDLE_INTERVALS as readonly string[]).includes(value);
}

/**
 * Width of an interval in milliseconds.
 *
 * @example
 * ```typescript
 * intervalToMillis('15m') // 900000
 * ```
 */
export function intervalToMillis(interval: CandleInterval): number {
  return INTERVAL_MS[interval];
}

/**
 * Truncates a timestamp to the start of its interval.
 */
export function alignToInterval(timestamp: number, interval: CandleInterval): number {
  const width = INTERVAL_MS[interval];
  return Math.floor(timestamp / width) * width;
}

/**
 * Persistent candle storage. Reads return candles ordered by timestamp;
 * writes are idempotent on (ticker, timestamp) and report rows inserted.
 */
export interface CandleStore {
  read(ticker: string, range: TimeRange): Promise<Candle[]>;
  write(candles: readonly Candle[]): Promise<number>;
  /** Most recent stored timestamp for a ticker, or null when none is stored. */
  latestTimestamp(ticker: string): Promise<number | null>;
}

/**
 * Parameters for one exchange fetch.
 */
export interface FetchRequest {
  ticker: string;
  interval: CandleInterval;
  range: TimeRange;
  /** Aborts the fetch; surfaces as a non-retryable `cancelled` FetchError. */
  signal?: AbortSignal;
}

/**
 * Upstream source of candles. Implementations reject with `FetchError`.
 */
export interface ExchangeFetcher {
  readonly name: string;
  fetch(request: FetchRequest): Promise<Candle[]>;
}
