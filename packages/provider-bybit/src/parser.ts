/**
 * Parser for Bybit kline rows.
 */

import type { Candle, TimeRange } from "@pivot-suite/contracts";
import type { BybitKlineRow } from "./types.js";

/**
 * Converts one kline row to a candle.
 *
 * @returns The candle, or null when the row is short or holds a
 *   non-numeric field
 *
 * @example
 * ```typescript
 * parseKlineRow(["1704067200000", "42000", "42100", "41950", "42050", "12.5", "525000"], "BTCUSDT");
 * // { ticker: "BTCUSDT", timestamp: 1704067200000, open: 42000, ..., turnover: 525000 }
 * ```
 */
export function parseKlineRow(row: BybitKlineRow, ticker: string): Candle | null {
  const [start, open, high, low, close, volume, turnover] = row;
  if (
    start === undefined ||
    open === undefined ||
    high === undefined ||
    low === undefined ||
    close === undefined ||
    volume === undefined
  ) {
    return null;
  }

  const candle: Candle = {
    ticker,
    timestamp: Number(start),
    open: Number(open),
    high: Number(high),
    low: Number(low),
    close: Number(close),
    volume: Number(volume),
  };
  const numeric = [candle.timestamp, candle.open, candle.high, candle.low, candle.close, candle.volume];
  if (!numeric.every(Number.isFinite) || !Number.isInteger(candle.timestamp)) {
    return null;
  }

  if (turnover !== undefined) {
    const value = Number(turnover);
    if (Number.isFinite(value)) {
      candle.turnover = value;
    }
  }
  return candle;
}

export interface ParsedKlines {
  /** Ascending by timestamp, restricted to the requested range */
  candles: Candle[];
  /** Rows that could not be parsed */
  skipped: number;
}

/**
 * Parses a page of rows (newest first, as Bybit sends them) into ascending
 * candles whose open time lies in `[range.start, range.end)`.
 */
export function parseKlineRows(rows: readonly BybitKlineRow[], ticker: string, range: TimeRange): ParsedKlines {
  const candles: Candle[] = [];
  let skipped = 0;

  for (const row of rows) {
    const candle = parseKlineRow(row, ticker);
    if (candle === null) {
      skipped++;
      continue;
    }
    if (candle.timestamp >= range.start && candle.timestamp < range.end) {
      candles.push(candle);
    }
  }

  candles.sort((a, b) => a.timestamp - b.timestamp);
  return { candles, skipped };
}
