/**
 * @fileoverview Tests for Bybit kline row parsing.
 */

import { describe, it, expect } from "vitest";
import { parseKlineRow, parseKlineRows } from "../src/parser.js";

const T0 = Date.UTC(2024, 0, 1);
const QUARTER = 15 * 60 * 1000;

function row(timestamp: number, close = "42050"): string[] {
  return [String(timestamp), "42000", "42100", "41950", close, "12.5", "525000"];
}

describe("parseKlineRow", () => {
  it("should convert string fields to a candle", () => {
    expect(parseKlineRow(row(T0), "BTCUSDT")).toEqual({
      ticker: "BTCUSDT",
      timestamp: T0,
      open: 42000,
      high: 42100,
      low: 41950,
      close: 42050,
      volume: 12.5,
      turnover: 525000,
    });
  });

  it("should leave turnover out when the row has none", () => {
    const candle = parseKlineRow(row(T0).slice(0, 6), "BTCUSDT");
    expect(candle).not.toBeNull();
    expect(candle).not.toHaveProperty("turnover");
  });

  it("should reject short rows and non-numeric fields", () => {
    expect(parseKlineRow(["1704067200000", "42000"], "BTCUSDT")).toBeNull();
    expect(parseKlineRow(row(T0, "n/a"), "BTCUSDT")).toBeNull();
  });
});

describe("parseKlineRows", () => {
  it("should sort ascending, clip to the range and count skipped rows", () => {
    const rows = [row(T0 + 3 * QUARTER), row(T0 + 2 * QUARTER), ["broken"], row(T0 + QUARTER), row(T0)];

    const parsed = parseKlineRows(rows, "BTCUSDT", { start: T0 + QUARTER, end: T0 + 3 * QUARTER });

    expect(parsed.candles.map((c) => c.timestamp)).toEqual([T0 + QUARTER, T0 + 2 * QUARTER]);
    expect(parsed.skipped).toBe(1);
  });
});
