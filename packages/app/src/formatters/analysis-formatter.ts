/**
 * Analysis report formatter
 * Renders an AnalysisResult as plain text or JSON with deterministic output
 */

import type { CacheStatus } from '@pivot-suite/analysis-cache';
import { ALL_WEEKDAYS, WEEKDAY_NAMES, getTimeframeLabel } from '@pivot-suite/contracts';
import type {
  AnalysisResult,
  OutcomeRates,
  PivotPoint,
  PivotTableRow,
  ProvisionalPivot,
  Weekday,
} from '@pivot-suite/contracts';
import { slotLabel } from '@pivot-suite/pivot-engine';

export type OutputFormat = 'text' | 'json';

export interface FormatOptions {
  format?: OutputFormat;
  cache?: CacheStatus;
}

export class AnalysisFormatter {
  format(result: AnalysisResult, options: FormatOptions = {}): string {
    if (options.format === 'json') {
      return JSON.stringify(options.cache ? { cache: options.cache, result } : result, null, 2);
    }
    return this.formatAsText(result, options.cache);
  }

  private formatAsText(result: AnalysisResult, cache?: CacheStatus): string {
    const lines: string[] = [];

    lines.push(
      `Pivot Analysis: ${result.ticker} ${getTimeframeLabel(result.timeframe)} ` +
        `(${result.dateRangeDays} days, ${this.formatWeekdays(result.weekdays)})`
    );
    lines.push('='.repeat(60));
    lines.push(`Window: ${this.formatTime(result.range.start)} to ${this.formatTime(result.range.end)} UTC`);
    lines.push(`Candles: ${result.candleCount}`);
    lines.push(`Updated: ${this.formatTime(result.lastUpdated)} UTC`);
    if (cache) {
      lines.push(`Cache: ${cache}`);
    }
    if (result.degraded) {
      lines.push('Degraded: partial candle coverage, result not cached');
    }
    for (const warning of result.warnings) {
      lines.push(`Warning: ${warning}`);
    }
    lines.push('');

    lines.push('Statistics:');
    const { stats } = result;
    if (stats.status === 'ok') {
      lines.push(`  Buckets: ${stats.buckets} (scored ${stats.scored}, degenerate ${stats.degenerate})`);
      lines.push(`  P1: ${this.formatRates(stats.p1)}`);
      lines.push(`  P2: ${this.formatRates(stats.p2)}`);
      lines.push(`  Overall: ${this.formatRates(stats.overall)}`);
      lines.push(
        `  Bias: above ${stats.bias.above} (${this.formatPct(stats.bias.abovePct)}), ` +
          `below ${stats.bias.below} (${this.formatPct(stats.bias.belowPct)}), ` +
          `ratio ${stats.bias.ratio === null ? 'n/a' : stats.bias.ratio.toFixed(2)}`
      );
      lines.push(`  P1 was the high ${stats.p1Kinds.high} times, the low ${stats.p1Kinds.low} times`);
    } else {
      lines.push(`  Insufficient data: ${stats.buckets} bucket(s), ${stats.degenerate} degenerate`);
    }
    lines.push('');

    if (result.pivotTable.length > 0) {
      lines.push('Pivot Table:');
      lines.push(
        `  ${this.padRight('Bucket', 17)} ${this.padRight('Day', 4)} ` +
          `${this.padRight('P1', 28)} ${this.padRight('P2', 28)} Bias`
      );
      for (const row of result.pivotTable) {
        lines.push(`  ${this.formatRow(row, result)}`);
      }
      lines.push('');
    }

    const formed = result.distribution.filter((row) => row.p1Count > 0 || row.p2Count > 0);
    if (formed.length > 0) {
      lines.push('Formation Distribution:');
      lines.push(
        `  ${this.padRight('Slot', 10)} ${this.padRight('P1', 7)} ${this.padRight('P2', 7)} ` +
          `${this.padRight('Last P1', 8)} Last P2`
      );
      for (const row of formed) {
        lines.push(
          `  ${this.padRight(row.label, 10)} ${this.padRight(this.formatPct(row.p1Pct), 7)} ` +
            `${this.padRight(this.formatPct(row.p2Pct), 7)} ${this.padRight(this.formatAgo(row.lastP1Ago), 8)} ` +
            this.formatAgo(row.lastP2Ago)
        );
      }
      lines.push('');
    }

    const { live } = result;
    if (live) {
      lines.push(`Live Bucket (${this.formatTime(live.bucketStart)} UTC):`);
      lines.push(`  P1: ${this.formatProvisional(live.p1, result)}`);
      lines.push(`  P2: ${this.formatProvisional(live.p2, result)}`);
      lines.push(`  Historical P1 later than this P1: ${this.formatPct(live.p1AfterP1Pct)}`);
      lines.push(`  P1 flip risk: ${this.formatPct(live.p1FlipRiskPct)} (${live.p1FlipRisk})`);
      lines.push(`  P2 still to form: ${this.formatPct(live.p2AfterNowPct)} (current P2 ${live.p2Formation} to stand)`);
    }

    return lines.join('\n').trimEnd();
  }

  private formatRow(row: PivotTableRow, result: AnalysisResult): string {
    const day = WEEKDAY_NAMES[row.weekday].slice(0, 3);
    const start = `${this.padRight(this.formatTime(row.bucketStart), 17)} ${this.padRight(day, 4)}`;
    if (row.status === 'degenerate') {
      return `${start} degenerate (${row.candleCount} candles): ${row.reason}`;
    }
    return (
      `${start} ${this.padRight(this.formatPivot(row.p1), 28)} ` +
      `${this.padRight(this.formatPivot(row.p2), 28)} ${row.bias}`
    );
  }

  private formatPivot(pivot: PivotPoint): string {
    return `${pivot.kind} ${this.formatPrice(pivot.level)} ${pivot.outcome}`;
  }

  private formatProvisional(pivot: ProvisionalPivot, result: AnalysisResult): string {
    const formedAt = this.formatTime(pivot.formedAt);
    return `${pivot.kind} ${this.formatPrice(pivot.level)} at ${formedAt} (${slotLabel(pivot.slot, result.timeframe)})`;
  }

  private formatRates(rates: OutcomeRates): string {
    return (
      `held ${rates.held} (${this.formatPct(rates.heldPct)}), ` +
      `flipped ${rates.flipped} (${this.formatPct(rates.flippedPct)}), ` +
      `untested ${rates.untested} (${this.formatPct(rates.untestedPct)})`
    );
  }

  private formatWeekdays(weekdays: readonly Weekday[]): string {
    if (weekdays.length === ALL_WEEKDAYS.length) return 'all days';
    return weekdays.map((day) => WEEKDAY_NAMES[day].slice(0, 3)).join(', ');
  }

  /**
   * `YYYY-MM-DD HH:MM` in UTC
   */
  private formatTime(timestamp: number): string {
    return new Date(timestamp).toISOString().slice(0, 16).replace('T', ' ');
  }

  private formatPrice(price: number): string {
    return price >= 1 ? price.toFixed(2) : price.toPrecision(4);
  }

  private formatPct(value: number): string {
    return `${value.toFixed(1)}%`;
  }

  private formatAgo(ago: number | null): string {
    return ago === null ? '-' : `${ago}d ago`;
  }

  private padRight(str: string, length: number): string {
    return str.padEnd(length);
  }
}
