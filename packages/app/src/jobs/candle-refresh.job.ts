/**
 * Candle refresh job
 *
 * Keeps the candle store current for the popular pairs. Each run walks the
 * due pairs in priority order, resolves candles from just before the latest
 * stored one up to the last closed 15-minute slot, and optionally recomputes
 * the configured analysis presets for each refreshed pair.
 */

import type { CandleResolver } from '@pivot-suite/candle-cache';
import { alignToInterval, errorMessage, noopAuditSink } from '@pivot-suite/contracts';
import type { AuditSink, CandleStore, PivotTimeframe, TimeRange } from '@pivot-suite/contracts';
import { startTimer } from '@pivot-suite/logger';
import type { Logger } from '@pivot-suite/logger';
import { isDue } from '../pairs/types.js';
import type { PopularPair, PopularPairSource } from '../pairs/types.js';
import type { AnalysisOutcome, AnalyzeOptions } from '../services/pivot-analysis.service.js';

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

/** Ticker of the per-run summary audit entry */
export const SUMMARY_TICKER = 'ALL_PAIRS';

export interface WarmPreset {
  timeframe: PivotTimeframe;
  dateRangeDays: number;
}

export interface AnalysisWarmer {
  analyze(input: unknown, options?: AnalyzeOptions): Promise<AnalysisOutcome>;
}

export interface CandleRefreshJobOptions {
  pairs: PopularPairSource;
  resolver: CandleResolver;
  store: CandleStore;
  logger: Logger;
  audit?: AuditSink;
  /** Re-read this much before the latest stored candle */
  overlapMinutes?: number;
  /** History fetched for a pair with nothing stored */
  bootstrapHours?: number;
  tickMs?: number;
  /** Pause between pairs */
  pairDelayMs?: number;
  warm?: { service: AnalysisWarmer; presets: readonly WarmPreset[] };
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export type PairRefreshStatus = 'ok' | 'partial' | 'failed' | 'skipped';

export interface PairRefreshReport {
  ticker: string;
  status: PairRefreshStatus;
  range: TimeRange | null;
  rowsWritten: number;
  /** Presets recomputed after the refresh */
  warmed: number;
  error?: string;
}

export interface RefreshRunReport {
  startedAt: number;
  durationMs: number;
  /** Pairs that were due, in the order they ran */
  pairs: PairRefreshReport[];
  succeeded: number;
  failed: number;
}

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class CandleRefreshJob {
  private pairs: PopularPairSource;
  private resolver: CandleResolver;
  private store: CandleStore;
  private logger: Logger;
  private audit: AuditSink;
  private overlapMs: number;
  private bootstrapMs: number;
  private tickMs: number;
  private pairDelayMs: number;
  private warm: CandleRefreshJobOptions['warm'];
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;

  private timer: NodeJS.Timeout | null = null;
  private running: Promise<RefreshRunReport> | null = null;

  constructor(options: CandleRefreshJobOptions) {
    this.pairs = options.pairs;
    this.resolver = options.resolver;
    this.store = options.store;
    this.logger = options.logger.child({ component: 'candle-refresh' });
    this.audit = options.audit ?? noopAuditSink;
    this.overlapMs = (options.overlapMinutes ?? 30) * MINUTE_MS;
    this.bootstrapMs = (options.bootstrapHours ?? 2) * HOUR_MS;
    this.tickMs = options.tickMs ?? MINUTE_MS;
    this.pairDelayMs = options.pairDelayMs ?? 200;
    this.warm = options.warm;
    this.sleep = options.sleep ?? delay;
    this.now = options.now ?? Date.now;
  }

  /**
   * Refreshes every due pair once. A failing pair is reported and the run
   * moves on to the next one.
   *
   * @throws when the pair list itself cannot be loaded
   */
  async runOnce(now: number = this.now()): Promise<RefreshRunReport> {
    const timer = startTimer();
    const due = (await this.pairs.list()).filter((pair) => isDue(pair, now));
    const reports: PairRefreshReport[] = [];

    this.logger.info('Refresh run started', { due: due.length });

    for (const [index, pair] of due.entries()) {
      if (index > 0 && this.pairDelayMs > 0) {
        await this.sleep(this.pairDelayMs);
      }
      reports.push(await this.refreshPair(pair, now));
    }

    const failed = reports.filter((report) => report.status === 'failed').length;
    const succeeded = reports.filter((report) => report.status === 'ok' || report.status === 'partial').length;
    const durationMs = timer.stop();

    this.audit.record({
      ticker: SUMMARY_TICKER,
      operation: 'refresh',
      rowsAffected: reports.reduce((sum, report) => sum + report.rowsWritten, 0),
      success: failed === 0,
      errorMessage: failed > 0 ? `Failed: ${failed}` : undefined,
      durationMs,
    });
    this.logger.info('Refresh run complete', { due: due.length, succeeded, failed, duration_ms: durationMs });

    return { startedAt: now, durationMs, pairs: reports, succeeded, failed };
  }

  start(): void {
    if (this.timer) {
      this.logger.warn('Refresh job already running');
      return;
    }

    this.logger.info('Refresh job started', { tick_ms: this.tickMs });
    this.timer = setInterval(() => {
      void this.tick();
    }, this.tickMs);
    void this.tick();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info('Refresh job stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Resolves once the run in progress, if any, has finished.
   */
  async idle(): Promise<void> {
    if (this.running) {
      await this.running.then(
        () => undefined,
        () => undefined
      );
    }
  }

  private async tick(): Promise<void> {
    if (this.running) {
      this.logger.debug('Previous refresh run still in progress, skipping tick');
      return;
    }

    this.running = this.runOnce();
    try {
      await this.running;
    } catch (error) {
      this.logger.error('Refresh run failed', { error: errorMessage(error) });
    } finally {
      this.running = null;
    }
  }

  private async refreshPair(pair: PopularPair, now: number): Promise<PairRefreshReport> {
    const { ticker } = pair;
    let range: TimeRange | null = null;

    try {
      const latest = await this.store.latestTimestamp(ticker);
      const from = latest === null ? now - this.bootstrapMs : latest - this.overlapMs;
      range = { start: alignToInterval(from, '15m'), end: alignToInterval(now, '15m') };

      if (range.start >= range.end) {
        this.logger.debug('Pair already current', { ticker });
        return { ticker, status: 'skipped', range, rowsWritten: 0, warmed: 0 };
      }

      const resolved = await this.resolver.resolve({ ticker, range });
      const status: PairRefreshStatus = resolved.degraded ? 'partial' : 'ok';
      if (status === 'ok') {
        await this.pairs.markFetched(ticker, now);
      }

      const warmed = status === 'ok' ? await this.warmPresets(ticker, now) : 0;
      this.logger.info('Pair refreshed', { ticker, status, rows: resolved.rowsWritten, warmed });

      return { ticker, status, range, rowsWritten: resolved.rowsWritten, warmed };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error('Pair refresh failed', { ticker, error: message });
      return { ticker, status: 'failed', range, rowsWritten: 0, warmed: 0, error: message };
    }
  }

  private async warmPresets(ticker: string, now: number): Promise<number> {
    if (!this.warm) return 0;

    let warmed = 0;
    for (const preset of this.warm.presets) {
      const outcome = await this.warm.service.analyze({ ticker, ...preset }, { asOf: now, forceRefresh: true });
      if (outcome.status === 'ok') {
        warmed += 1;
      } else {
        this.logger.warn('Preset not warmed', { ticker, ...preset, error: outcome.error.message });
      }
    }
    return warmed;
  }
}
