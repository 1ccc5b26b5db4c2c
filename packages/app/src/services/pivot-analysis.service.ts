/**
 * Pivot analysis service
 *
 * Validates analysis requests, serves them through the analysis cache and
 * turns every failure into a tagged result for the caller.
 */

import type { AnalysisCache, CacheStatus } from '@pivot-suite/analysis-cache';
import type { CandleResolver } from '@pivot-suite/candle-cache';
import {
  errorMessage,
  isCacheUnavailableError,
  isFetchError,
  isPivotSuiteError,
  noopAuditSink,
  parseAnalysisRequest,
} from '@pivot-suite/contracts';
import type { AnalysisKey, AnalysisRequest, AnalysisResult, AuditSink } from '@pivot-suite/contracts';
import { startTimer } from '@pivot-suite/logger';
import type { Logger } from '@pivot-suite/logger';
import { analysisWindow, computeAnalysis } from '@pivot-suite/pivot-engine';
import type { SessionDefinition } from '@pivot-suite/pivot-engine';

export interface AnalysisFailure {
  /** Error code of the failure, or INTERNAL for anything untagged */
  code: string;
  message: string;
  retryable: boolean;
}

export type AnalysisOutcome =
  | { status: 'ok'; result: AnalysisResult; cache: CacheStatus }
  | { status: 'error'; error: AnalysisFailure };

export interface AnalyzeOptions {
  /** Analysis time (default: now) */
  asOf?: number;
  /** Stops waiting for the result */
  signal?: AbortSignal;
  forceRefresh?: boolean;
}

export interface PivotAnalysisServiceOptions {
  resolver: CandleResolver;
  cache: AnalysisCache;
  logger: Logger;
  audit?: AuditSink;
  proximityPct?: number;
  sessions?: readonly SessionDefinition[];
  now?: () => number;
}

/**
 * Maps a thrown value to the failure returned to callers.
 */
export function toAnalysisFailure(error: unknown): AnalysisFailure {
  if (isFetchError(error)) {
    return { code: error.code, message: error.message, retryable: error.retryable };
  }
  if (isCacheUnavailableError(error)) {
    return { code: error.code, message: error.message, retryable: true };
  }
  if (isPivotSuiteError(error)) {
    return { code: error.code, message: error.message, retryable: false };
  }
  return { code: 'INTERNAL', message: errorMessage(error), retryable: false };
}

export class PivotAnalysisService {
  private resolver: CandleResolver;
  private cache: AnalysisCache;
  private logger: Logger;
  private audit: AuditSink;
  private proximityPct: number | undefined;
  private sessions: readonly SessionDefinition[] | undefined;
  private now: () => number;

  constructor(options: PivotAnalysisServiceOptions) {
    this.resolver = options.resolver;
    this.cache = options.cache;
    this.logger = options.logger.child({ component: 'pivot-analysis' });
    this.audit = options.audit ?? noopAuditSink;
    this.proximityPct = options.proximityPct;
    this.sessions = options.sessions;
    this.now = options.now ?? Date.now;
  }

  async analyze(input: unknown, options: AnalyzeOptions = {}): Promise<AnalysisOutcome> {
    let request: AnalysisRequest;
    try {
      request = parseAnalysisRequest(input);
    } catch (error) {
      const failure = toAnalysisFailure(error);
      this.logger.warn('Analysis request rejected', { error: failure.message });
      return { status: 'error', error: failure };
    }

    const timer = startTimer();
    const asOf = options.asOf ?? this.now();
    const key: AnalysisKey = {
      ticker: request.ticker,
      timeframe: request.timeframe,
      dateRangeDays: request.dateRangeDays,
      weekdays: request.weekdays,
    };

    try {
      const { value, status } = await this.cache.getOrCompute(key, (normalized) => this.compute(normalized, asOf), {
        signal: options.signal,
        forceRefresh: options.forceRefresh,
      });
      const durationMs = timer.stop();

      this.audit.record({
        ticker: key.ticker,
        operation: 'compute',
        rowsAffected: value.pivotTable.length,
        success: true,
        durationMs,
      });
      this.logger.info('Analysis served', {
        ticker: key.ticker,
        timeframe: key.timeframe,
        cache: status,
        degraded: value.degraded,
        duration_ms: durationMs,
      });

      return { status: 'ok', result: value, cache: status };
    } catch (error) {
      const failure = toAnalysisFailure(error);
      const durationMs = timer.stop();

      this.audit.record({
        ticker: key.ticker,
        operation: 'compute',
        rowsAffected: 0,
        success: false,
        errorMessage: failure.message,
        durationMs,
      });
      if (failure.code === 'INTERNAL') {
        this.logger.error('Analysis failed unexpectedly', { ticker: key.ticker, error });
      } else {
        this.logger.warn('Analysis failed', { ticker: key.ticker, code: failure.code, error: failure.message });
      }

      return { status: 'error', error: failure };
    }
  }

  private async compute(key: AnalysisKey, asOf: number): Promise<AnalysisResult> {
    const range = analysisWindow(asOf, key.dateRangeDays);
    const resolved = await this.resolver.resolve({ ticker: key.ticker, range });

    return computeAnalysis({
      key,
      candles: resolved.candles,
      range,
      asOf,
      proximityPct: this.proximityPct,
      sessions: this.sessions,
      degraded: resolved.degraded,
      warnings: resolved.warnings,
    });
  }
}
