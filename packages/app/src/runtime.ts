/**
 * Runtime wiring: builds stores, fetcher, caches, service and refresh job
 * for the configured storage backend.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';
import {
  AnalysisCache,
  MemoryAnalysisStore,
  SqlAnalysisStore,
  SupabaseAnalysisStore,
} from '@pivot-suite/analysis-cache';
import { CandleResolver, MemoryCandleCache, SqlCandleStore, SupabaseCandleStore } from '@pivot-suite/candle-cache';
import type { AnalysisStore, AuditSink, CandleStore, ExchangeFetcher } from '@pivot-suite/contracts';
import { connect, parseConnectionString } from '@pivot-suite/db-simple';
import type { DbConnection } from '@pivot-suite/db-simple';
import type { Logger } from '@pivot-suite/logger';
import { BybitFetcher } from '@pivot-suite/provider-bybit';
import { LoggerAuditSink, SqlAuditSink, SupabaseAuditSink } from './audit/index.js';
import type { Config } from './config/index.js';
import { CandleRefreshJob } from './jobs/candle-refresh.job.js';
import { StaticPairSource, SupabasePairSource, loadPopularPairs } from './pairs/index.js';
import type { PopularPairSource } from './pairs/index.js';
import { PivotAnalysisService } from './services/pivot-analysis.service.js';

export type FlushableAuditSink = AuditSink & { flush(): Promise<void> };

/**
 * Replacements for the parts of the runtime that reach the outside world.
 */
export interface RuntimeOverrides {
  fetcher?: ExchangeFetcher;
  supabase?: SupabaseClient;
  pairs?: PopularPairSource;
  now?: () => number;
}

export interface Runtime {
  config: Config;
  logger: Logger;
  store: CandleStore;
  resolver: CandleResolver;
  cache: AnalysisCache;
  service: PivotAnalysisService;
  job: CandleRefreshJob;
  pairs: PopularPairSource;
  audit: FlushableAuditSink;
  /** Stops the job, flushes the audit trail and closes the database */
  close(): Promise<void>;
}

interface Storage {
  store: CandleStore;
  analysisStore: AnalysisStore;
  audit: FlushableAuditSink;
  db: DbConnection | null;
  supabase: SupabaseClient | null;
}

function supabaseClient(config: Config, overrides: RuntimeOverrides): SupabaseClient {
  if (overrides.supabase) return overrides.supabase;

  const { url, serviceKey } = config.storage.supabase;
  if (!url || !serviceKey) {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_KEY are required for Supabase storage');
  }
  return createClient(url, serviceKey, { auth: { persistSession: false } });
}

async function openSql(databaseUrl: string, logger: Logger): Promise<DbConnection> {
  const { type, config: location } = parseConnectionString(databaseUrl);
  if (type === 'sqlite' && location !== ':memory:') {
    mkdirSync(dirname(location), { recursive: true });
  }
  return connect(databaseUrl, { logger: logger.child({ component: 'db' }) });
}

async function createStorage(config: Config, logger: Logger, overrides: RuntimeOverrides): Promise<Storage> {
  const { backend, candleTable, analysisTable } = config.storage;

  if (backend === 'supabase') {
    const supabase = supabaseClient(config, overrides);
    return {
      store: new SupabaseCandleStore(supabase, {
        logger: logger.child({ component: 'candle-store' }),
        table: candleTable,
      }),
      analysisStore: new SupabaseAnalysisStore(supabase, {
        logger: logger.child({ component: 'analysis-store' }),
        table: analysisTable,
      }),
      audit: new SupabaseAuditSink(supabase, logger.child({ component: 'audit' })),
      db: null,
      supabase,
    };
  }

  const db = await openSql(backend === 'memory' ? 'sqlite::memory:' : config.storage.databaseUrl, logger);
  const store = new SqlCandleStore(db, { table: candleTable });
  await store.init();

  if (backend === 'memory') {
    return {
      store,
      analysisStore: new MemoryAnalysisStore(),
      audit: new LoggerAuditSink(logger.child({ component: 'audit' })),
      db,
      supabase: null,
    };
  }

  const analysisStore = new SqlAnalysisStore(db, {
    logger: logger.child({ component: 'analysis-store' }),
    table: analysisTable,
  });
  await analysisStore.init();
  const audit = new SqlAuditSink(db, logger.child({ component: 'audit' }));
  await audit.init();

  return { store, analysisStore, audit, db, supabase: null };
}

function createPairSource(config: Config, storage: Storage, overrides: RuntimeOverrides): PopularPairSource {
  if (overrides.pairs) return overrides.pairs;
  if (config.popularPairs.source === 'supabase') {
    return new SupabasePairSource(storage.supabase ?? supabaseClient(config, overrides));
  }
  return new StaticPairSource(loadPopularPairs(config.popularPairs.file));
}

/**
 * Builds the runtime for a validated configuration.
 *
 * @example
 * const runtime = await createRuntime(loadConfig(), logger);
 * const outcome = await runtime.service.analyze({ ticker: 'BTCUSDT' });
 * await runtime.close();
 */
export async function createRuntime(
  config: Config,
  logger: Logger,
  overrides: RuntimeOverrides = {}
): Promise<Runtime> {
  const storage = await createStorage(config, logger, overrides);
  const { store, analysisStore, audit } = storage;

  const fetcher =
    overrides.fetcher ??
    new BybitFetcher({
      logger: logger.child({ component: 'bybit' }),
      baseUrl: config.exchange.baseUrl,
      category: config.exchange.category,
      timeoutMs: config.exchange.timeoutMs,
      maxRetries: config.exchange.maxRetries,
      retryBaseDelayMs: config.exchange.retryBaseDelayMs,
      minRequestIntervalMs: config.exchange.minRequestIntervalMs,
      pageLimit: config.exchange.pageLimit,
    });

  const { memoryCandles } = config.storage;
  const memory = memoryCandles > 0 ? new MemoryCandleCache({ maxSize: memoryCandles }) : undefined;
  const resolver = new CandleResolver({ store, fetcher, logger, memory, audit });
  const cache = new AnalysisCache({
    store: analysisStore,
    logger,
    ttlOverrides: config.analysis.ttlOverrides,
    now: overrides.now,
  });
  const service = new PivotAnalysisService({
    resolver,
    cache,
    logger,
    audit,
    proximityPct: config.analysis.proximityPct,
    sessions: config.analysis.sessions,
    now: overrides.now,
  });

  const pairs = createPairSource(config, storage, overrides);
  const job = new CandleRefreshJob({
    pairs,
    resolver,
    store,
    logger,
    audit,
    overlapMinutes: config.refresh.overlapMinutes,
    bootstrapHours: config.refresh.bootstrapHours,
    tickMs: config.refresh.tickMs,
    pairDelayMs: config.refresh.pairDelayMs,
    warm: config.refresh.warmPresets.length > 0 ? { service, presets: config.refresh.warmPresets } : undefined,
    now: overrides.now,
  });

  logger.info('Runtime ready', { backend: config.storage.backend, exchange: fetcher.name });

  return {
    config,
    logger,
    store,
    resolver,
    cache,
    service,
    job,
    pairs,
    audit,
    async close() {
      job.stop();
      await job.idle();
      await audit.flush();
      await storage.db?.close();
    },
  };
}
