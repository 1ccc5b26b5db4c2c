/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { DEFAULT_BYBIT_BASE_URL } from '@pivot-suite/provider-bybit';
import { DEFAULT_PROXIMITY_PCT, DEFAULT_SESSIONS, sessionTableSchema } from '@pivot-suite/pivot-engine';
import { MAX_DATE_RANGE_DAYS, PIVOT_TIMEFRAMES } from '@pivot-suite/contracts';

const ttlMs = z.number().int().positive().optional();

const warmPresetSchema = z.object({
  timeframe: z.enum(PIVOT_TIMEFRAMES),
  dateRangeDays: z.number().int().positive().max(MAX_DATE_RANGE_DAYS),
});

/**
 * Application configuration schema
 */
export const configSchema = z
  .object({
    app: z
      .object({
        env: z.enum(['development', 'staging', 'production', 'test']).default('development'),
        name: z.string().default('pivot-suite'),
        version: z.string().default('0.1.0'),
      })
      .default({}),

    logging: z
      .object({
        level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
        format: z.enum(['json', 'pretty']).default('pretty'),
        output: z.enum(['console', 'file', 'both']).default('console'),
        filePath: z.string().optional(),
      })
      .default({}),

    storage: z
      .object({
        backend: z.enum(['sqlite', 'postgres', 'supabase', 'memory']).default('sqlite'),
        databaseUrl: z.string().default('sqlite:data/pivot-suite.db'),
        candleTable: z.string().default('candles_15m'),
        analysisTable: z.string().default('pivot_analysis_cache'),
        memoryCandles: z.number().int().nonnegative().default(50_000),
        supabase: z
          .object({
            url: z.string().url().optional(),
            serviceKey: z.string().optional(),
          })
          .default({}),
      })
      .default({}),

    exchange: z
      .object({
        baseUrl: z.string().url().default(DEFAULT_BYBIT_BASE_URL),
        category: z.enum(['linear', 'spot', 'inverse']).default('linear'),
        timeoutMs: z.number().int().positive().default(10_000),
        maxRetries: z.number().int().nonnegative().default(3),
        retryBaseDelayMs: z.number().int().nonnegative().default(1000),
        minRequestIntervalMs: z.number().int().nonnegative().default(100),
        pageLimit: z.number().int().min(1).max(1000).default(1000),
      })
      .default({}),

    analysis: z
      .object({
        proximityPct: z.number().nonnegative().max(100).default(DEFAULT_PROXIMITY_PCT),
        defaultDateRangeDays: z.number().int().positive().max(MAX_DATE_RANGE_DAYS).default(30),
        ttlOverrides: z
          .object({
            hourly: ttlMs,
            '4h': ttlMs,
            session: ttlMs,
            daily: ttlMs,
            weekly: ttlMs,
            monthly: ttlMs,
          })
          .default({}),
        sessions: sessionTableSchema.default([...DEFAULT_SESSIONS]),
      })
      .default({}),

    refresh: z
      .object({
        enabled: z.boolean().default(false),
        tickMs: z.number().int().positive().default(60_000),
        overlapMinutes: z.number().int().nonnegative().default(30),
        bootstrapHours: z.number().positive().default(2),
        pairDelayMs: z.number().int().nonnegative().default(200),
        warmPresets: z.array(warmPresetSchema).default([{ timeframe: 'daily', dateRangeDays: 30 }]),
      })
      .default({}),

    popularPairs: z
      .object({
        source: z.enum(['static', 'supabase']).default('static'),
        file: z.string().optional(),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    const needsSupabase = config.storage.backend === 'supabase' || config.popularPairs.source === 'supabase';
    if (needsSupabase && (!config.storage.supabase.url || !config.storage.supabase.serviceKey)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['storage', 'supabase'],
        message: 'SUPABASE_URL and SUPABASE_SERVICE_KEY are required for the supabase backend',
      });
    }
  });

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_OUTPUT: 'logging.output',
  LOG_FILE: 'logging.filePath',
  STORAGE_BACKEND: 'storage.backend',
  DATABASE_URL: 'storage.databaseUrl',
  CANDLE_TABLE: 'storage.candleTable',
  ANALYSIS_TABLE: 'storage.analysisTable',
  SUPABASE_URL: 'storage.supabase.url',
  SUPABASE_SERVICE_KEY: 'storage.supabase.serviceKey',
  BYBIT_BASE_URL: 'exchange.baseUrl',
  BYBIT_CATEGORY: 'exchange.category',
  EXCHANGE_TIMEOUT_MS: 'exchange.timeoutMs',
  EXCHANGE_MAX_RETRIES: 'exchange.maxRetries',
  PIVOT_PROXIMITY_PCT: 'analysis.proximityPct',
  DEFAULT_DATE_RANGE_DAYS: 'analysis.defaultDateRangeDays',
  REFRESH_ENABLED: 'refresh.enabled',
  REFRESH_TICK_MS: 'refresh.tickMs',
  REFRESH_OVERLAP_MINUTES: 'refresh.overlapMinutes',
  REFRESH_BOOTSTRAP_HOURS: 'refresh.bootstrapHours',
  POPULAR_PAIRS_SOURCE: 'popularPairs.source',
  POPULAR_PAIRS_FILE: 'popularPairs.file',
};
