/**
 * Main exports for @pivot-suite/app package
 */

// Configuration exports
export { loadConfig, getConfigSummary, parseEnvValue, configSchema, envMapping } from './config/index.js';
export type { Config } from './config/index.js';

// Audit sinks
export { AsyncAuditSink, LoggerAuditSink, SqlAuditSink, SupabaseAuditSink, UPDATE_TYPES } from './audit/index.js';

// Popular pairs
export {
  DEFAULT_POPULAR_PAIRS_FILE,
  StaticPairSource,
  SupabasePairSource,
  byPriority,
  isDue,
  loadPopularPairs,
  popularPairConfigSchema,
} from './pairs/index.js';
export type { PopularPair, PopularPairConfig, PopularPairSource } from './pairs/index.js';

// Service and job
export { PivotAnalysisService, toAnalysisFailure } from './services/pivot-analysis.service.js';
export type {
  AnalysisFailure,
  AnalysisOutcome,
  AnalyzeOptions,
  PivotAnalysisServiceOptions,
} from './services/pivot-analysis.service.js';
export { CandleRefreshJob, SUMMARY_TICKER } from './jobs/candle-refresh.job.js';
export type {
  AnalysisWarmer,
  CandleRefreshJobOptions,
  PairRefreshReport,
  PairRefreshStatus,
  RefreshRunReport,
  WarmPreset,
} from './jobs/candle-refresh.job.js';

// Runtime and CLI
export { createRuntime } from './runtime.js';
export type { FlushableAuditSink, Runtime, RuntimeOverrides } from './runtime.js';
export { AnalysisFormatter } from './formatters/analysis-formatter.js';
export type { FormatOptions, OutputFormat } from './formatters/analysis-formatter.js';
export { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, USAGE, runCli } from './cli.js';
export type { CliDeps, CliIO } from './cli.js';
