/**
 * pivot-suite command line
 *
 * Commands run against a runtime built from the environment. Results go to
 * stdout, logs to stderr (or the log file). Exit codes: 0 on success, 1 when
 * the command failed, 2 on usage errors and rejected requests.
 */

import { parseArgs } from 'node:util';
import { errorMessage } from '@pivot-suite/contracts';
import { attachGlobalHandlers, createLogger, withRequestContext } from '@pivot-suite/logger';
import { getConfigSummary, loadConfig } from './config/index.js';
import type { Config } from './config/index.js';
import { AnalysisFormatter } from './formatters/analysis-formatter.js';
import type { RefreshRunReport } from './jobs/candle-refresh.job.js';
import type { PopularPair } from './pairs/index.js';
import { createRuntime } from './runtime.js';
import type { Runtime, RuntimeOverrides } from './runtime.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  overrides?: RuntimeOverrides;
  /** Install process-wide error handlers on the CLI logger */
  globalHandlers?: boolean;
  /** Resolves when a long-running `refresh` should stop (default: SIGINT or SIGTERM) */
  untilStopped?: () => Promise<void>;
}

const consoleIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

const cliOptions = {
  ticker: { type: 'string', short: 't' },
  timeframe: { type: 'string' },
  days: { type: 'string' },
  weekdays: { type: 'string' },
  json: { type: 'boolean', default: false },
  refresh: { type: 'boolean', default: false },
  once: { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

function parseCliArgs(argv: string[]) {
  return parseArgs({ args: argv, options: cliOptions, allowPositionals: true, strict: true });
}

type ParsedArgs = ReturnType<typeof parseCliArgs>;
type CliValues = ParsedArgs['values'];

class UsageError extends Error {}

export const USAGE = `pivot-suite - pivot analysis for crypto pairs

Usage: pivot-suite <command> [options]

Commands:
  analyze --ticker <symbol>   Analyze P1/P2 pivots for a pair
  refresh [--once]            Refresh candles for the popular pairs
  pairs                       List the popular pairs
  config                      Show the effective configuration
  help                        Show this help message

Analyze options:
  --ticker, -t <symbol>       Pair, e.g. BTCUSDT
  --timeframe <name>          hourly, 4h, session, daily, weekly, monthly (default: daily)
  --days <n>                  Days of history (default: DEFAULT_DATE_RANGE_DAYS or 30)
  --weekdays <list>           Weekdays to score, 0 = Monday ... 6 = Sunday, e.g. 0,4
  --refresh                   Ignore the cached analysis and recompute
  --json                      Print JSON instead of text

Environment Variables:
  STORAGE_BACKEND     sqlite, postgres, supabase or memory
  DATABASE_URL        sqlite:path/to/file.db or postgresql://...
  SUPABASE_URL        Supabase project URL
  SUPABASE_SERVICE_KEY  Supabase service key
  BYBIT_BASE_URL      Bybit API host
  LOG_LEVEL           error, warn, info or debug
  LOG_OUTPUT          console, file or both

Examples:
  pivot-suite analyze -t BTCUSDT
  pivot-suite analyze -t ETHUSDT --timeframe 4h --days 14 --weekdays 0,4 --json
  pivot-suite refresh --once`;

/**
 * Runs one CLI invocation and returns its exit code.
 */
export async function runCli(argv: string[], io: CliIO = consoleIO, deps: CliDeps = {}): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.stderr(`${errorMessage(error)}\n\n${USAGE}`);
    return EXIT_USAGE;
  }
  const { values, positionals } = parsed;

  const command = positionals[0] ?? 'help';
  if (command === 'help' || values.help) {
    io.stdout(USAGE);
    return EXIT_OK;
  }

  let config: Config;
  try {
    config = loadConfig(undefined, deps.env ?? process.env);
  } catch (error) {
    io.stderr(errorMessage(error));
    return EXIT_FAILURE;
  }

  const logger = createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.output === 'console' ? undefined : config.logging.filePath,
    console: config.logging.output !== 'file',
  });
  if (deps.globalHandlers) {
    attachGlobalHandlers(logger);
  }

  if (command === 'config') {
    io.stdout(JSON.stringify(getConfigSummary(config), null, 2));
    return EXIT_OK;
  }

  if (!['analyze', 'refresh', 'pairs'].includes(command)) {
    io.stderr(`Unknown command: ${command}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  let runtime: Runtime;
  try {
    runtime = await createRuntime(config, logger, deps.overrides);
  } catch (error) {
    logger.error('Runtime initialisation failed', { error: errorMessage(error) });
    io.stderr(`Startup failed: ${errorMessage(error)}`);
    return EXIT_FAILURE;
  }

  try {
    return await withRequestContext(
      async () => {
        switch (command) {
          case 'analyze':
            return await analyze(runtime, values, io);
          case 'refresh':
            return await refresh(runtime, values, io, deps);
          default:
            return await listPairs(runtime, values, io);
        }
      },
      undefined,
      { command }
    );
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    logger.error('Command failed', { command, error });
    io.stderr(`Error: ${errorMessage(error)}`);
    return EXIT_FAILURE;
  } finally {
    await runtime.close();
  }
}

function parseWeekdays(list: string | undefined): number[] | undefined {
  if (list === undefined) return undefined;
  return list
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part !== '')
    .map(Number);
}

async function analyze(runtime: Runtime, values: CliValues, io: CliIO): Promise<number> {
  if (!values.ticker) {
    throw new UsageError('analyze requires --ticker');
  }

  const outcome = await runtime.service.analyze(
    {
      ticker: values.ticker,
      timeframe: values.timeframe,
      dateRangeDays: values.days === undefined ? runtime.config.analysis.defaultDateRangeDays : Number(values.days),
      weekdays: parseWeekdays(values.weekdays),
    },
    { forceRefresh: values.refresh }
  );

  if (outcome.status === 'error') {
    if (values.json) {
      io.stdout(JSON.stringify(outcome, null, 2));
    }
    io.stderr(`Error [${outcome.error.code}]: ${outcome.error.message}`);
    return outcome.error.code === 'INVALID_REQUEST' ? EXIT_USAGE : EXIT_FAILURE;
  }

  const formatter = new AnalysisFormatter();
  io.stdout(formatter.format(outcome.result, { format: values.json ? 'json' : 'text', cache: outcome.cache }));
  return EXIT_OK;
}

function formatRefreshReport(report: RefreshRunReport): string {
  const lines = [
    `Refresh: ${report.pairs.length} due, ${report.succeeded} succeeded, ${report.failed} failed`,
  ];
  for (const pair of report.pairs) {
    const detail = pair.error ?? `rows ${pair.rowsWritten}, warmed ${pair.warmed}`;
    lines.push(`  ${pair.ticker.padEnd(12)} ${pair.status.padEnd(8)} ${detail}`);
  }
  return lines.join('\n');
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
}

async function refresh(runtime: Runtime, values: CliValues, io: CliIO, deps: CliDeps): Promise<number> {
  if (values.once) {
    const report = await runtime.job.runOnce();
    io.stdout(values.json ? JSON.stringify(report, null, 2) : formatRefreshReport(report));
    return report.failed > 0 ? EXIT_FAILURE : EXIT_OK;
  }

  runtime.job.start();
  await (deps.untilStopped ?? waitForSignal)();
  runtime.logger.info('Refresh stopping');
  return EXIT_OK;
}

function formatPairs(pairs: PopularPair[]): string {
  const lines = [`${'Ticker'.padEnd(12)} ${'Priority'.padEnd(9)} ${'Every'.padEnd(7)} ${'Auto'.padEnd(5)} Last fetched`];
  for (const pair of pairs) {
    const lastFetched = pair.lastFetched === null ? 'never' : new Date(pair.lastFetched).toISOString();
    lines.push(
      `${pair.ticker.padEnd(12)} ${String(pair.priority).padEnd(9)} ` +
        `${`${pair.updateIntervalMinutes}m`.padEnd(7)} ${(pair.autoUpdate ? 'yes' : 'no').padEnd(5)} ${lastFetched}`
    );
  }
  return lines.join('\n');
}

async function listPairs(runtime: Runtime, values: CliValues, io: CliIO): Promise<number> {
  const pairs = await runtime.pairs.list();
  io.stdout(values.json ? JSON.stringify(pairs, null, 2) : formatPairs(pairs));
  return EXIT_OK;
}
