/**
 * CLI tests against the in-memory backend and a stub exchange
 */

import { describe, it, expect } from 'vitest';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, USAGE, runCli } from '../src/cli.js';
import type { CliDeps, CliIO } from '../src/cli.js';
import { StaticPairSource } from '../src/pairs/index.js';
import { DAY, HOUR, T0, at, stubFetcher } from './fixtures.js';

const ENV = { STORAGE_BACKEND: 'memory', LOG_OUTPUT: 'file' };

function captureIO() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const io: CliIO = {
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text),
  };
  return { io, stdout, stderr };
}

function deps(now: number, overrides: Partial<CliDeps> = {}): CliDeps {
  const { fetcher } = stubFetcher();
  return { env: ENV, overrides: { fetcher, now: () => now }, ...overrides };
}

describe('runCli', () => {
  it('should print usage for help and for no command', async () => {
    for (const argv of [['help'], [], ['--help']]) {
      const { io, stdout } = captureIO();

      expect(await runCli(argv, io, deps(T0))).toBe(EXIT_OK);
      expect(stdout).toEqual([USAGE]);
    }
  });

  it('should reject unknown options', async () => {
    const { io, stderr } = captureIO();

    expect(await runCli(['analyze', '--bogus'], io, deps(T0))).toBe(EXIT_USAGE);
    expect(at(stderr, 0)).toContain("Unknown option '--bogus'");
  });

  it('should reject unknown commands', async () => {
    const { io, stderr } = captureIO();

    expect(await runCli(['frobnicate'], io, deps(T0))).toBe(EXIT_USAGE);
    expect(at(stderr, 0)).toMatch(/^Unknown command: frobnicate\n/);
  });

  it('should fail on invalid configuration', async () => {
    const { io, stderr } = captureIO();

    const code = await runCli(['config'], io, { env: { ...ENV, LOG_LEVEL: 'verbose' } });

    expect(code).toBe(EXIT_FAILURE);
    expect(at(stderr, 0)).toMatch(/^Configuration validation failed:\n/);
  });

  it('should print the configuration summary without secrets', async () => {
    const { io, stdout } = captureIO();
    const env = { ...ENV, SUPABASE_URL: 'https://example.supabase.co', SUPABASE_SERVICE_KEY: 'test-secret' };

    expect(await runCli(['config'], io, { env })).toBe(EXIT_OK);
    expect(at(stdout, 0)).not.toContain('test-secret');
    expect(JSON.parse(at(stdout, 0)).storage).toEqual({ backend: 'memory', supabase: 'configured' });
  });

  it('should analyze a ticker as JSON', async () => {
    const { io, stdout } = captureIO();

    const code = await runCli(['analyze', '-t', 'btcusdt', '--days', '10', '--json'], io, deps(T0 + 10 * DAY));

    expect(code).toBe(EXIT_OK);
    const output = JSON.parse(at(stdout, 0));
    expect(output.cache).toBe('miss');
    expect(output.result.ticker).toBe('BTCUSDT');
    expect(output.result.dateRangeDays).toBe(10);
    expect(output.result.candleCount).toBe(960);
    expect(output.result.pivotTable).toHaveLength(10);
  });

  it('should analyze a ticker as text', async () => {
    const { io, stdout } = captureIO();

    const code = await runCli(
      ['analyze', '--ticker', 'ETHUSDT', '--days', '10', '--weekdays', '0,4'],
      io,
      deps(T0 + 10 * DAY)
    );

    expect(code).toBe(EXIT_OK);
    const lines = at(stdout, 0).split('\n');
    expect(lines[0]).toBe('Pivot Analysis: ETHUSDT Daily (10 days, Mon, Fri)');
    expect(lines).toContain('Cache: miss');
  });

  it('should require a ticker', async () => {
    const { io, stderr } = captureIO();

    expect(await runCli(['analyze'], io, deps(T0))).toBe(EXIT_USAGE);
    expect(at(stderr, 0)).toMatch(/^analyze requires --ticker\n/);
  });

  it('should exit with a usage code for rejected requests', async () => {
    const { io, stderr } = captureIO();

    expect(await runCli(['analyze', '-t', 'BTCUSDT', '--days', '0'], io, deps(T0))).toBe(EXIT_USAGE);
    expect(at(stderr, 0)).toMatch(/^Error \[INVALID_REQUEST\]: Invalid analysis request: dateRangeDays: /);
  });

  it('should exit with a failure code when the analysis fails', async () => {
    const { io, stderr } = captureIO();
    const { fetcher } = stubFetcher(() => new Error('socket hang up'));

    const code = await runCli(['analyze', '-t', 'BTCUSDT', '--days', '10'], io, {
      env: ENV,
      overrides: { fetcher, now: () => T0 + 10 * DAY },
    });

    expect(code).toBe(EXIT_FAILURE);
    expect(stderr).toEqual(['Error [FETCH_FAILED]: Exchange fetch failed: socket hang up']);
  });

  it('should list the bundled popular pairs', async () => {
    const { io, stdout } = captureIO();

    expect(await runCli(['pairs', '--json'], io, deps(T0))).toBe(EXIT_OK);
    const pairs = JSON.parse(at(stdout, 0));
    expect(pairs).toHaveLength(15);
    expect(pairs[0]).toEqual({
      ticker: 'BTCUSDT',
      priority: 1,
      autoUpdate: true,
      updateIntervalMinutes: 15,
      lastFetched: null,
    });
  });

  it('should print the pairs as a table', async () => {
    const { io, stdout } = captureIO();

    expect(await runCli(['pairs'], io, deps(T0))).toBe(EXIT_OK);
    const lines = at(stdout, 0).split('\n');
    expect(lines).toHaveLength(16);
    expect(lines[1]).toBe(`${'BTCUSDT'.padEnd(12)} ${'1'.padEnd(9)} ${'15m'.padEnd(7)} ${'yes'.padEnd(5)} never`);
  });

  it('should refresh the popular pairs once', async () => {
    const { io, stdout } = captureIO();
    const pairs = new StaticPairSource([
      { ticker: 'BTCUSDT', priority: 1, autoUpdate: true, updateIntervalMinutes: 15 },
    ]);
    const { fetcher } = stubFetcher();
    const now = T0 + 10 * HOUR + 7 * 60_000;

    const code = await runCli(['refresh', '--once'], io, {
      env: ENV,
      overrides: { fetcher, pairs, now: () => now },
    });

    expect(code).toBe(EXIT_OK);
    expect(at(stdout, 0).split('\n')).toEqual([
      'Refresh: 1 due, 1 succeeded, 0 failed',
      `  ${'BTCUSDT'.padEnd(12)} ${'ok'.padEnd(8)} rows 8, warmed 1`,
    ]);
  });

  it('should run the refresh job until stopped', async () => {
    const { io } = captureIO();
    const pairs = new StaticPairSource([
      { ticker: 'BTCUSDT', priority: 1, autoUpdate: true, updateIntervalMinutes: 15 },
    ]);
    const { fetcher, fetch } = stubFetcher();

    const code = await runCli(['refresh'], io, {
      env: ENV,
      overrides: { fetcher, pairs, now: () => T0 + 10 * HOUR },
      untilStopped: async () => {},
    });

    expect(code).toBe(EXIT_OK);
    expect(fetch).toHaveBeenCalled();
  });
});
