/**
 * Configuration loading and management
 */

import { configSchema, envMapping, type Config } from './schema.js';
import type { Logger } from '@pivot-suite/logger';

type RawConfig = { [key: string]: unknown };

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load configuration from environment and defaults
 *
 * @throws Error listing every invalid setting
 */
export function loadConfig(logger?: Logger, env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  if (logger) {
    logger.info('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: RawConfig, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }
  current[lastKey] = value;
}

/**
 * Parse environment variable value to appropriate type
 */
export function parseEnvValue(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Log-safe configuration summary: no keys, no connection strings.
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    version: config.app.version,
    storage: {
      backend: config.storage.backend,
      supabase: config.storage.supabase.url ? 'configured' : 'not configured',
    },
    exchange: {
      baseUrl: config.exchange.baseUrl,
      category: config.exchange.category,
      timeoutMs: config.exchange.timeoutMs,
      maxRetries: config.exchange.maxRetries,
    },
    analysis: {
      proximityPct: config.analysis.proximityPct,
      defaultDateRangeDays: config.analysis.defaultDateRangeDays,
      sessions: config.analysis.sessions.map((s) => `${s.name} ${s.startHour}-${s.endHour}`),
    },
    refresh: config.refresh.enabled ? `every ${config.refresh.tickMs}ms` : 'disabled',
    popularPairs: config.popularPairs.source,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      output: config.logging.output,
    },
  };
}

export { configSchema, envMapping } from './schema.js';
export type { Config } from './schema.js';
