/**
 * Configuration Parser
 *
 * Reads the service settings from the environment (a `.env` file is loaded
 * by dotenv in server.ts), validates them with zod and caches the result.
 * Empty strings count as unset.
 */

import * as z from 'zod';
import { EXPRESSION_ENGINES } from '../services/analyzer/expression-types';
import type { ExpressionEngine } from '../services/analyzer/expression-types';

// ============================================================================
// 1. Schema
// ============================================================================

const emptyAsUnset = (value: unknown) => (value === '' ? undefined : value);

const booleanFlag = z.preprocess(
  emptyAsUnset,
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? undefined : value === 'true' || value === '1'))
);

const optionalString = z.preprocess(emptyAsUnset, z.string().optional());

const EnvSchema = z.object({
  PORT: z.preprocess(emptyAsUnset, z.coerce.number().int().min(1).max(65535).default(8080)),
  METRICS_USAGE_API_KEY: optionalString,
  METRICS_USAGE_DATABASE_IN_MEMORY: booleanFlag,
  METRICS_USAGE_DATABASE_PATH: z.preprocess(emptyAsUnset, z.string().default('./metrics_usage.json')),
  METRICS_USAGE_DATABASE_FLUSH_PERIOD_SECONDS: z.preprocess(
    emptyAsUnset,
    z.coerce.number().int().positive().default(300)
  ),
  METRICS_USAGE_DATABASE_THRESHOLD: z.preprocess(emptyAsUnset, z.coerce.number().int().min(1).max(255).default(3)),
  METRICS_USAGE_DATABASE_PENDING_USAGE_THRESHOLD: z.preprocess(
    emptyAsUnset,
    z.coerce.number().int().min(0).default(0)
  ),
  METRICS_USAGE_EXPRESSION_ENGINE: z.preprocess(emptyAsUnset, z.enum(EXPRESSION_ENGINES).default('promql')),
  METRICS_USAGE_REMOTE_URL: z.preprocess(emptyAsUnset, z.url().optional()),
  METRICS_USAGE_REMOTE_API_KEY: optionalString,
  METRICS_USAGE_REMOTE_TIMEOUT_MS: z.preprocess(emptyAsUnset, z.coerce.number().int().positive().default(10_000)),
});

// ============================================================================
// 2. Config
// ============================================================================

export interface ServiceConfig {
  port: number;
  apiKey: string | null;
  database: {
    inMemory: boolean;
    path: string;
    flushPeriodMs: number;
    threshold: number;
    pendingUsageThreshold: number;
  };
  expressionEngine: ExpressionEngine;
  remote: {
    url: string;
    apiKey: string | null;
    timeoutMs: number;
  } | null;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

let cachedConfig: ServiceConfig | null = null;

/**
 * @throws ConfigError listing every invalid variable
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    apiKey: vars.METRICS_USAGE_API_KEY ?? null,
    database: {
      inMemory: vars.METRICS_USAGE_DATABASE_IN_MEMORY ?? true,
      path: vars.METRICS_USAGE_DATABASE_PATH,
      flushPeriodMs: vars.METRICS_USAGE_DATABASE_FLUSH_PERIOD_SECONDS * 1000,
      threshold: vars.METRICS_USAGE_DATABASE_THRESHOLD,
      pendingUsageThreshold: vars.METRICS_USAGE_DATABASE_PENDING_USAGE_THRESHOLD,
    },
    expressionEngine: vars.METRICS_USAGE_EXPRESSION_ENGINE,
    remote: vars.METRICS_USAGE_REMOTE_URL
      ? {
          url: vars.METRICS_USAGE_REMOTE_URL,
          apiKey: vars.METRICS_USAGE_REMOTE_API_KEY ?? null,
          timeoutMs: vars.METRICS_USAGE_REMOTE_TIMEOUT_MS,
        }
      : null,
  };
}

export function getConfig(): ServiceConfig {
  if (!cachedConfig) {
    cachedConfig = parseConfig();
  }
  return cachedConfig;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Summary for the startup log; secrets are reported as set / unset only.
 */
export function getConfigStatus(): Record<string, string | number | boolean> {
  const config = getConfig();
  return {
    port: config.port,
    apiKey: config.apiKey !== null,
    persistence: config.database.inMemory ? 'memory' : config.database.path,
    flushPeriodMs: config.database.flushPeriodMs,
    threshold: config.database.threshold,
    pendingUsageThreshold: config.database.pendingUsageThreshold,
    expressionEngine: config.expressionEngine,
    remote: config.remote?.url ?? 'none',
  };
}
