/**
 * Metrics Usage Server
 *
 * Wires configuration, the usage store, snapshot persistence and the HTTP
 * app together, then listens.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './app';
import { ConfigError, getConfig, getConfigStatus } from './lib/config-parser';
import type { ServiceConfig } from './lib/config-parser';
import { logger } from './lib/logger';
import { registerGracefulShutdownHandlers } from './server-shutdown';
import { createExpressionAnalyzer } from './services/analyzer/expression-analyzer';
import { MetricUsageClient } from './services/usage-client/metric-usage-client';
import { createUsageSink } from './services/usage-client/usage-sink';
import { loadMetricsSnapshot, setupSnapshotFlush } from './services/usage-store/metrics-snapshot';
import { UsageStore } from './services/usage-store/usage-store';

function loadConfig(): ServiceConfig {
  try {
    return getConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, 'Invalid configuration');
    } else {
      logger.fatal({ err: error }, 'Failed to read configuration');
    }
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  logger.info({ config: getConfigStatus() }, 'Metrics usage server starting');

  // ============================================================================
  // Store
  // ============================================================================

  const persistent = !config.database.inMemory;
  const initialMetrics = persistent ? await loadMetricsSnapshot(config.database.path) : undefined;

  const store = new UsageStore({
    threshold: config.database.threshold,
    pendingUsageThreshold: config.database.pendingUsageThreshold,
    initialMetrics,
  });

  const snapshot = persistent
    ? setupSnapshotFlush(store, { path: config.database.path, flushPeriodMs: config.database.flushPeriodMs })
    : null;

  // ============================================================================
  // Analysis & sink
  // ============================================================================

  const analyzer = createExpressionAnalyzer(config.expressionEngine);
  const client = config.remote
    ? new MetricUsageClient({
        baseUrl: config.remote.url,
        apiKey: config.remote.apiKey ?? undefined,
        timeoutMs: config.remote.timeoutMs,
      })
    : null;
  const usageSink = createUsageSink(store, client);

  // ============================================================================
  // Server Start
  // ============================================================================

  const app = createApp({ store, usageSink, analyzer, apiKey: config.apiKey });

  const server = serve(
    {
      fetch: app.fetch,
      port: config.port,
      hostname: '0.0.0.0',
    },
    (info: { address: string; port: number }) => {
      logger.info({ address: info.address, port: info.port }, 'Server listening');
    }
  );

  registerGracefulShutdownHandlers({
    store,
    snapshot,
    closeServer: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error?: Error) => (error ? reject(error) : resolve()));
      }),
  });
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
