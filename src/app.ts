/**
 * HTTP application
 *
 * Built by a factory so tests can drive it through `app.request()` with
 * their own store.
 */

import { timingSafeEqual } from 'node:crypto';
import { Hono } from 'hono';
import type { Context, Next } from 'hono';
import { logger as honoLogger } from 'hono/logger';
import { version as APP_VERSION } from '../package.json';
import { handleNotFoundError, handleUnauthorizedError } from './lib/error-handler';
import { logger } from './lib/logger';
import { createLabelsRouter } from './routes/labels';
import { createMetricsRouter } from './routes/metrics';
import { createPartialMetricsRouter } from './routes/partial-metrics';
import { createPendingUsagesRouter } from './routes/pending-usages';
import { createRulesRouter } from './routes/rules';
import type { ExpressionAnalyzer } from './services/analyzer/expression-types';
import type { UsageSink } from './services/usage-client/usage-sink';
import type { UsageStore } from './services/usage-store/usage-store';

export interface AppDependencies {
  store: UsageStore;
  usageSink: UsageSink;
  analyzer: ExpressionAnalyzer;
  /** Required on every write under /api when set */
  apiKey: string | null;
}

/** Timing-safe API key comparison */
function verifyApiKey(provided: string | undefined, expected: string): boolean {
  if (!provided || provided.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(Buffer.from(provided), Buffer.from(expected));
}

export function createApp({ store, usageSink, analyzer, apiKey }: AppDependencies) {
  const app = new Hono();

  // ============================================================================
  // Middleware
  // ============================================================================

  app.use('*', honoLogger((message) => logger.debug(message)));

  // Reads stay open; writes need the key when one is configured
  app.use('/api/*', async (c: Context, next: Next) => {
    if (apiKey && c.req.method !== 'GET' && !verifyApiKey(c.req.header('X-API-Key'), apiKey)) {
      return handleUnauthorizedError(c);
    }
    await next();
  });

  app.onError((err: Error, c: Context) => {
    logger.error({ err, url: c.req.url, method: c.req.method }, 'Unhandled error');

    return c.json(
      {
        success: false,
        error: err.message,
        code: 'INTERNAL_ERROR',
        timestamp: new Date().toISOString(),
      },
      500
    );
  });

  app.notFound((c: Context) => handleNotFoundError(c, `Route ${c.req.method} ${c.req.path}`));

  // ============================================================================
  // Core Endpoints (Non-API)
  // ============================================================================

  /**
   * GET /health - Liveness plus store statistics
   */
  app.get('/health', (c: Context) =>
    c.json({
      status: 'ok',
      service: 'metrics-usage',
      version: APP_VERSION,
      engine: analyzer.engine,
      sink: usageSink.target,
      store: store.getStats(),
      timestamp: new Date().toISOString(),
    })
  );

  /**
   * GET /ready - 503 once the store stopped draining its queues
   */
  app.get('/ready', (c: Context) =>
    store.isRunning
      ? c.json({ status: 'ready', timestamp: new Date().toISOString() })
      : c.json({ status: 'stopping', timestamp: new Date().toISOString() }, 503)
  );

  // ============================================================================
  // API Routes
  // ============================================================================

  const partialMetricsRouter = createPartialMetricsRouter(store);

  app.route('/api/v1/metrics', createMetricsRouter(store));
  app.route('/api/v1/partial_metrics', partialMetricsRouter);
  app.route('/api/v1/invalid_metrics', partialMetricsRouter);
  app.route('/api/v1/pending_usages', createPendingUsagesRouter(store));
  app.route('/api/v1/labels', createLabelsRouter(store));
  app.route('/api/v1/rules', createRulesRouter(usageSink, analyzer));

  return app;
}
