/**
 * Metrics Routes
 *
 * Concrete metrics: listing with filters, lookup, delete and usage push.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { handleApiError, handleNotFoundError, handleValidationError, jsonAccepted, parseJsonBody } from '../lib/error-handler';
import type { UsageStore } from '../services/usage-store/usage-store';
import type { PartialMetric } from '../types/metric-usage';
import { UsagePushSchema, mapToJSON, metricToJSON, recordToMap, usageFromJSON } from '../types/metric-usage';
import { MetricFilterQuerySchema, filterMetrics, toMetricFilter } from './metrics-filter';

export function createMetricsRouter(store: UsageStore) {
  const router = new Hono();

  /**
   * GET /metrics - Metric map, optionally filtered
   */
  router.get('/', async (c: Context) => {
    const query = MetricFilterQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      const issue = query.error.issues[0];
      return handleValidationError(c, `Invalid query parameter ${issue?.path.join('.') ?? ''}: ${issue?.message ?? ''}`);
    }

    try {
      const filter = toMetricFilter(query.data);
      const partialMetrics = filter.mergePartialMetrics
        ? await store.listPartialMetrics()
        : new Map<string, PartialMetric>();
      const metrics = await store.listMetrics();
      return c.json(mapToJSON(filterMetrics(metrics, partialMetrics, filter), metricToJSON));
    } catch (error) {
      return handleApiError(c, error, 'List metrics');
    }
  });

  /**
   * GET /metrics/:name - One metric
   */
  router.get('/:name', async (c) => {
    const name = c.req.param('name');
    const metric = await store.getMetric(name);
    if (!metric) {
      return handleNotFoundError(c, `Metric ${name}`);
    }
    return c.json(metricToJSON(metric));
  });

  /**
   * DELETE /metrics/:name - Forget a metric
   */
  router.delete('/:name', async (c) => {
    const name = c.req.param('name');
    if (!(await store.deleteMetric(name))) {
      return handleNotFoundError(c, `Metric ${name}`);
    }
    return c.body(null, 204);
  });

  /**
   * POST /metrics - Usage keyed by metric name
   */
  router.post('/', async (c: Context) => {
    const body = await parseJsonBody(c, UsagePushSchema);
    if (!body.ok) return body.response;

    try {
      const usage = recordToMap(body.data, usageFromJSON);
      if (usage.size > 0) {
        await store.enqueueUsage(usage);
      }
      return jsonAccepted(c, usage.size);
    } catch (error) {
      return handleApiError(c, error, 'Push metric usage');
    }
  });

  return router;
}
