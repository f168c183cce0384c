/**
 * Partial Metrics Routes
 *
 * Usage keyed by metric name patterns. Also mounted under the legacy
 * `/invalid_metrics` path.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { handleApiError, jsonAccepted, parseJsonBody } from '../lib/error-handler';
import type { UsageStore } from '../services/usage-store/usage-store';
import { UsagePushSchema, mapToJSON, partialMetricToJSON, recordToMap, usageFromJSON } from '../types/metric-usage';

export function createPartialMetricsRouter(store: UsageStore) {
  const router = new Hono();

  router.get('/', async (c: Context) => {
    try {
      return c.json(mapToJSON(await store.listPartialMetrics(), partialMetricToJSON));
    } catch (error) {
      return handleApiError(c, error, 'List partial metrics');
    }
  });

  router.post('/', async (c: Context) => {
    const body = await parseJsonBody(c, UsagePushSchema);
    if (!body.ok) return body.response;

    try {
      const usage = recordToMap(body.data, usageFromJSON);
      if (usage.size > 0) {
        await store.enqueuePartialUsage(usage);
      }
      return jsonAccepted(c, usage.size);
    } catch (error) {
      return handleApiError(c, error, 'Push partial metric usage');
    }
  });

  return router;
}
