import { Hono } from 'hono';
import type { Context } from 'hono';
import { handleApiError, jsonAccepted, parseJsonBody } from '../lib/error-handler';
import type { UsageStore } from '../services/usage-store/usage-store';
import { LabelsPushSchema, recordToMap } from '../types/metric-usage';

/**
 * POST /labels - Label names per metric
 */
export function createLabelsRouter(store: UsageStore) {
  const router = new Hono();

  router.post('/', async (c: Context) => {
    const body = await parseJsonBody(c, LabelsPushSchema);
    if (!body.ok) return body.response;

    try {
      const labels = recordToMap(body.data, (names) => names);
      if (labels.size > 0) {
        await store.enqueueLabels(labels);
      }
      return jsonAccepted(c, labels.size);
    } catch (error) {
      return handleApiError(c, error, 'Push labels');
    }
  });

  return router;
}
