import { Hono } from 'hono';
import type { Context } from 'hono';
import { handleApiError } from '../lib/error-handler';
import type { UsageStore } from '../services/usage-store/usage-store';
import { mapToJSON, usageToJSON } from '../types/metric-usage';

/**
 * GET /pending_usages - Usage still waiting for its metric to be discovered
 */
export function createPendingUsagesRouter(store: UsageStore) {
  const router = new Hono();

  router.get('/', async (c: Context) => {
    try {
      return c.json(mapToJSON(await store.listPendingUsage(), usageToJSON));
    } catch (error) {
      return handleApiError(c, error, 'List pending usage');
    }
  });

  return router;
}
