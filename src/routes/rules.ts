/**
 * Rules Routes
 *
 * Accepts Prometheus rule groups, extracts the metrics each rule reads and
 * hands the resulting usage to the sink.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { handleApiError, parseJsonBody } from '../lib/error-handler';
import { logger } from '../lib/logger';
import type { ExpressionAnalyzer } from '../services/analyzer/expression-types';
import { RulesPushSchema, analyzeRuleGroups } from '../services/rules/rule-usage';
import type { UsageSink } from '../services/usage-client/usage-sink';

export function createRulesRouter(usageSink: UsageSink, analyzer: ExpressionAnalyzer) {
  const router = new Hono();

  /**
   * POST /rules - `{ source, groups }`
   */
  router.post('/', async (c: Context) => {
    const body = await parseJsonBody(c, RulesPushSchema);
    if (!body.ok) return body.response;

    try {
      const { source, groups } = body.data;
      const { usage, partialUsage, errors } = analyzeRuleGroups(groups, source, analyzer);

      for (const error of errors) {
        logger.warn({ source, group: error.groupName, rule: error.ruleName }, `[Rules] ${error.message}`);
      }

      await usageSink.sendUsage(usage);
      await usageSink.sendPartialUsage(partialUsage);

      return c.json(
        {
          success: true,
          metrics: usage.size,
          partialMetrics: partialUsage.size,
          errors: errors.map((error) => error.message),
          timestamp: new Date().toISOString(),
        },
        202
      );
    } catch (error) {
      return handleApiError(c, error, 'Analyze rules');
    }
  });

  return router;
}
