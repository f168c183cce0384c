/**
 * Rule Group Usage
 *
 * Turns Prometheus rule groups (the `data.groups` shape of `/api/v1/rules`)
 * into usage facts: every metric a rule reads gets a RuleUsage entry in
 * `recordingRules` or `alertRules`.
 */

import * as z from 'zod';
import type { ExpressionAnalysis, ExpressionAnalyzer } from '../analyzer/expression-types';
import type { MetricUsage, RuleUsage } from '../../types/metric-usage';
import { createUsage } from '../../types/metric-usage';

// ============================================================================
// 1. Schemas
// ============================================================================

const RuleBaseSchema = z.object({
  name: z.string().min(1),
  query: z.string(),
});

export const RuleDefinitionSchema = z.discriminatedUnion('type', [
  RuleBaseSchema.extend({ type: z.literal('recording') }),
  RuleBaseSchema.extend({ type: z.literal('alerting') }),
]);

export const RuleGroupSchema = z.object({
  name: z.string(),
  rules: z.array(RuleDefinitionSchema),
});

/** Body of POST /rules */
export const RulesPushSchema = z.object({
  /** Where the rules were read from, e.g. the Prometheus URL */
  source: z.string().min(1),
  groups: z.array(RuleGroupSchema),
});

export type RuleDefinition = z.infer<typeof RuleDefinitionSchema>;
export type RuleGroup = z.infer<typeof RuleGroupSchema>;

export interface RuleAnalysisError {
  groupName: string;
  ruleName: string;
  message: string;
}

export interface RuleAnalysis {
  usage: Map<string, MetricUsage>;
  partialUsage: Map<string, MetricUsage>;
  errors: RuleAnalysisError[];
}

// ============================================================================
// 2. Analysis
// ============================================================================

export function analyzeRuleGroups(
  groups: readonly RuleGroup[],
  source: string,
  analyzer: ExpressionAnalyzer
): RuleAnalysis {
  const result: RuleAnalysis = { usage: new Map(), partialUsage: new Map(), errors: [] };

  for (const group of groups) {
    for (const rule of group.rules) {
      let analysis: ExpressionAnalysis;
      try {
        analysis = analyzer.analyze(rule.query);
      } catch (error) {
        result.errors.push({
          groupName: group.name,
          ruleName: rule.name,
          message: `Failed to extract metric names for the ${rule.type} rule "${rule.name}" of the group "${group.name}": ${
            error instanceof Error ? error.message : String(error)
          }`,
        });
        continue;
      }

      const item: RuleUsage = {
        promLink: source,
        groupName: group.name,
        name: rule.name,
        expression: rule.query,
      };
      addRuleUsage(result.usage, analysis.metricNames, rule, item);
      addRuleUsage(result.partialUsage, analysis.partialMetricNames, rule, item);
    }
  }

  return result;
}

function addRuleUsage(
  target: Map<string, MetricUsage>,
  names: Iterable<string>,
  rule: RuleDefinition,
  item: RuleUsage
): void {
  for (const name of names) {
    let usage = target.get(name);
    if (!usage) {
      usage = createUsage();
      target.set(name, usage);
    }
    switch (rule.type) {
      case 'recording':
        usage.recordingRules.add(item);
        break;
      case 'alerting':
        usage.alertRules.add(item);
        break;
    }
  }
}
