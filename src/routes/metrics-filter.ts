/**
 * Query filters of GET /metrics.
 */

import * as z from 'zod';
import type { Metric, PartialMetric } from '../types/metric-usage';
import { mergeUsage } from '../services/usage-store/usage-merge';

export const MATCH_MODES = ['exact', 'fuzzy', 'regex'] as const;

export type MatchMode = (typeof MATCH_MODES)[number];

const booleanQuery = z.enum(['true', 'false']).transform((value) => value === 'true');

export const MetricFilterQuerySchema = z.object({
  metric_name: z.string().optional(),
  mode: z.enum(MATCH_MODES).default('fuzzy'),
  used: booleanQuery.optional(),
  merge_partial_metrics: booleanQuery.optional(),
});

export interface MetricFilter {
  metricName?: string;
  mode: MatchMode;
  /** true: only metrics with usage, false: only metrics without */
  used?: boolean;
  mergePartialMetrics: boolean;
}

export function toMetricFilter(query: z.output<typeof MetricFilterQuerySchema>): MetricFilter {
  return {
    metricName: query.metric_name || undefined,
    mode: query.mode,
    used: query.used,
    mergePartialMetrics: query.merge_partial_metrics ?? false,
  };
}

/**
 * Every character of `needle` appears in `haystack`, in order.
 */
export function fuzzyMatch(needle: string, haystack: string): boolean {
  let from = 0;
  for (const ch of needle) {
    const at = haystack.indexOf(ch, from);
    if (at === -1) return false;
    from = at + ch.length;
  }
  return true;
}

function createNameMatcher(mode: MatchMode, filter: string): (metricName: string) => boolean {
  switch (mode) {
    case 'exact':
      return (metricName) => metricName === filter;
    case 'fuzzy':
      return (metricName) => fuzzyMatch(filter, metricName);
    case 'regex': {
      let pattern: RegExp;
      try {
        pattern = new RegExp(filter);
      } catch {
        // An invalid expression matches nothing
        return () => false;
      }
      return (metricName) => pattern.test(metricName);
    }
  }
}

export function isMetricMatching(metricName: string, mode: MatchMode, filter: string): boolean {
  return createNameMatcher(mode, filter)(metricName);
}

/**
 * Applies the filter to a copy of the store. `metrics` is modified in
 * place when partial usage is merged, so it must be a copy.
 */
export function filterMetrics(
  metrics: Map<string, Metric>,
  partialMetrics: ReadonlyMap<string, PartialMetric>,
  filter: MetricFilter
): Map<string, Metric> {
  if (filter.mergePartialMetrics) {
    for (const partial of partialMetrics.values()) {
      for (const name of partial.matchingMetrics) {
        const metric = metrics.get(name);
        if (metric) {
          metric.usage = mergeUsage(metric.usage, partial.usage);
        }
      }
    }
  }

  if (!filter.metricName && filter.used === undefined) {
    return metrics;
  }

  const matches = filter.metricName ? createNameMatcher(filter.mode, filter.metricName) : () => true;
  const result = new Map<string, Metric>();
  for (const [name, metric] of metrics) {
    if (!matches(name)) continue;
    if (filter.used !== undefined && filter.used !== (metric.usage !== null)) continue;
    result.set(name, metric);
  }
  return result;
}
