import type { Metric, MetricUsage, PartialMetric } from '../../types/metric-usage';

/**
 * Facet-wise union of two usage records.
 *
 * A missing side returns the other one as-is. Otherwise a new record is
 * built and neither input is modified, so merging is commutative,
 * associative and idempotent.
 */
export function mergeUsage(
  a: MetricUsage | null | undefined,
  b: MetricUsage | null | undefined
): MetricUsage | null {
  if (!a) return b ?? null;
  if (!b) return a;
  return {
    dashboards: a.dashboards.union(b.dashboards),
    recordingRules: a.recordingRules.union(b.recordingRules),
    alertRules: a.alertRules.union(b.alertRules),
  };
}

export function cloneUsage(usage: MetricUsage): MetricUsage {
  return {
    dashboards: usage.dashboards.clone((d) => ({ ...d })),
    recordingRules: usage.recordingRules.clone((r) => ({ ...r })),
    alertRules: usage.alertRules.clone((r) => ({ ...r })),
  };
}

export function cloneMetric(metric: Metric): Metric {
  return {
    labels: new Set(metric.labels),
    usage: metric.usage ? cloneUsage(metric.usage) : null,
  };
}

export function clonePartialMetric(partial: PartialMetric): PartialMetric {
  return {
    usage: partial.usage ? cloneUsage(partial.usage) : null,
    // RegExp without the g flag carries no mutable state
    matchingRegexp: partial.matchingRegexp,
    matchingMetrics: new Set(partial.matchingMetrics),
  };
}

export function cloneMap<V>(source: ReadonlyMap<string, V>, cloneValue: (value: V) => V): Map<string, V> {
  const result = new Map<string, V>();
  for (const [key, value] of source) {
    result.set(key, cloneValue(value));
  }
  return result;
}
