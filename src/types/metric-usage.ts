/**
 * Metric Usage Data Model
 *
 * In-memory shapes of the usage store plus the zod schemas and
 * (de)serializers for the JSON wire format shared by the HTTP API,
 * the peer client and the snapshot file.
 */

import * as z from 'zod';
import { ValueSet } from '../lib/value-set';

// ============================================================================
// 1. In-memory model
// ============================================================================

export interface DashboardUsage {
  id: string;
  name: string;
  url: string;
}

export interface RuleUsage {
  promLink: string;
  groupName: string;
  name: string;
  expression: string;
}

export interface MetricUsage {
  dashboards: ValueSet<DashboardUsage>;
  recordingRules: ValueSet<RuleUsage>;
  alertRules: ValueSet<RuleUsage>;
}

export interface Metric {
  labels: Set<string>;
  usage: MetricUsage | null;
}

export interface PartialMetric {
  usage: MetricUsage | null;
  /** Anchored pattern; null when the partial name cannot narrow anything down */
  matchingRegexp: RegExp | null;
  matchingMetrics: Set<string>;
}

export function dashboardSet(values: Iterable<DashboardUsage> = []): ValueSet<DashboardUsage> {
  return new ValueSet((d) => JSON.stringify([d.id, d.name, d.url]), values);
}

export function ruleSet(values: Iterable<RuleUsage> = []): ValueSet<RuleUsage> {
  return new ValueSet(
    (r) => JSON.stringify([r.promLink, r.groupName, r.name, r.expression]),
    values
  );
}

export function createUsage(init: {
  dashboards?: Iterable<DashboardUsage>;
  recordingRules?: Iterable<RuleUsage>;
  alertRules?: Iterable<RuleUsage>;
} = {}): MetricUsage {
  return {
    dashboards: dashboardSet(init.dashboards),
    recordingRules: ruleSet(init.recordingRules),
    alertRules: ruleSet(init.alertRules),
  };
}

// ============================================================================
// 2. Wire schemas
// ============================================================================

export const DashboardUsageSchema = z.object({
  id: z.string(),
  name: z.string().default(''),
  url: z.string().default(''),
});

export const RuleUsageSchema = z.object({
  prom_link: z.string().default(''),
  group_name: z.string().default(''),
  name: z.string().default(''),
  expression: z.string().default(''),
});

export const MetricUsageSchema = z.object({
  dashboards: z.array(DashboardUsageSchema).optional(),
  recordingRules: z.array(RuleUsageSchema).optional(),
  alertRules: z.array(RuleUsageSchema).optional(),
});

export const MetricSchema = z.object({
  labels: z.array(z.string()).optional(),
  usage: MetricUsageSchema.nullable().optional(),
});

/** Body of POST /metrics and POST /partial_metrics */
export const UsagePushSchema = z.record(z.string(), MetricUsageSchema);

/** Body of POST /labels */
export const LabelsPushSchema = z.record(z.string(), z.array(z.string()));

/** Snapshot file, same shape as GET /metrics */
export const MetricMapSchema = z.record(z.string(), MetricSchema);

export type RuleUsageJSON = z.infer<typeof RuleUsageSchema>;
export type MetricUsageJSON = z.infer<typeof MetricUsageSchema>;
export type MetricJSON = z.infer<typeof MetricSchema>;

export interface PartialMetricJSON {
  usage?: MetricUsageJSON;
  matchingMetrics?: string[];
  matchingRegexp?: string;
}

// ============================================================================
// 3. Conversions
// ============================================================================

function ruleFromJSON(rule: RuleUsageJSON): RuleUsage {
  return {
    promLink: rule.prom_link,
    groupName: rule.group_name,
    name: rule.name,
    expression: rule.expression,
  };
}

function ruleToJSON(rule: RuleUsage): RuleUsageJSON {
  return {
    prom_link: rule.promLink,
    group_name: rule.groupName,
    name: rule.name,
    expression: rule.expression,
  };
}

export function usageFromJSON(json: MetricUsageJSON): MetricUsage {
  return createUsage({
    dashboards: json.dashboards?.map((d) => ({ id: d.id, name: d.name, url: d.url })),
    recordingRules: json.recordingRules?.map(ruleFromJSON),
    alertRules: json.alertRules?.map(ruleFromJSON),
  });
}

/** Empty facets are omitted. */
export function usageToJSON(usage: MetricUsage): MetricUsageJSON {
  const json: MetricUsageJSON = {};
  if (usage.dashboards.size > 0) {
    json.dashboards = usage.dashboards.sortedValues().map((d) => ({ ...d }));
  }
  if (usage.recordingRules.size > 0) {
    json.recordingRules = usage.recordingRules.sortedValues().map(ruleToJSON);
  }
  if (usage.alertRules.size > 0) {
    json.alertRules = usage.alertRules.sortedValues().map(ruleToJSON);
  }
  return json;
}

export function metricFromJSON(json: MetricJSON): Metric {
  return {
    labels: new Set(json.labels ?? []),
    usage: json.usage ? usageFromJSON(json.usage) : null,
  };
}

export function metricToJSON(metric: Metric): MetricJSON {
  const json: MetricJSON = {};
  if (metric.labels.size > 0) {
    json.labels = [...metric.labels].sort();
  }
  if (metric.usage) {
    json.usage = usageToJSON(metric.usage);
  }
  return json;
}

export function partialMetricToJSON(partial: PartialMetric): PartialMetricJSON {
  const json: PartialMetricJSON = {};
  if (partial.usage) {
    json.usage = usageToJSON(partial.usage);
  }
  if (partial.matchingMetrics.size > 0) {
    json.matchingMetrics = [...partial.matchingMetrics].sort();
  }
  if (partial.matchingRegexp) {
    json.matchingRegexp = partial.matchingRegexp.source;
  }
  return json;
}

export function mapToJSON<V, J>(map: ReadonlyMap<string, V>, toJSON: (value: V) => J): Record<string, J> {
  return Object.fromEntries(
    [...map.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, value]) => [key, toJSON(value)])
  );
}

/**
 * Object entries from a parsed JSON body into a Map. Keys such as
 * `__proto__` stay ordinary keys.
 */
export function recordToMap<V, R>(record: Record<string, V>, convert: (value: V) => R): Map<string, R> {
  const result = new Map<string, R>();
  for (const [key, value] of Object.entries(record)) {
    result.set(key, convert(value));
  }
  return result;
}
