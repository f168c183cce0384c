import { describe, expect, it } from 'vitest';
import { createUsage, usageToJSON } from '../../types/metric-usage';
import type { MetricUsage } from '../../types/metric-usage';
import { cloneMetric, clonePartialMetric, mergeUsage } from './usage-merge';

const dashboard = (id: string) => ({ id, name: `Dashboard ${id}`, url: `/d/${id}` });
const rule = (name: string) => ({ promLink: 'http://prom', groupName: 'group', name, expression: `sum(${name})` });

function merged(...usages: MetricUsage[]): MetricUsage | null {
  return usages.reduce<MetricUsage | null>((acc, usage) => mergeUsage(acc, usage), null);
}

describe('mergeUsage', () => {
  const a = createUsage({ dashboards: [dashboard('a')], alertRules: [rule('HighLoad')] });
  const b = createUsage({ dashboards: [dashboard('b')], recordingRules: [rule('job:up:sum')] });
  const c = createUsage({ dashboards: [dashboard('a'), dashboard('c')] });

  it('returns the other side when one is missing', () => {
    expect(mergeUsage(null, a)).toBe(a);
    expect(mergeUsage(a, undefined)).toBe(a);
    expect(mergeUsage(null, null)).toBeNull();
  });

  it('is idempotent', () => {
    const result = mergeUsage(a, a);
    if (!result) throw new Error('expected usage');
    expect(usageToJSON(result)).toEqual(usageToJSON(a));
  });

  it('gives the same facets whatever the merge order', () => {
    const expected = {
      dashboards: [dashboard('a'), dashboard('b'), dashboard('c')],
      recordingRules: [{ prom_link: 'http://prom', group_name: 'group', name: 'job:up:sum', expression: 'sum(job:up:sum)' }],
      alertRules: [{ prom_link: 'http://prom', group_name: 'group', name: 'HighLoad', expression: 'sum(HighLoad)' }],
    };
    const orders = [merged(a, b, c), merged(c, b, a), merged(b, a, c), mergeUsage(a, mergeUsage(b, c))];

    for (const result of orders) {
      if (!result) throw new Error('expected usage');
      expect(usageToJSON(result)).toEqual(expected);
    }
  });

  it('leaves both inputs untouched', () => {
    mergeUsage(a, b);
    expect(a.dashboards.size).toBe(1);
    expect(b.dashboards.size).toBe(1);
  });
});

describe('clone helpers', () => {
  it('copies metrics deeply', () => {
    const original = { labels: new Set(['job']), usage: createUsage({ dashboards: [dashboard('a')] }) };
    const copy = cloneMetric(original);

    copy.labels.add('instance');
    copy.usage?.dashboards.add(dashboard('b'));

    expect([...original.labels]).toEqual(['job']);
    expect(original.usage.dashboards.size).toBe(1);
  });

  it('copies partial metric links', () => {
    const original = { usage: null, matchingRegexp: /^foo_.+$/, matchingMetrics: new Set(['foo_bar']) };
    const copy = clonePartialMetric(original);

    copy.matchingMetrics.delete('foo_bar');

    expect(original.matchingMetrics.has('foo_bar')).toBe(true);
    expect(copy.matchingRegexp).toBe(original.matchingRegexp);
  });
});
