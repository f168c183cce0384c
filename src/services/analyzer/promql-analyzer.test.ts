import { describe, expect, it } from 'vitest';
import { createExpressionAnalyzer } from './expression-analyzer';
import { ExpressionParseError } from './expression-types';

const promql = createExpressionAnalyzer('promql');
const metricsql = createExpressionAnalyzer('metricsql');

function names(expression: string, analyzer = promql) {
  const { metricNames, partialMetricNames } = analyzer.analyze(expression);
  return { metrics: [...metricNames].sort(), partials: [...partialMetricNames].sort() };
}

describe('PromQLAnalyzer', () => {
  describe('selectors', () => {
    it.each([
      ['up', ['up']],
      ['up{job="api"}', ['up']],
      ['rate(http_requests_total{code=~"5.."}[5m])', ['http_requests_total']],
      ['sum by (job) (rate(http_requests_total[5m]))', ['http_requests_total']],
      ['sum(rate(http_requests_total[5m])) without (instance)', ['http_requests_total']],
      [
        'histogram_quantile(0.99, sum(rate(request_duration_seconds_bucket[5m])) by (le))',
        ['request_duration_seconds_bucket'],
      ],
      ['node_load1 / on(instance) group_left(nodename) node_uname_info', ['node_load1', 'node_uname_info']],
      ['errors_total > bool 0 and ignoring(code) requests_total offset 1h', ['errors_total', 'requests_total']],
      ['label_replace(up, "host", "$1", "instance", "(.*):.*")', ['up']],
      ['job:requests:rate5m @ end()', ['job:requests:rate5m']],
      ['rate(x[$__rate_interval]) # trailing comment', ['x']],
      ['topk(3, sum by (pod) (container_memory_usage_bytes))', ['container_memory_usage_bytes']],
    ])('finds the metrics of %s', (expression, expected) => {
      expect(names(expression)).toEqual({ metrics: expected, partials: [] });
    });

    it('reads metric names from __name__ matchers', () => {
      expect(names('{__name__="up", job="api"}')).toEqual({ metrics: ['up'], partials: [] });
      expect(names('count({__name__=~"otelcol_receiver_.+"})')).toEqual({
        metrics: [],
        partials: ['otelcol_receiver_.+'],
      });
      expect(names('{__name__!="up"}')).toEqual({ metrics: [], partials: [] });
    });

    it('reads quoted metric names', () => {
      expect(names('{"process_cpu_seconds_total", job="api"}')).toEqual({
        metrics: ['process_cpu_seconds_total'],
        partials: [],
      });
    });

    it('reports names holding variables as partial', () => {
      expect(names('sum(rate(otelcol_exporter_sent_${signal}[5m])) / node_$metric')).toEqual({
        metrics: [],
        partials: ['node_$metric', 'otelcol_exporter_sent_${signal}'],
      });
    });
  });

  describe('dialects', () => {
    it('treats MetricsQL keywords as keywords only in MetricsQL', () => {
      expect(names('requests_total default 0', metricsql)).toEqual({ metrics: ['requests_total'], partials: [] });
      expect(names('requests_total default 0')).toEqual({ metrics: ['default', 'requests_total'], partials: [] });
    });

    it('exposes the engine it was built for', () => {
      expect(promql.engine).toBe('promql');
      expect(metricsql.engine).toBe('metricsql');
    });
  });

  describe('malformed expressions', () => {
    it.each([
      ['sum(rate(up[5m])', 'Unclosed "("'],
      ['up)', 'Unexpected ")"'],
      ['up{job="api"', 'Unclosed "{"'],
      ['up{job="api}', 'Unterminated string'],
      ['rate(up[5m)', 'Unterminated range'],
      ['up{job=api}', 'Malformed label matcher'],
      ['up ; down', 'Unexpected character ";"'],
      ['up_${suffix', 'Unterminated variable'],
    ])('rejects %s', (expression, message) => {
      expect(() => promql.analyze(expression)).toThrow(ExpressionParseError);
      expect(() => promql.analyze(expression)).toThrow(message);
    });
  });
});
