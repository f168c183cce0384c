import type { ExpressionAnalyzer, ExpressionEngine } from './expression-types';
import { PromQLAnalyzer } from './promql-analyzer';

/**
 * Analyzer for the configured query dialect. MetricsQL is a superset of
 * PromQL, so both share one scanner with a different keyword set.
 */
export function createExpressionAnalyzer(engine: ExpressionEngine): ExpressionAnalyzer {
  switch (engine) {
    case 'promql':
      return new PromQLAnalyzer('promql');
    case 'metricsql':
      return new PromQLAnalyzer('metricsql');
  }
}
