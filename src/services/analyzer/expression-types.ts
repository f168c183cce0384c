export const EXPRESSION_ENGINES = ['promql', 'metricsql'] as const;

export type ExpressionEngine = (typeof EXPRESSION_ENGINES)[number];

export interface ExpressionAnalysis {
  /** Names that can be looked up as-is */
  metricNames: Set<string>;
  /** Names holding variables or regexp syntax, kept as patterns */
  partialMetricNames: Set<string>;
}

/**
 * Extracts the metric names a query expression reads from.
 * Picked once at startup and handed to whatever needs it.
 */
export interface ExpressionAnalyzer {
  readonly engine: ExpressionEngine;
  /** @throws ExpressionParseError when the expression is malformed */
  analyze(expression: string): ExpressionAnalysis;
}

export class ExpressionParseError extends Error {
  constructor(
    message: string,
    readonly expression: string,
    readonly position: number
  ) {
    super(`${message} at position ${position}`);
    this.name = 'ExpressionParseError';
  }
}
