/**
 * PromQL / MetricsQL metric name extraction.
 *
 * Walks the token stream and reports every identifier in selector position:
 * - `name(`                     → function or aggregation, skipped
 * - `by (...)`, `on (...)`, ... → grouping label list, skipped
 * - `name` / `name{...}`        → metric
 * - `{__name__="name"}`         → metric, or partial when the value is a regexp
 * - `{"name", job="x"}`         → metric (quoted name)
 * Names holding `$var` / `${var}` are partial.
 */

import type { ExpressionAnalysis, ExpressionAnalyzer, ExpressionEngine } from './expression-types';
import { ExpressionParseError } from './expression-types';
import type { Token } from './promql-lexer';
import { tokenize } from './promql-lexer';

const VALID_METRIC_NAME = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;

const GROUPING_KEYWORDS = new Set(['by', 'without', 'on', 'ignoring', 'group_left', 'group_right']);

const AGGREGATIONS = new Set([
  'sum',
  'min',
  'max',
  'avg',
  'group',
  'stddev',
  'stdvar',
  'count',
  'count_values',
  'bottomk',
  'topk',
  'quantile',
  'limitk',
  'limit_ratio',
]);

const PROMQL_KEYWORDS = ['bool', 'offset', 'and', 'or', 'unless', 'atan2', 'inf', 'nan'];

const METRICSQL_KEYWORDS = [...PROMQL_KEYWORDS, 'default', 'if', 'ifnot', 'keep_metric_names', 'limit'];

const BRACKET_PAIRS: Record<string, string> = { ')': '(', '}': '{' };

export class PromQLAnalyzer implements ExpressionAnalyzer {
  private readonly keywords: ReadonlySet<string>;

  constructor(readonly engine: ExpressionEngine = 'promql') {
    this.keywords = new Set(engine === 'metricsql' ? METRICSQL_KEYWORDS : PROMQL_KEYWORDS);
  }

  analyze(expression: string): ExpressionAnalysis {
    const tokens = tokenize(expression);
    checkBalance(expression, tokens);

    const result: ExpressionAnalysis = { metricNames: new Set(), partialMetricNames: new Set() };
    let i = 0;

    while (i < tokens.length) {
      const token = tokens[i];
      if (!token) break;

      if (token.kind === 'punctuation' && token.text === '{') {
        i = this.readMatchers(expression, tokens, i, result);
        continue;
      }

      if (token.kind !== 'identifier') {
        i++;
        continue;
      }

      const lower = token.text.toLowerCase();
      const next = tokens[i + 1];

      if (GROUPING_KEYWORDS.has(lower)) {
        i = isPunctuation(next, '(') ? skipParenthesized(tokens, i + 1) : i + 1;
        continue;
      }
      if (isPunctuation(next, '(') || this.keywords.has(lower)) {
        i++;
        continue;
      }
      if (AGGREGATIONS.has(lower) && next?.kind === 'identifier' && GROUPING_KEYWORDS.has(next.text.toLowerCase())) {
        i++;
        continue;
      }

      addName(result, token.text);
      i++;
    }

    return result;
  }

  /**
   * Reads `{ ... }` starting at `start`, records name matchers, and returns
   * the index after the closing brace.
   */
  private readMatchers(expression: string, tokens: Token[], start: number, result: ExpressionAnalysis): number {
    let i = start + 1;
    let group: Token[] = [];

    const flushGroup = () => {
      readMatcher(expression, group, result);
      group = [];
    };

    while (i < tokens.length) {
      const token = tokens[i];
      if (!token) break;
      if (isPunctuation(token, '}')) {
        flushGroup();
        return i + 1;
      }
      if (isPunctuation(token, ',') || (token.kind === 'identifier' && token.text.toLowerCase() === 'or')) {
        flushGroup();
      } else {
        group.push(token);
      }
      i++;
    }

    throw new ExpressionParseError('Unterminated label matchers', expression, start);
  }
}

function readMatcher(expression: string, group: Token[], result: ExpressionAnalysis): void {
  const [label, op, value, ...rest] = group;
  if (!label) return;

  if (!op && label.kind === 'string') {
    addName(result, label.text);
    return;
  }

  if (
    rest.length > 0 ||
    !op ||
    !value ||
    (label.kind !== 'identifier' && label.kind !== 'string') ||
    op.kind !== 'punctuation' ||
    value.kind !== 'string'
  ) {
    throw new ExpressionParseError('Malformed label matcher', expression, label.position);
  }

  if (label.text !== '__name__') return;

  if (op.text === '=' || op.text === '=~') {
    addName(result, value.text);
  } else if (op.text !== '!=' && op.text !== '!~') {
    throw new ExpressionParseError(`Unknown matcher operator "${op.text}"`, expression, op.position);
  }
}

function addName(result: ExpressionAnalysis, name: string): void {
  if (name.length === 0) return;
  if (VALID_METRIC_NAME.test(name)) {
    result.metricNames.add(name);
  } else {
    result.partialMetricNames.add(name);
  }
}

function isPunctuation(token: Token | undefined, text: string): boolean {
  return token?.kind === 'punctuation' && token.text === text;
}

/** Index after the `)` closing the `(` at `open`. */
function skipParenthesized(tokens: Token[], open: number): number {
  for (let i = open + 1; i < tokens.length; i++) {
    if (isPunctuation(tokens[i], ')')) return i + 1;
  }
  return tokens.length;
}

function checkBalance(expression: string, tokens: Token[]): void {
  const stack: Token[] = [];
  for (const token of tokens) {
    if (token.kind !== 'punctuation') continue;
    if (token.text === '(' || token.text === '{') {
      stack.push(token);
      continue;
    }
    const opening = BRACKET_PAIRS[token.text];
    if (!opening) continue;
    const top = stack.pop();
    if (!top || top.text !== opening) {
      throw new ExpressionParseError(`Unexpected "${token.text}"`, expression, token.position);
    }
  }
  const unclosed = stack.pop();
  if (unclosed) {
    throw new ExpressionParseError(`Unclosed "${unclosed.text}"`, expression, unclosed.position);
  }
}
