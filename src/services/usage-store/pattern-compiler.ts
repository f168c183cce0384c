/**
 * Partial Metric Pattern Compiler
 *
 * A partial metric name is a metric name that still holds dashboard
 * variables (`${suffix}`, `$job`) or regexp wildcards (`.+`, `.*`).
 * It is turned into a regexp anchored around the whole expression, so an
 * alternation (`foo|bar`) must match the full name too. Every variable or
 * wildcard run becomes a single `.+`.
 */

const VARIABLE_PATTERN = /\$\{[a-zA-Z0-9_:]+\}|\$[a-zA-Z_][a-zA-Z0-9_]*/g;

// Cannot appear in a metric name
const WILDCARD = '#';

/**
 * @returns the anchored pattern, or null when the name reduces to a bare
 *   wildcard and would match every metric
 * @throws SyntaxError when the remaining text is not a valid regexp
 */
export function compilePartialMetricPattern(partialMetricName: string): RegExp | null {
  const substituted = partialMetricName
    .replace(VARIABLE_PATTERN, WILDCARD)
    .replaceAll('.+', WILDCARD)
    .replaceAll('.*', WILDCARD);

  const collapsed = substituted.replace(/#+/g, WILDCARD);
  if (collapsed === WILDCARD || collapsed.length === 0) {
    return null;
  }

  return new RegExp(`^(?:${collapsed.replaceAll(WILDCARD, '.+')})$`);
}

/**
 * Full match plus a check that something non-empty was consumed.
 *
 * An alternation with an empty branch (`foo|`) compiles to `^(?:foo|)$`,
 * which matches the empty string; such zero-width matches are rejected.
 */
export function isMatching(pattern: RegExp, metricName: string): boolean {
  if (!pattern.test(metricName)) {
    return false;
  }
  const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
  for (const match of metricName.matchAll(new RegExp(pattern.source, flags))) {
    if (match[0].length > 0) {
      return true;
    }
  }
  return false;
}
