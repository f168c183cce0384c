/**
 * PromQL Lexer
 *
 * Just enough tokenization to find metric selectors: identifiers (with
 * dashboard variables folded in), strings, numbers/durations, range
 * brackets and punctuation. Comments and whitespace are dropped.
 */

import { ExpressionParseError } from './expression-types';

export type TokenKind = 'identifier' | 'string' | 'number' | 'range' | 'punctuation';

export interface Token {
  kind: TokenKind;
  /** Unescaped content for strings, raw text otherwise */
  text: string;
  position: number;
}

const IDENT_START = /[a-zA-Z_:]/;
const IDENT_PART = /[a-zA-Z0-9_:]/;
const VARIABLE_PART = /[a-zA-Z0-9_]/;
const NUMBER_START = /[0-9.]/;
const NUMBER_PART = /[0-9a-zA-Z_.]/;
const WHITESPACE = /\s/;

const TWO_CHAR_OPERATORS = new Set(['==', '!=', '=~', '!~', '>=', '<=']);
const ONE_CHAR_PUNCTUATION = new Set(['(', ')', '{', '}', ',', '=', '>', '<', '+', '-', '*', '/', '%', '^', '@']);

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  '"': '"',
  "'": "'",
};

export function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  const fail = (message: string, at: number): never => {
    throw new ExpressionParseError(message, expression, at);
  };

  // `$var` or `${var}` starting at `pos`; returns the index after it
  const readVariable = (start: number): number => {
    if (expression[start + 1] === '{') {
      const close = expression.indexOf('}', start + 2);
      if (close === -1) fail('Unterminated variable', start);
      return close + 1;
    }
    let end = start + 1;
    while (end < expression.length && VARIABLE_PART.test(expression.charAt(end))) end++;
    if (end === start + 1) fail('Dangling "$"', start);
    return end;
  };

  while (pos < expression.length) {
    const ch = expression.charAt(pos);

    if (WHITESPACE.test(ch)) {
      pos++;
      continue;
    }

    if (ch === '#') {
      const newline = expression.indexOf('\n', pos);
      pos = newline === -1 ? expression.length : newline + 1;
      continue;
    }

    if (IDENT_START.test(ch) || ch === '$') {
      const start = pos;
      while (pos < expression.length) {
        const c = expression.charAt(pos);
        if (c === '$') {
          pos = readVariable(pos);
        } else if (IDENT_PART.test(c)) {
          pos++;
        } else {
          break;
        }
      }
      tokens.push({ kind: 'identifier', text: expression.slice(start, pos), position: start });
      continue;
    }

    if (NUMBER_START.test(ch)) {
      const start = pos;
      while (pos < expression.length && NUMBER_PART.test(expression.charAt(pos))) pos++;
      tokens.push({ kind: 'number', text: expression.slice(start, pos), position: start });
      continue;
    }

    if (ch === '"' || ch === "'" || ch === '`') {
      const start = pos;
      let value = '';
      pos++;
      for (;;) {
        if (pos >= expression.length) fail('Unterminated string', start);
        const c = expression.charAt(pos);
        if (c === ch) {
          pos++;
          break;
        }
        if (c === '\\' && ch !== '`') {
          const next = expression.charAt(pos + 1);
          value += ESCAPES[next] ?? `\\${next}`;
          pos += 2;
          continue;
        }
        value += c;
        pos++;
      }
      tokens.push({ kind: 'string', text: value, position: start });
      continue;
    }

    if (ch === '[') {
      // Range or subquery window; its content never names a metric
      const close = expression.indexOf(']', pos);
      if (close === -1) fail('Unterminated range', pos);
      tokens.push({ kind: 'range', text: expression.slice(pos, close + 1), position: pos });
      pos = close + 1;
      continue;
    }

    const pair = expression.slice(pos, pos + 2);
    if (TWO_CHAR_OPERATORS.has(pair)) {
      tokens.push({ kind: 'punctuation', text: pair, position: pos });
      pos += 2;
      continue;
    }

    if (ONE_CHAR_PUNCTUATION.has(ch)) {
      tokens.push({ kind: 'punctuation', text: ch, position: pos });
      pos++;
      continue;
    }

    fail(`Unexpected character "${ch}"`, pos);
  }

  return tokens;
}
