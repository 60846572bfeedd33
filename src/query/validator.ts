/**
 * Static query validator
 *
 * Pre-flight checks on a filter string without contacting any server.
 * Every check runs; findings are collected in one pass, never thrown
 * (assertValidQuery is the throwing wrapper for callers about to execute).
 *
 * Checks:
 *   - unclosed quotes and back-ticks ('' inside a literal is an escape)
 *   - unbalanced parentheses outside literals
 *   - LIKE / CONTAINS / REGEX ... and % / * wildcards
 *   - lower- or mixed-case and/or
 *   - field names differing from a known field only by case
 */

import {
  CaseError,
  UnbalancedParensError,
  UnbalancedQuotesError,
  UnknownFieldError,
  UnsupportedOperatorError,
  type WfscopeError,
} from '../errors.js';
import { tokenize, type Token } from './lexer.js';
import { defaultRegistry, type TypeRegistry } from './registry.js';
import { quoteString } from './renderer.js';
import { OPERATOR_SYNTAX } from './types.js';

export type FindingKind =
  | 'UnbalancedQuotesError'
  | 'UnbalancedParensError'
  | 'UnsupportedOperatorError'
  | 'CaseError'
  | 'UnknownFieldError';

export interface QueryFinding {
  kind: FindingKind;
  message: string;
  /** 0-based offset of the offending text */
  position: number;
  /** Offending source text */
  text: string;
  /** Replacement the caller can offer (a rewritten condition, keyword or field name) */
  suggestion?: string;
}

export interface QueryValidationResult {
  valid: boolean;
  findings: QueryFinding[];
  supportedFields: string[];
  supportedOperators: string[];
}

export interface ValidateOptions {
  registry?: TypeRegistry;
}

/** Unsupported operator keywords and their replacement */
export const UNSUPPORTED_OPERATORS: Record<string, string> = {
  LIKE: 'STARTS_WITH',
  ILIKE: 'STARTS_WITH',
  CONTAINS: 'STARTS_WITH',
  MATCH: 'STARTS_WITH',
  REGEX: 'STARTS_WITH',
  REGEXP: 'STARTS_WITH',
  'SIMILAR TO': 'STARTS_WITH',
  '~': 'STARTS_WITH',
  '~~': 'STARTS_WITH',
  '!~~': '!=',
  'NOT LIKE': '!=',
  'NOT ILIKE': '!=',
};

/** Words that may follow a field name in comparison position */
const COMPARISON_WORDS = new Set([
  'STARTS_WITH',
  'IN',
  'BETWEEN',
  'IS',
  'NOT',
  'LIKE',
  'ILIKE',
  'CONTAINS',
  'MATCH',
  'REGEX',
  'REGEXP',
  'SIMILAR',
]);

const KEYWORDS = new Set([
  ...COMPARISON_WORDS,
  'AND',
  'OR',
  'NULL',
  'TO',
  'TRUE',
  'FALSE',
  'ORDER',
  'BY',
  'ASC',
  'DESC',
]);

const SIMPLE_PREFIX = /^([^%*]+)[%*]$/;

/**
 * Validate a filter string
 * An empty query is valid (it matches every execution).
 */
export function validateQuery(query: string, options: ValidateOptions = {}): QueryValidationResult {
  const registry = options.registry ?? defaultRegistry;
  const findings: QueryFinding[] = [];

  if (query.trim()) {
    const tokens = tokenize(query);
    checkQuotes(tokens, findings);
    checkParens(tokens, findings);
    checkOperators(tokens, findings);
    checkKeywordCase(tokens, findings);
    checkFieldNames(tokens, registry, findings);
  }

  return {
    valid: findings.length === 0,
    findings,
    supportedFields: registry.fieldNames(),
    supportedOperators: Object.values(OPERATOR_SYNTAX),
  };
}

/**
 * Validate and throw the first finding as its error class
 */
export function assertValidQuery(query: string, options: ValidateOptions = {}): void {
  const { findings } = validateQuery(query, options);
  if (findings.length > 0) {
    throw findingToError(findings[0]);
  }
}

export function findingToError(finding: QueryFinding): WfscopeError {
  switch (finding.kind) {
    case 'UnbalancedQuotesError':
      return new UnbalancedQuotesError(finding.message);
    case 'UnbalancedParensError':
      return new UnbalancedParensError(finding.message);
    case 'UnsupportedOperatorError':
      return new UnsupportedOperatorError(finding.message, finding.suggestion);
    case 'CaseError':
      return new CaseError(finding.message);
    case 'UnknownFieldError':
      return new UnknownFieldError(finding.text, finding.suggestion);
  }
}

const UNCLOSED_LABEL: Record<string, string> = {
  "'": 'Unbalanced single quotes: literal',
  '"': 'Unbalanced double quotes: literal',
  '`': 'Unbalanced back-ticks: field name',
};

/**
 * An unclosed literal or back-ticked name runs to the end of the input,
 * so the swallowed text is tokenized again to find quotes left open inside it.
 */
function checkQuotes(tokens: Token[], findings: QueryFinding[], offset = 0): void {
  for (const token of tokens) {
    if (token.closed) continue;
    const opener = token.text.charAt(0);
    const label = UNCLOSED_LABEL[opener];
    if (!label) continue;
    const position = token.position + offset;
    findings.push({
      kind: 'UnbalancedQuotesError',
      message: `${label} starting at char ${position + 1} is never closed`,
      position,
      text: token.text,
    });
    if (opener !== "'") {
      checkQuotes(tokenize(token.text.slice(1)), findings, position + 1);
    }
  }
}

function checkParens(tokens: Token[], findings: QueryFinding[]): void {
  const opens: Token[] = [];

  for (const token of tokens) {
    if (token.kind === 'lparen') {
      opens.push(token);
    } else if (token.kind === 'rparen') {
      if (opens.length === 0) {
        findings.push({
          kind: 'UnbalancedParensError',
          message: `Unbalanced parentheses: unexpected ')' at char ${token.position + 1}`,
          position: token.position,
          text: token.text,
        });
        return;
      }
      opens.pop();
    }
  }

  if (opens.length > 0) {
    findings.push({
      kind: 'UnbalancedParensError',
      message: `Unbalanced parentheses: '(' at char ${opens[0].position + 1} is never closed`,
      position: opens[0].position,
      text: opens[0].text,
    });
  }
}

function isFieldToken(token: Token | undefined): token is Token {
  if (!token) return false;
  if (token.kind === 'quoted_ident') return true;
  return token.kind === 'ident' && !KEYWORDS.has(token.text.toUpperCase());
}

/** STARTS_WITH rewrite when the pattern is a literal prefix followed by one wildcard */
function prefixRewrite(field: Token | undefined, pattern: Token | undefined): string | undefined {
  if (!isFieldToken(field) || !pattern || pattern.kind !== 'string') {
    return undefined;
  }
  const match = SIMPLE_PREFIX.exec(pattern.value);
  return match ? `${field.text} STARTS_WITH ${quoteString(match[1])}` : undefined;
}

function checkOperators(tokens: Token[], findings: QueryFinding[]): void {
  // Patterns already reported together with their operator
  const consumed = new Set<Token>();

  const reportOperator = (label: string, at: Token, field: Token | undefined, pattern: Token | undefined) => {
    const replacement = UNSUPPORTED_OPERATORS[label];
    const suggestion = replacement === 'STARTS_WITH' ? prefixRewrite(field, pattern) : undefined;
    if (pattern?.kind === 'string') {
      consumed.add(pattern);
    }
    findings.push({
      kind: 'UnsupportedOperatorError',
      message: `Unsupported operator '${label}'. Use '${replacement}' instead.`,
      position: at.position,
      text: label,
      ...(suggestion ? { suggestion } : {}),
    });
  };

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const next = tokens[i + 1];

    if (token.kind === 'ident') {
      const upper = token.text.toUpperCase();
      const nextUpper = next?.kind === 'ident' ? next.text.toUpperCase() : '';

      if (upper === 'NOT' && (nextUpper === 'LIKE' || nextUpper === 'ILIKE')) {
        reportOperator(`NOT ${nextUpper}`, token, tokens[i - 1], tokens[i + 2]);
        i++;
      } else if (upper === 'SIMILAR' && nextUpper === 'TO') {
        reportOperator('SIMILAR TO', token, tokens[i - 1], tokens[i + 2]);
        i++;
      } else if (upper in UNSUPPORTED_OPERATORS) {
        reportOperator(upper, token, tokens[i - 1], next);
      }
    } else if (token.kind === 'operator' && token.text in UNSUPPORTED_OPERATORS) {
      reportOperator(token.text, token, tokens[i - 1], next);
    } else if (token.kind === 'string' && !consumed.has(token)) {
      const wildcard = /[%*]/.exec(token.value);
      if (wildcard) {
        const previous = tokens[i - 1];
        const suggestion =
          previous?.kind === 'operator' && previous.text === '='
            ? prefixRewrite(tokens[i - 2], token)
            : undefined;
        findings.push({
          kind: 'UnsupportedOperatorError',
          message: `Wildcard '${wildcard[0]}' is not supported. Use 'STARTS_WITH' for prefix matching.`,
          position: token.position,
          text: token.text,
          ...(suggestion ? { suggestion } : {}),
        });
      }
    } else if (token.kind === 'symbol' && (token.text === '%' || token.text === '*')) {
      findings.push({
        kind: 'UnsupportedOperatorError',
        message: `Wildcard '${token.text}' is not supported. Use 'STARTS_WITH' for prefix matching.`,
        position: token.position,
        text: token.text,
      });
    }
  }
}

function checkKeywordCase(tokens: Token[], findings: QueryFinding[]): void {
  for (const token of tokens) {
    if (token.kind !== 'ident') continue;
    const upper = token.text.toUpperCase();
    if ((upper === 'AND' || upper === 'OR') && token.text !== upper) {
      findings.push({
        kind: 'CaseError',
        message: `Logical operator '${token.text}' must be upper case: use ${upper}`,
        position: token.position,
        text: token.text,
        suggestion: upper,
      });
    }
  }
}

function checkFieldNames(tokens: Token[], registry: TypeRegistry, findings: QueryFinding[]): void {
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const next = tokens[i + 1];
    if (!isFieldToken(token) || !next) continue;

    const comparisonPosition =
      next.kind === 'operator' || (next.kind === 'ident' && COMPARISON_WORDS.has(next.text.toUpperCase()));
    if (!comparisonPosition || registry.tryDescribe(token.value)) continue;

    const suggestion = registry.suggest(token.value);
    if (suggestion) {
      findings.push({
        kind: 'UnknownFieldError',
        message: `Unknown field '${token.value}' (names are case-sensitive): did you mean \`${suggestion}\`?`,
        position: token.position,
        text: token.value,
        suggestion,
      });
    }
  }
}
