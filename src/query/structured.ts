/**
 * Structured query loader
 *
 * Builds an Expression from a JSON/YAML document:
 *
 *   all:
 *     - { field: WorkflowType, operator: STARTS_WITH, value: order }
 *     - any:
 *         - { field: ExecutionStatus, operator: "=", value: Failed }
 *         - { field: ExecutionStatus, operator: "=", value: TimedOut }
 *       grouped: true
 *
 * A bare condition is accepted at the root as well.
 */

import { parse as parseYaml } from 'yaml';
import { WfscopeError } from '../errors.js';
import { and, createQuery, group, makeComparison, or, type ComparisonValue } from './expression.js';
import { defaultRegistry, type TypeRegistry } from './registry.js';
import type { Expression, LiteralInput, Operator, Query } from './types.js';
import { OPERATORS, OPERATOR_SYNTAX, isOperator } from './types.js';

export interface StructuredCondition {
  field: string;
  operator: string;
  value?: unknown;
}

export type StructuredNode =
  | StructuredCondition
  | { all: StructuredNode[]; grouped?: boolean }
  | { any: StructuredNode[]; grouped?: boolean };

export interface StructuredQueryError {
  path: string;
  message: string;
}

export type StructuredQueryResult =
  | { ok: true; query: Query }
  | { ok: false; errors: StructuredQueryError[] };

/** Operator spellings accepted in documents: EQ, "=", "starts_with", "IS NULL", ... */
export function parseOperator(text: string): Operator | null {
  const normalized = text.trim().toUpperCase().replace(/\s+/g, ' ');
  if (isOperator(normalized)) {
    return normalized;
  }
  const underscored = normalized.replace(/ /g, '_');
  if (isOperator(underscored)) {
    return underscored;
  }
  const bySyntax = OPERATORS.find((op) => OPERATOR_SYNTAX[op] === normalized);
  return bySyntax ?? null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLiteral(value: unknown): value is LiteralInput {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  );
}

function toComparisonValue(value: unknown): ComparisonValue | undefined {
  if (value === undefined || value === null) return value;
  if (isLiteral(value)) return value;
  if (Array.isArray(value) && value.every(isLiteral)) return value;
  return undefined;
}

function buildNode(
  node: unknown,
  path: string,
  registry: TypeRegistry,
  errors: StructuredQueryError[]
): Expression | null {
  if (!isRecord(node)) {
    errors.push({ path, message: 'expected an object' });
    return null;
  }

  const combinator = 'all' in node ? 'all' : 'any' in node ? 'any' : null;
  if (combinator) {
    const children = node[combinator];
    if (!Array.isArray(children) || children.length === 0) {
      errors.push({ path: `${path}.${combinator}`, message: 'must be a non-empty array' });
      return null;
    }

    const built = children.map((child, i) => buildNode(child, `${path}.${combinator}[${i}]`, registry, errors));
    const operands = built.filter((e): e is Expression => e !== null);
    if (operands.length !== children.length) {
      return null;
    }
    if (operands.length === 1) {
      return operands[0];
    }

    const expression = combinator === 'all' ? and(...operands) : or(...operands);
    return node.grouped === true ? group(expression) : expression;
  }

  if (typeof node.field !== 'string' || typeof node.operator !== 'string') {
    errors.push({ path, message: "condition needs string 'field' and 'operator' (or an 'all'/'any' list)" });
    return null;
  }

  const operator = parseOperator(node.operator);
  if (!operator) {
    errors.push({ path: `${path}.operator`, message: `unknown operator '${node.operator}'` });
    return null;
  }

  const value = toComparisonValue(node.value);
  if (value === undefined && node.value !== undefined) {
    errors.push({ path: `${path}.value`, message: 'value must be a string, number, boolean or a list of them' });
    return null;
  }

  try {
    return makeComparison(node.field, operator, value, registry);
  } catch (error) {
    if (error instanceof WfscopeError) {
      errors.push({ path, message: error.message });
      return null;
    }
    throw error;
  }
}

/**
 * Build a query from an already-parsed document
 */
export function buildStructuredQuery(
  document: unknown,
  registry: TypeRegistry = defaultRegistry
): StructuredQueryResult {
  const errors: StructuredQueryError[] = [];
  const root = buildNode(document, '$', registry, errors);

  if (!root || errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, query: createQuery(root) };
}

/**
 * Parse a JSON or YAML document (YAML is a superset of JSON) and build a query
 */
export function loadStructuredQuery(
  content: string,
  registry: TypeRegistry = defaultRegistry
): StructuredQueryResult {
  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (e) {
    return {
      ok: false,
      errors: [{ path: '$', message: `Invalid document: ${e instanceof Error ? e.message : 'parse error'}` }],
    };
  }
  return buildStructuredQuery(document, registry);
}
