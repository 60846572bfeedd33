/**
 * Query renderer
 *
 * Pure AST -> filter string. The only place that quotes or escapes anything:
 *   - field names outside [A-Za-z0-9_]+ are back-tick wrapped
 *   - quoted literals double embedded single quotes
 *   - AND/OR are upper case; nested groups are parenthesized explicitly
 */

import { TypeMismatchError } from '../errors.js';
import { needsEscaping } from './registry.js';
import type { Comparison, Expression, FieldType, LiteralValue, LogicalKind, Query } from './types.js';
import { FIELD_TYPE_RULES, OPERATOR_SYNTAX, isQuery } from './types.js';

export function renderFieldName(name: string): string {
  return needsEscaping(name) ? `\`${name}\`` : name;
}

/** Quote a string literal, doubling embedded single quotes */
export function quoteString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function renderLiteral(type: FieldType, value: LiteralValue): string {
  if (FIELD_TYPE_RULES[type].quoted) {
    return quoteString(String(value));
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  return String(value);
}

export function renderComparison(comparison: Comparison): string {
  const { field, operator, operand } = comparison;
  const name = renderFieldName(field.name);
  const keyword = OPERATOR_SYNTAX[operator];

  switch (operand.kind) {
    case 'none':
      return `${name} ${keyword}`;
    case 'list':
      return `${name} ${keyword} (${operand.values.map((v) => renderLiteral(field.type, v)).join(', ')})`;
    case 'range':
      return `${name} ${keyword} ${renderLiteral(field.type, operand.lower)} AND ${renderLiteral(field.type, operand.upper)}`;
    case 'scalar':
      return `${name} ${keyword} ${renderLiteral(field.type, operand.value)}`;
  }
}

function renderExpression(expression: Expression, parent?: LogicalKind): string {
  if (expression.kind === 'comparison') {
    return renderComparison(expression);
  }

  const connective = ` ${expression.kind.toUpperCase()} `;
  const body = expression.operands.map((op) => renderExpression(op, expression.kind)).join(connective);

  const wrap =
    expression.grouped ||
    (parent !== undefined && (parent !== expression.kind || parent === 'or'));

  return wrap ? `(${body})` : body;
}

/**
 * Render an expression or query to its canonical filter string
 */
export function render(input: Expression | Query): string {
  return renderExpression(isQuery(input) ? input.root : input);
}

const QUOTED_LITERAL = /^'((?:[^']|'')*)'$/;
const INT_LITERAL = /^-?\d+$/;
const NUMBER_LITERAL = /^-?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Coerce a rendered literal back to its value (inverse of renderLiteral)
 * @throws TypeMismatchError when the text is not a literal of that type
 */
export function parseLiteral(type: FieldType, text: string): LiteralValue {
  if (FIELD_TYPE_RULES[type].quoted) {
    const match = QUOTED_LITERAL.exec(text);
    if (!match) {
      throw new TypeMismatchError('<literal>', `expected a quoted ${type} literal, got ${text}`);
    }
    return match[1].replace(/''/g, "'");
  }

  switch (type) {
    case 'Bool':
      if (text === 'true') return true;
      if (text === 'false') return false;
      throw new TypeMismatchError('<literal>', `expected true or false, got ${text}`);
    case 'Int':
      if (!INT_LITERAL.test(text)) {
        throw new TypeMismatchError('<literal>', `expected an integer, got ${text}`);
      }
      return Number(text);
    default:
      if (!NUMBER_LITERAL.test(text)) {
        throw new TypeMismatchError('<literal>', `expected a number, got ${text}`);
      }
      return Number(text);
  }
}
