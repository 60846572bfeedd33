/**
 * Filter expression model
 *
 * makeComparison() type-checks one comparison against its field's type;
 * and()/or()/group() combine comparisons into a tree. Every node is frozen.
 */

import { TypeMismatchError } from '../errors.js';
import { defaultRegistry, type TypeRegistry } from './registry.js';
import type {
  Comparison,
  Expression,
  FieldDescriptor,
  LiteralInput,
  LiteralValue,
  LogicalExpression,
  LogicalKind,
  Operand,
  Operator,
  Query,
} from './types.js';
import { FIELD_TYPE_RULES } from './types.js';

/** Value argument of makeComparison: scalar, list (IN), pair (BETWEEN) or nothing (IS NULL) */
export type ComparisonValue = LiteralInput | readonly LiteralInput[] | null | undefined;

export function isOperatorAllowed(field: FieldDescriptor, operator: Operator): boolean {
  return FIELD_TYPE_RULES[field.type].operators.has(operator);
}

/**
 * Build a type-checked comparison
 * @param field - Descriptor, or a name resolved through the registry
 * @throws UnknownFieldError, TypeMismatchError
 */
export function makeComparison(
  field: FieldDescriptor | string,
  operator: Operator,
  value?: ComparisonValue,
  registry: TypeRegistry = defaultRegistry
): Comparison {
  const descriptor = typeof field === 'string' ? registry.describe(field) : field;

  if (!isOperatorAllowed(descriptor, operator)) {
    const allowed = [...FIELD_TYPE_RULES[descriptor.type].operators].join(', ');
    throw new TypeMismatchError(
      descriptor.name,
      `operator ${operator} is not supported for ${descriptor.type} fields (allowed: ${allowed})`
    );
  }

  const comparison: Comparison = {
    kind: 'comparison',
    field: descriptor,
    operator,
    operand: buildOperand(descriptor, operator, value),
  };
  return Object.freeze(comparison);
}

function freezeOperand(operand: Operand): Operand {
  return Object.freeze(operand);
}

function buildOperand(field: FieldDescriptor, operator: Operator, value: ComparisonValue): Operand {
  switch (operator) {
    case 'IS_NULL':
    case 'IS_NOT_NULL':
      if (value !== undefined && value !== null) {
        throw new TypeMismatchError(field.name, `${operator} takes no value`);
      }
      return freezeOperand({ kind: 'none' });

    case 'IN': {
      if (!isLiteralList(value) || value.length === 0) {
        throw new TypeMismatchError(field.name, 'IN requires a non-empty list of values');
      }
      const shapes = new Set(value.map(shapeOf));
      if (shapes.size > 1) {
        throw new TypeMismatchError(field.name, `IN values must share one type (got ${[...shapes].join(', ')})`);
      }
      const values = value.map((v) => coerceLiteral(field, operator, v));
      return freezeOperand({ kind: 'list', values: Object.freeze(values) });
    }

    case 'BETWEEN': {
      if (!isLiteralList(value) || value.length !== 2) {
        throw new TypeMismatchError(field.name, 'BETWEEN requires exactly two bounds');
      }
      return freezeOperand({
        kind: 'range',
        lower: coerceLiteral(field, operator, value[0]),
        upper: coerceLiteral(field, operator, value[1]),
      });
    }

    default:
      if (value === undefined || value === null) {
        throw new TypeMismatchError(field.name, `${operator} requires a value`);
      }
      if (isLiteralList(value)) {
        throw new TypeMismatchError(field.name, `${operator} takes a single value, not a list`);
      }
      if (operator === 'STARTS_WITH' && value === '') {
        throw new TypeMismatchError(field.name, 'STARTS_WITH requires a non-empty prefix');
      }
      return freezeOperand({ kind: 'scalar', value: coerceLiteral(field, operator, value) });
  }
}

function isLiteralList(value: ComparisonValue): value is readonly LiteralInput[] {
  return Array.isArray(value);
}

function shapeOf(value: LiteralInput): string {
  return value instanceof Date ? 'date' : typeof value;
}

function describeValue(value: LiteralInput): string {
  return typeof value === 'string' ? `'${value}'` : String(value);
}

/**
 * Check a literal's shape against the field type
 * @throws TypeMismatchError
 */
export function coerceLiteral(field: FieldDescriptor, operator: Operator, value: LiteralInput): LiteralValue {
  switch (field.type) {
    case 'Keyword':
    case 'Text':
    case 'KeywordList': {
      if (typeof value !== 'string') {
        throw new TypeMismatchError(field.name, `expected a string for ${field.type}, got ${describeValue(value)}`);
      }
      const exact = operator === 'EQ' || operator === 'NEQ' || operator === 'IN';
      if (exact && field.allowedValues && !field.allowedValues.includes(value)) {
        throw new TypeMismatchError(
          field.name,
          `'${value}' is not one of ${field.allowedValues.join(', ')}`
        );
      }
      return value;
    }

    case 'Int':
      if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
        throw new TypeMismatchError(field.name, `expected an integer, got ${describeValue(value)}`);
      }
      // -0 folds into 0
      return value === 0 ? 0 : value;

    case 'Double':
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new TypeMismatchError(field.name, `expected a finite number, got ${describeValue(value)}`);
      }
      return value === 0 ? 0 : value;

    case 'Bool':
      if (typeof value === 'boolean') return value;
      if (value === 'true') return true;
      if (value === 'false') return false;
      throw new TypeMismatchError(field.name, `expected true or false (lowercase), got ${describeValue(value)}`);

    case 'Datetime':
      if (value instanceof Date) {
        if (Number.isNaN(value.getTime())) {
          throw new TypeMismatchError(field.name, 'invalid Date');
        }
        return value.toISOString();
      }
      if (typeof value !== 'string' || Number.isNaN(Date.parse(value))) {
        throw new TypeMismatchError(field.name, `expected an ISO-8601 datetime, got ${describeValue(value)}`);
      }
      return value;
  }
}

function combine(kind: LogicalKind, operands: Expression[]): LogicalExpression {
  if (operands.length < 2) {
    throw new Error(`${kind.toUpperCase()} needs at least two operands`);
  }
  const node: LogicalExpression = {
    kind,
    operands: Object.freeze([...operands]),
    grouped: false,
  };
  return Object.freeze(node);
}

/** All operands must match */
export function and(...operands: Expression[]): LogicalExpression {
  return combine('and', operands);
}

/** Any operand may match */
export function or(...operands: Expression[]): LogicalExpression {
  return combine('or', operands);
}

/** Mark a logical node as explicitly parenthesized */
export function group(expression: LogicalExpression): LogicalExpression {
  const grouped: LogicalExpression = { ...expression, grouped: true };
  return Object.freeze(grouped);
}

/** Freeze an expression tree into a query */
export function createQuery(root: Expression): Query {
  const query: Query = { root };
  return Object.freeze(query);
}
