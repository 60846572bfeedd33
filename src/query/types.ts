/**
 * Visibility query types
 *
 * Typed AST for the workflow visibility filter language:
 *   WorkflowType = 'Order' AND (ExecutionStatus = 'Failed' OR ExecutionStatus = 'TimedOut')
 *
 * No I/O - shared by the CLI, the fallback resolver and the library API.
 */

/** Search attribute types */
export type FieldType = 'Keyword' | 'Text' | 'Int' | 'Double' | 'Bool' | 'Datetime' | 'KeywordList';

export const FIELD_TYPES: readonly FieldType[] = [
  'Keyword',
  'Text',
  'Int',
  'Double',
  'Bool',
  'Datetime',
  'KeywordList',
];

/** Comparison operators */
export type Operator =
  | 'EQ'
  | 'NEQ'
  | 'GT'
  | 'GTE'
  | 'LT'
  | 'LTE'
  | 'STARTS_WITH'
  | 'IN'
  | 'BETWEEN'
  | 'IS_NULL'
  | 'IS_NOT_NULL';

export const OPERATORS: readonly Operator[] = [
  'EQ',
  'NEQ',
  'GT',
  'GTE',
  'LT',
  'LTE',
  'STARTS_WITH',
  'IN',
  'BETWEEN',
  'IS_NULL',
  'IS_NOT_NULL',
];

/** Operator keyword as written in the filter language */
export const OPERATOR_SYNTAX: Record<Operator, string> = {
  EQ: '=',
  NEQ: '!=',
  GT: '>',
  GTE: '>=',
  LT: '<',
  LTE: '<=',
  STARTS_WITH: 'STARTS_WITH',
  IN: 'IN',
  BETWEEN: 'BETWEEN',
  IS_NULL: 'IS NULL',
  IS_NOT_NULL: 'IS NOT NULL',
};

const ORDERED: Operator[] = ['EQ', 'NEQ', 'GT', 'GTE', 'LT', 'LTE'];
const NULL_CHECKS: Operator[] = ['IS_NULL', 'IS_NOT_NULL'];

/** Per-type operator set and literal quoting rule */
export interface FieldTypeRule {
  operators: ReadonlySet<Operator>;
  /** Literals are single-quoted with '' escaping */
  quoted: boolean;
}

export const FIELD_TYPE_RULES: Record<FieldType, FieldTypeRule> = {
  Keyword: {
    operators: new Set<Operator>([...ORDERED, 'STARTS_WITH', 'IN', 'BETWEEN', ...NULL_CHECKS]),
    quoted: true,
  },
  Text: {
    operators: new Set<Operator>(['EQ', 'NEQ', ...NULL_CHECKS]),
    quoted: true,
  },
  Int: {
    operators: new Set<Operator>([...ORDERED, 'IN', 'BETWEEN', ...NULL_CHECKS]),
    quoted: false,
  },
  Double: {
    operators: new Set<Operator>([...ORDERED, 'IN', 'BETWEEN', ...NULL_CHECKS]),
    quoted: false,
  },
  Bool: {
    operators: new Set<Operator>(['EQ', 'NEQ', ...NULL_CHECKS]),
    quoted: false,
  },
  Datetime: {
    operators: new Set<Operator>([...ORDERED, 'BETWEEN', ...NULL_CHECKS]),
    quoted: true,
  },
  KeywordList: {
    operators: new Set<Operator>(['EQ', 'NEQ', 'IN', ...NULL_CHECKS]),
    quoted: true,
  },
};

/** Resolved search attribute */
export interface FieldDescriptor {
  readonly name: string;
  readonly type: FieldType;
  readonly isCustom: boolean;
  /** Closed value vocabulary (e.g. ExecutionStatus) */
  readonly allowedValues?: readonly string[];
}

/** Literal as accepted from callers */
export type LiteralInput = string | number | boolean | Date;

/** Literal after type coercion (Datetime is kept as its ISO string) */
export type LiteralValue = string | number | boolean;

export type Operand =
  | { readonly kind: 'none' }
  | { readonly kind: 'scalar'; readonly value: LiteralValue }
  | { readonly kind: 'list'; readonly values: readonly LiteralValue[] }
  | { readonly kind: 'range'; readonly lower: LiteralValue; readonly upper: LiteralValue };

export interface Comparison {
  readonly kind: 'comparison';
  readonly field: FieldDescriptor;
  readonly operator: Operator;
  readonly operand: Operand;
}

export type LogicalKind = 'and' | 'or';

export interface LogicalExpression {
  readonly kind: LogicalKind;
  readonly operands: readonly Expression[];
  /** Explicit parenthesization requested by the builder */
  readonly grouped: boolean;
}

export type Expression = Comparison | LogicalExpression;

/** Built query: one root expression, frozen */
export interface Query {
  readonly root: Expression;
}

export function isFieldType(value: unknown): value is FieldType {
  return typeof value === 'string' && FIELD_TYPES.some((type) => type === value);
}

export function isOperator(value: unknown): value is Operator {
  return typeof value === 'string' && OPERATORS.some((op) => op === value);
}

export function isQuery(value: Expression | Query): value is Query {
  return 'root' in value;
}
