/**
 * Visibility query engine
 *
 * Public API for building, rendering and validating workflow visibility queries.
 */

// Types
export type {
  Comparison,
  Expression,
  FieldDescriptor,
  FieldType,
  LiteralInput,
  LiteralValue,
  LogicalExpression,
  LogicalKind,
  Operand,
  Operator,
  Query,
} from './types.js';
export { FIELD_TYPES, FIELD_TYPE_RULES, OPERATORS, OPERATOR_SYNTAX, isFieldType, isOperator } from './types.js';

// Registry
export type { FieldDefinition } from './registry.js';
export {
  BUILTIN_FIELDS,
  EXECUTION_STATUSES,
  TypeRegistry,
  createFieldDescriptor,
  defaultRegistry,
  describe,
  needsEscaping,
} from './registry.js';

// Expression model
export type { ComparisonValue } from './expression.js';
export { and, coerceLiteral, createQuery, group, isOperatorAllowed, makeComparison, or } from './expression.js';

// Renderer
export { parseLiteral, quoteString, render, renderComparison, renderFieldName, renderLiteral } from './renderer.js';

// Validator
export type { FindingKind, QueryFinding, QueryValidationResult, ValidateOptions } from './validator.js';
export { UNSUPPORTED_OPERATORS, assertValidQuery, findingToError, validateQuery } from './validator.js';

// Structured documents
export type { StructuredCondition, StructuredNode, StructuredQueryError, StructuredQueryResult } from './structured.js';
export { buildStructuredQuery, loadStructuredQuery, parseOperator } from './structured.js';

// Fallback & scope
export type { CountFn, FallbackResolution, FallbackState } from './fallback.js';
export { fallbackQueryFor, resolveWithFallback } from './fallback.js';
export type { ScopeDecision, ScopeStrategy } from './scope.js';
export { decide } from './scope.js';
