/**
 * WorkflowType -> WorkflowId fallback
 *
 * Workflow IDs are often derived from the type name, so when
 *   WorkflowType = 'Foo'
 * counts 0 we try once more with
 *   WorkflowId STARTS_WITH 'Foo'
 * The rewrite only applies to a query that is exactly one type equality.
 * At most two counts are ever issued.
 */

import { logger } from '../utils/logger.js';
import { makeComparison } from './expression.js';
import { defaultRegistry } from './registry.js';
import { render } from './renderer.js';
import type { Expression, Query } from './types.js';
import { isQuery } from './types.js';
import { assertValidQuery, type ValidateOptions } from './validator.js';

/** Count collaborator: executes a rendered query and returns the number of matches */
export type CountFn = (query: string) => Promise<number>;

export type FallbackState = 'Primary' | 'FallbackById';

export interface FallbackResolution {
  state: FallbackState;
  /** Query whose count is reported (the fallback query in FallbackById) */
  query: string;
  count: number;
  /** False when every attempted query counted 0 */
  found: boolean;
  /** Renderings tried, in order */
  attempted: string[];
  /** Human-readable explanation when the fallback fired */
  reason?: string;
}

const TYPE_EQUALITY = /^\s*WorkflowType\s*=\s*'((?:[^']|'')*)'\s*$/;

function typeEqualityLiteral(input: Expression | Query | string): string | null {
  if (typeof input === 'string') {
    const match = TYPE_EQUALITY.exec(input);
    return match ? match[1].replace(/''/g, "'") : null;
  }

  const root = isQuery(input) ? input.root : input;
  if (
    root.kind === 'comparison' &&
    root.field.name === 'WorkflowType' &&
    !root.field.isCustom &&
    root.operator === 'EQ' &&
    root.operand.kind === 'scalar' &&
    typeof root.operand.value === 'string'
  ) {
    return root.operand.value;
  }
  return null;
}

/**
 * Fallback rendering for a query, or null when the rewrite does not apply
 */
export function fallbackQueryFor(input: Expression | Query | string): string | null {
  const literal = typeEqualityLiteral(input);
  if (!literal) {
    return null;
  }
  return render(makeComparison('WorkflowId', 'STARTS_WITH', literal, defaultRegistry));
}

/**
 * Count a query, falling back to a WorkflowId prefix once if a bare
 * WorkflowType equality matches nothing.
 * @throws the first validator finding as its error class when a string query is invalid
 */
export async function resolveWithFallback(
  input: Expression | Query | string,
  count: CountFn,
  options: ValidateOptions = {}
): Promise<FallbackResolution> {
  let primary: string;
  if (typeof input === 'string') {
    assertValidQuery(input, options);
    primary = input;
  } else {
    primary = render(input);
  }

  const primaryCount = await count(primary);
  const fallback = primaryCount === 0 ? fallbackQueryFor(input) : null;

  if (!fallback) {
    return {
      state: 'Primary',
      query: primary,
      count: primaryCount,
      found: primaryCount > 0,
      attempted: [primary],
    };
  }

  logger.info(`No match for "${primary}", retrying as "${fallback}"`, 'fallback');
  const fallbackCount = await count(fallback);
  const literal = typeEqualityLiteral(input) ?? '';

  return {
    state: 'FallbackById',
    query: fallback,
    count: fallbackCount,
    found: fallbackCount > 0,
    attempted: [primary, fallback],
    reason:
      fallbackCount > 0
        ? `WorkflowType '${literal}' not found, matched by WorkflowId prefix instead`
        : `Not found: neither "${primary}" nor "${fallback}" matched any execution`,
  };
}
