/**
 * Scope advisor
 *
 * Count before list: turns a cardinality into a bounded list request.
 */

export type ScopeStrategy = 'Empty' | 'Full' | 'Sampled';

export interface ScopeDecision {
  limit: number;
  strategy: ScopeStrategy;
}

/**
 * Decide how many executions to list
 * @param count - Number of matching executions
 * @param maxLimit - Largest list request allowed
 */
export function decide(count: number, maxLimit: number): ScopeDecision {
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new RangeError(`count must be a non-negative integer, got ${count}`);
  }
  if (!Number.isSafeInteger(maxLimit) || maxLimit < 1) {
    throw new RangeError(`maxLimit must be a positive integer, got ${maxLimit}`);
  }

  if (count === 0) {
    return { limit: 0, strategy: 'Empty' };
  }
  if (count <= maxLimit) {
    return { limit: count, strategy: 'Full' };
  }
  // Caller keeps the true count for explicit pagination
  return { limit: maxLimit, strategy: 'Sampled' };
}
