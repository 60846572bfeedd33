/**
 * Tests for structured (JSON/YAML) query documents
 */

import { describe, it, expect } from 'vitest';
import { buildStructuredQuery, loadStructuredQuery, parseOperator } from './structured.js';
import { TypeRegistry } from './registry.js';
import { render } from './renderer.js';

const registry = new TypeRegistry({ Priority: 'Int' });

describe('parseOperator', () => {
  it('accepts names, symbols and spaced keywords', () => {
    expect(parseOperator('EQ')).toBe('EQ');
    expect(parseOperator('>=')).toBe('GTE');
    expect(parseOperator('starts_with')).toBe('STARTS_WITH');
    expect(parseOperator('is  null')).toBe('IS_NULL');
    expect(parseOperator('IS NOT NULL')).toBe('IS_NOT_NULL');
  });

  it('returns null for unsupported operators', () => {
    expect(parseOperator('LIKE')).toBeNull();
    expect(parseOperator('<>')).toBeNull();
  });
});

describe('loadStructuredQuery', () => {
  it('builds a nested YAML document', () => {
    const yaml = [
      'all:',
      '  - { field: WorkflowType, operator: STARTS_WITH, value: order }',
      '  - any:',
      '      - { field: ExecutionStatus, operator: "=", value: Failed }',
      '      - { field: ExecutionStatus, operator: "=", value: TimedOut }',
      '    grouped: true',
    ].join('\n');

    const result = loadStructuredQuery(yaml, registry);
    if (!result.ok) throw new Error(JSON.stringify(result.errors));

    expect(render(result.query)).toBe(
      "WorkflowType STARTS_WITH 'order' AND (ExecutionStatus = 'Failed' OR ExecutionStatus = 'TimedOut')"
    );
  });

  it('accepts JSON and bare conditions', () => {
    const result = loadStructuredQuery(
      '{"field": "ExecutionStatus", "operator": "IN", "value": ["Failed", "TimedOut"]}',
      registry
    );
    if (!result.ok) throw new Error(JSON.stringify(result.errors));

    expect(render(result.query)).toBe("ExecutionStatus IN ('Failed', 'TimedOut')");
  });

  it('uses custom fields from the registry', () => {
    const result = loadStructuredQuery('{ field: Priority, operator: ">", value: 3 }', registry);
    if (!result.ok) throw new Error(JSON.stringify(result.errors));

    expect(render(result.query)).toBe('Priority > 3');
  });

  it('collapses a single-child list to the child', () => {
    const result = buildStructuredQuery({ all: [{ field: 'WorkflowId', operator: '=', value: 'a' }] }, registry);
    if (!result.ok) throw new Error(JSON.stringify(result.errors));

    expect(result.query.root.kind).toBe('comparison');
  });

  it('reports unparseable documents', () => {
    const result = loadStructuredQuery('all: [', registry);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].path).toBe('$');
      expect(result.errors[0].message).toMatch(/^Invalid document: /);
    }
  });

  it('reports unknown operators with their path', () => {
    const result = buildStructuredQuery({ field: 'WorkflowId', operator: 'LIKE', value: 'a%' }, registry);

    expect(result).toEqual({
      ok: false,
      errors: [{ path: '$.operator', message: "unknown operator 'LIKE'" }],
    });
  });

  it('reports construction errors at the nested path', () => {
    const result = buildStructuredQuery(
      {
        any: [
          { field: 'WorkflowId', operator: '=', value: 'a' },
          { field: 'Nope', operator: '=', value: 'b' },
        ],
      },
      registry
    );

    expect(result).toEqual({
      ok: false,
      errors: [{ path: '$.any[1]', message: "Unknown field 'Nope'" }],
    });
  });

  it('rejects empty lists and malformed conditions', () => {
    expect(buildStructuredQuery({ all: [] }, registry)).toEqual({
      ok: false,
      errors: [{ path: '$.all', message: 'must be a non-empty array' }],
    });
    expect(buildStructuredQuery({ field: 'WorkflowId' }, registry)).toEqual({
      ok: false,
      errors: [{ path: '$', message: "condition needs string 'field' and 'operator' (or an 'all'/'any' list)" }],
    });
  });

  it('rejects object values', () => {
    const result = buildStructuredQuery({ field: 'WorkflowId', operator: '=', value: { a: 1 } }, registry);

    expect(result).toEqual({
      ok: false,
      errors: [{ path: '$.value', message: 'value must be a string, number, boolean or a list of them' }],
    });
  });
});
