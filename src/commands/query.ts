/**
 * Query commands
 *
 *   wfscope query build <file>        # JSON/YAML structured query -> filter string
 *   wfscope query validate <query>    # static checks, no server round trip
 *   wfscope query fields              # builtin + custom search attributes
 *   wfscope query examples
 */

import { Command } from 'commander';
import { BUILTIN_FIELDS, defaultRegistry, type TypeRegistry } from '../query/registry.js';
import { render } from '../query/renderer.js';
import { FIELD_TYPE_RULES, OPERATOR_SYNTAX } from '../query/types.js';
import { validateQuery, type QueryValidationResult } from '../query/validator.js';
import { output, outputError, outputTable } from '../utils/output.js';
import { loadConfig, readQueryInput } from './context.js';

export function formatFindings(query: string, result: QueryValidationResult): string {
  if (result.valid) {
    return `✓ Query is valid: ${query || '(empty: matches every execution)'}`;
  }

  const lines = [`✗ ${result.findings.length} problem(s) in: ${query}`];
  for (const finding of result.findings) {
    lines.push(`  - ${finding.kind} at char ${finding.position + 1}: ${finding.message}`);
    if (finding.suggestion) {
      lines.push(`      suggestion: ${finding.suggestion}`);
    }
  }
  return lines.join('\n');
}

export function fieldRows(registry: TypeRegistry): string[][] {
  return registry.list().map((field) => [
    field.name,
    field.type,
    field.isCustom ? 'custom' : 'builtin',
    [...FIELD_TYPE_RULES[field.type].operators].map((op) => OPERATOR_SYNTAX[op]).join(', '),
  ]);
}

const SYNTAX_EXAMPLES = [
  "WorkflowType = 'OrderFlow'",
  "WorkflowId STARTS_WITH 'order-'",
  "ExecutionStatus IN ('Failed', 'TimedOut')",
  "StartTime BETWEEN '2025-01-01T00:00:00Z' AND '2025-02-01T00:00:00Z'",
  "WorkflowType = 'OrderFlow' AND (ExecutionStatus = 'Failed' OR ExecutionStatus = 'TimedOut')",
  'CloseTime IS NULL',
];

export function createQueryCommand(getConfigPath: () => string): Command {
  const cmd = new Command('query')
    .description('Build and validate visibility queries');

  cmd
    .command('build')
    .description('Render a structured query file (JSON or YAML) to a filter string')
    .argument('<file>', 'Structured query document')
    .addHelpText('after', `
Document format:
  all:
    - { field: WorkflowType, operator: "=", value: OrderFlow }
    - any:
        - { field: ExecutionStatus, operator: "=", value: Failed }
        - { field: ExecutionStatus, operator: "=", value: TimedOut }
`)
    .action(async (file: string) => {
      try {
        await loadConfig(getConfigPath);
        const query = await readQueryInput(undefined, file);
        const rendered = typeof query === 'string' ? query : render(query);
        output({ query: rendered }, rendered);
      } catch (error) {
        outputError('Failed to build query', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });

  cmd
    .command('validate')
    .description('Check a filter string without contacting the server')
    .argument('<query>', 'Visibility query')
    .action(async (query: string) => {
      try {
        await loadConfig(getConfigPath);
        const result = validateQuery(query, { registry: defaultRegistry });

        output({ query, ...result }, formatFindings(query, result));
        if (!result.valid) {
          process.exit(1);
        }
      } catch (error) {
        outputError('Failed to validate query', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });

  cmd
    .command('fields')
    .description('List searchable fields and their operators')
    .action(async () => {
      try {
        await loadConfig(getConfigPath);
        outputTable(['Field', 'Type', 'Source', 'Operators'], fieldRows(defaultRegistry));
      } catch (error) {
        outputError('Failed to list fields', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });

  cmd
    .command('examples')
    .description('Show example queries')
    .action(() => {
      const fieldExamples = BUILTIN_FIELDS.flatMap((f) => f.examples ?? []);
      const lines = [
        'Syntax:',
        ...SYNTAX_EXAMPLES.map((e) => `  ${e}`),
        '',
        'Per field:',
        ...fieldExamples.map((e) => `  ${e}`),
        '',
        'Not supported: LIKE, CONTAINS, REGEX and % or * wildcards. Use STARTS_WITH.',
      ];
      output({ syntax: SYNTAX_EXAMPLES, fields: fieldExamples }, lines.join('\n'));
    });

  return cmd;
}
