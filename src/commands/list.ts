/**
 * List command
 *
 * wfscope list [query] [--file <doc>] [--limit <n>]
 *
 * Always counts first; never asks for more than query.maxLimit rows.
 */

import { Command } from 'commander';
import type { WorkflowExecution } from '../temporal/types.js';
import { output, outputError, outputTable, getOutputOptions } from '../utils/output.js';
import { withSpinner } from '../utils/spinner.js';
import type { ScopedList } from '../workflow/service.js';
import { createContext, readQueryInput } from './context.js';

export function executionRows(executions: WorkflowExecution[]): string[][] {
  return executions.map((e) => [
    e.workflowId,
    e.runId,
    e.workflowType ?? '-',
    e.status ?? '-',
    e.startTime ?? '-',
    e.closeTime ?? '-',
  ]);
}

/** Line printed after the table: how the result relates to the full match count */
export function scopeNote(result: ScopedList): string {
  const { resolution, decision } = result;
  const lines: string[] = [];
  if (resolution.state === 'FallbackById' && resolution.reason) {
    lines.push(resolution.reason);
  }
  switch (decision.strategy) {
    case 'Empty':
      lines.push(`No executions match ${resolution.query || '(all executions)'}`);
      break;
    case 'Full':
      lines.push(`${decision.limit} execution(s)`);
      break;
    case 'Sampled':
      lines.push(`Showing ${decision.limit} of ${resolution.count} executions (narrow the query to see the rest)`);
      break;
  }
  return lines.join('\n');
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isSafeInteger(limit) || limit < 1) {
    throw new Error(`--limit must be a positive integer, got '${value}'`);
  }
  return limit;
}

export function createListCommand(getConfigPath: () => string): Command {
  return new Command('list')
    .description('List workflow executions (counted first, bounded by query.maxLimit)')
    .argument('[query]', 'Visibility query')
    .option('-f, --file <path>', 'Structured query document (JSON or YAML)')
    .option('-n, --limit <n>', 'Maximum rows (capped at query.maxLimit)', parseLimit)
    .action(async (queryArg: string | undefined, options: { file?: string; limit?: number }) => {
      try {
        const { service } = await createContext(getConfigPath);
        const query = await readQueryInput(queryArg, options.file);

        const result = await withSpinner('Listing executions...', () => service.listScoped(query, options.limit));

        if (getOutputOptions().json) {
          output({
            query: result.resolution.query,
            fallback: result.resolution.state === 'FallbackById',
            total: result.resolution.count,
            strategy: result.decision.strategy,
            executions: result.executions,
          });
          return;
        }

        if (result.executions.length > 0) {
          outputTable(['WorkflowId', 'RunId', 'Type', 'Status', 'Start', 'Close'], executionRows(result.executions));
          console.log();
        }
        console.log(scopeNote(result));
      } catch (error) {
        outputError('Failed to list executions', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });
}
