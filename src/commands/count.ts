/**
 * Count command
 *
 * wfscope count [query] [--file <doc>] [--no-fallback]
 *
 * A bare WorkflowType equality that counts 0 is retried once as a
 * WorkflowId prefix (workflow ids are often derived from the type name).
 */

import { Command } from 'commander';
import { render } from '../query/renderer.js';
import { assertValidQuery } from '../query/validator.js';
import type { FallbackResolution } from '../query/fallback.js';
import { output, outputError } from '../utils/output.js';
import { withSpinner } from '../utils/spinner.js';
import { createContext, readQueryInput } from './context.js';

export function formatCount(resolution: FallbackResolution): string {
  const shown = resolution.query || '(all executions)';
  if (resolution.state === 'FallbackById') {
    return resolution.found
      ? `${resolution.count} execution(s) match ${shown}\n  (${resolution.reason})`
      : `${resolution.reason}`;
  }
  return `${resolution.count} execution(s) match ${shown}`;
}

export function createCountCommand(getConfigPath: () => string): Command {
  return new Command('count')
    .description('Count workflow executions matching a query')
    .argument('[query]', 'Visibility query (empty counts every execution)')
    .option('-f, --file <path>', 'Structured query document (JSON or YAML)')
    .option('--no-fallback', 'Do not retry a zero-count WorkflowType query as a WorkflowId prefix')
    .action(async (queryArg: string | undefined, options: { file?: string; fallback: boolean }) => {
      try {
        const { client, service, registry } = await createContext(getConfigPath);
        const query = await readQueryInput(queryArg, options.file);

        let resolution: FallbackResolution;
        if (options.fallback) {
          resolution = await withSpinner('Counting executions...', () => service.countWithFallback(query));
        } else {
          const rendered = typeof query === 'string' ? query : render(query);
          assertValidQuery(rendered, { registry });
          const count = await withSpinner('Counting executions...', () => client.count(rendered));
          resolution = { state: 'Primary', query: rendered, count, found: count > 0, attempted: [rendered] };
        }

        output(resolution, formatCount(resolution));
      } catch (error) {
        outputError('Failed to count executions', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });
}
