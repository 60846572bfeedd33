/**
 * Failed runs command
 *
 * wfscope failed-runs <workflowId>
 *
 * Counts runs of one workflow id that ended Failed. Works for running
 * workflows too: earlier failed runs stay visible.
 */

import { Command } from 'commander';
import { output, outputError } from '../utils/output.js';
import { withSpinner } from '../utils/spinner.js';
import { createContext } from './context.js';

export function createFailedRunsCommand(getConfigPath: () => string): Command {
  return new Command('failed-runs')
    .description('Count failed runs of a workflow id (retry analysis)')
    .argument('<workflowId>', 'Workflow ID')
    .action(async (workflowId: string) => {
      try {
        const { service } = await createContext(getConfigPath);
        const result = await withSpinner('Counting failed runs...', () => service.failedRuns(workflowId));

        output(result, `${result.failedCount} failed run(s) for ${workflowId}\n  query: ${result.query}`);
      } catch (error) {
        outputError('Failed to count failed runs', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });
}
