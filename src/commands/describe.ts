/**
 * Describe and trace commands
 *
 * wfscope describe <workflowId> [--run-id <id>]   # execution info, pending activities
 * wfscope trace <workflowId> [--run-id <id>]      # stack trace of a running workflow
 * wfscope workflow-query <workflowId> --type <queryType> [--input <json>] [--run-id <id>]
 */

import { Command } from 'commander';
import { normalizeExecution } from '../temporal/client.js';
import { output, outputError } from '../utils/output.js';
import { withSpinner } from '../utils/spinner.js';
import { createContext } from './context.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatDescription(workflowId: string, description: Record<string, unknown>): string {
  const info = isRecord(description.workflowExecutionInfo) ? description.workflowExecutionInfo : description;
  const execution = normalizeExecution(info);
  if (!execution) {
    return `Workflow ${workflowId}\n${JSON.stringify(description, null, 2)}`;
  }

  const lines = [
    `Workflow ${execution.workflowId}`,
    `  Run ID:      ${execution.runId}`,
    `  Type:        ${execution.workflowType ?? '-'}`,
    `  Status:      ${execution.status ?? '-'}`,
    `  Task queue:  ${execution.taskQueue ?? '-'}`,
    `  Started:     ${execution.startTime ?? '-'}`,
    `  Closed:      ${execution.closeTime ?? '-'}`,
    `  Events:      ${execution.historyLength ?? '-'}`,
  ];

  const pending = description.pendingActivities;
  if (Array.isArray(pending) && pending.length > 0) {
    lines.push('', `Pending activities (${pending.length}):`);
    for (const activity of pending) {
      if (!isRecord(activity)) continue;
      const type = isRecord(activity.activityType) ? activity.activityType.name : undefined;
      const attempt = activity.attempt;
      lines.push(
        `  ${typeof activity.activityId === 'string' ? activity.activityId : '?'}  ${typeof type === 'string' ? type : '?'}` +
          (typeof attempt === 'number' ? `  attempt=${attempt}` : '')
      );
    }
  }
  return lines.join('\n');
}

export function formatTrace(trace: unknown): string {
  if (typeof trace === 'string') {
    return trace;
  }
  if (isRecord(trace) && typeof trace.queryResult === 'string') {
    return trace.queryResult;
  }
  if (isRecord(trace) && Array.isArray(trace.queryResult)) {
    return trace.queryResult.filter((s): s is string => typeof s === 'string').join('\n');
  }
  return JSON.stringify(trace, null, 2);
}

/** A single query result is printed bare; anything else as indented JSON */
export function formatQueryResult(result: unknown): string {
  const value = isRecord(result) && 'queryResult' in result ? result.queryResult : result;
  const single = Array.isArray(value) && value.length === 1 ? value[0] : value;
  if (typeof single === 'string') {
    return single;
  }
  return JSON.stringify(single, null, 2) ?? String(single);
}

export function parseQueryInput(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch (error) {
    throw new Error(`--input is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function createDescribeCommand(getConfigPath: () => string): Command {
  return new Command('describe')
    .description('Describe one workflow execution')
    .argument('<workflowId>', 'Workflow ID')
    .option('-r, --run-id <id>', 'Run ID (default: latest run)')
    .action(async (workflowId: string, options: { runId?: string }) => {
      try {
        const { client } = await createContext(getConfigPath);
        const description = await withSpinner('Describing workflow...', () =>
          client.describe(workflowId, options.runId)
        );
        output(description, formatDescription(workflowId, description));
      } catch (error) {
        outputError('Failed to describe workflow', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });
}

export function createTraceCommand(getConfigPath: () => string): Command {
  return new Command('trace')
    .description('Show the current stack trace of a running workflow')
    .argument('<workflowId>', 'Workflow ID')
    .option('-r, --run-id <id>', 'Run ID (default: latest run)')
    .action(async (workflowId: string, options: { runId?: string }) => {
      try {
        const { client } = await createContext(getConfigPath);
        const trace = await withSpinner('Querying stack trace...', () => client.stack(workflowId, options.runId));
        output({ workflowId, trace }, formatTrace(trace));
      } catch (error) {
        outputError('Failed to get stack trace', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });
}

export function createWorkflowQueryCommand(getConfigPath: () => string): Command {
  return new Command('workflow-query')
    .description('Run a query handler on a workflow')
    .argument('<workflowId>', 'Workflow ID')
    .requiredOption('-t, --type <queryType>', 'Query type registered by the workflow')
    .option('-i, --input <json>', 'Query argument as JSON')
    .option('-r, --run-id <id>', 'Run ID (default: latest run)')
    .action(async (workflowId: string, options: { type: string; input?: string; runId?: string }) => {
      try {
        const input = options.input === undefined ? undefined : parseQueryInput(options.input);
        const { client } = await createContext(getConfigPath);
        const result = await withSpinner(`Querying ${options.type}...`, () =>
          client.queryWorkflow(workflowId, options.type, input, options.runId)
        );
        output({ workflowId, queryType: options.type, result }, formatQueryResult(result));
      } catch (error) {
        outputError('Failed to query workflow', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });
}
