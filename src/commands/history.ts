/**
 * History command
 *
 * wfscope history <workflowId> [--run-id <id>]
 *   [--preset summary|critical_path|last_failure_context|resets]
 *   [--include <types>] [--exclude <types>]
 *   [--projection minimal|standard|full]
 *   [--limit <n>] [--reverse] [--failure-context <n>] [--summary]
 */

import { Command, Option } from 'commander';
import { InvalidFilterSpecError } from '../errors.js';
import type { HistorySummary } from '../history/summary.js';
import { PRESETS, PROJECTIONS, type FilterSpec, type Preset, type ProjectedEvent, type Projection } from '../history/types.js';
import { output, outputError } from '../utils/output.js';
import { withSpinner } from '../utils/spinner.js';
import type { HistoryInspection } from '../workflow/service.js';
import { createContext } from './context.js';

interface HistoryOptions {
  runId?: string;
  preset?: string;
  include?: string[];
  exclude?: string[];
  projection?: string;
  limit?: number;
  reverse?: boolean;
  failureContext?: number;
  summary?: boolean;
}

function parseList(value: string, previous: string[] = []): string[] {
  return [...previous, ...value.split(',').map((s) => s.trim()).filter(Boolean)];
}

function parseInteger(flag: string, min: number) {
  return (value: string): number => {
    const n = Number(value);
    if (!Number.isSafeInteger(n) || n < min) {
      throw new InvalidFilterSpecError(`${flag} must be an integer >= ${min}, got '${value}'`);
    }
    return n;
  };
}

function toPreset(value: string | undefined): Preset | undefined {
  if (value === undefined) return undefined;
  const preset = PRESETS.find((p) => p === value);
  if (!preset) {
    throw new InvalidFilterSpecError(`Unknown preset '${value}' (expected one of: ${PRESETS.join(', ')})`);
  }
  return preset;
}

function toProjection(value: string | undefined): Projection | undefined {
  if (value === undefined) return undefined;
  const projection = PROJECTIONS.find((p) => p === value);
  if (!projection) {
    throw new InvalidFilterSpecError(
      `Unknown projection '${value}' (expected one of: ${PROJECTIONS.join(', ')})`
    );
  }
  return projection;
}

/**
 * Translate command-line options into a FilterSpec
 */
export function buildFilterSpec(options: HistoryOptions): FilterSpec {
  const spec: FilterSpec = {};
  const preset = toPreset(options.preset);
  const projection = toProjection(options.projection);

  if (preset) spec.preset = preset;
  if (projection) spec.projection = projection;
  if (options.include?.length) spec.includeTypes = options.include;
  if (options.exclude?.length) spec.excludeTypes = options.exclude;
  if (options.failureContext !== undefined) spec.failureContext = options.failureContext;
  if (options.limit !== undefined || options.reverse) {
    spec.window = { limit: options.limit, reverse: options.reverse ?? false };
  }
  return spec;
}

function renderEvent(event: ProjectedEvent): string[] {
  const parts = [
    String(event.eventId).padStart(5),
    (event.eventTime ?? '-').padEnd(24),
    event.eventType,
  ];
  if (event.primaryAttribute) {
    parts.push(`${event.primaryAttribute.name}=${event.primaryAttribute.value}`);
  }
  const lines = [parts.join('  ')];

  if (event.failureMessage) {
    lines.push(`        ✗ ${event.failureMessage}`);
  }
  for (const payload of event.decodedPayloads ?? []) {
    if (payload.decoded === null) continue;
    const suffix = payload.truncated ? ` … (${payload.originalLength} chars)` : '';
    for (const line of (payload.decoded + suffix).split('\n')) {
      lines.push(`        │ ${line}`);
    }
  }
  if (event.attributes) {
    for (const line of JSON.stringify(event.attributes, null, 2).split('\n')) {
      lines.push(`        ${line}`);
    }
  }
  return lines;
}

export function formatHistory(view: HistoryInspection): string {
  const lines = [
    `Workflow ${view.workflowId}${view.runId ? ` (run ${view.runId})` : ''}`,
    `  ${view.events.length} shown / ${view.matchedEvents} matched / ${view.totalEvents} total  [${view.typeFilter}]`,
    '',
  ];
  for (const event of view.events) {
    lines.push(...renderEvent(event));
  }
  if (view.warnings.length > 0) {
    lines.push('', `${view.warnings.length} payload(s) could not be decoded`);
  }
  return lines.join('\n');
}

export function formatSummary(workflowId: string, summary: HistorySummary): string {
  const lines = [
    `Workflow ${workflowId}: ${summary.outcome ?? 'Running'}`,
    `  ${summary.totalEvents} events`,
    '',
    'Timeline:',
    ...summary.timeline.map((e) => `  ${String(e.eventId).padStart(5)}  ${e.eventTime ?? '-'}  ${e.eventType}`),
  ];
  if (summary.failures.length > 0) {
    lines.push('', 'Failures:');
    for (const f of summary.failures) {
      lines.push(`  ${String(f.eventId).padStart(5)}  ${f.eventType}${f.message ? `: ${f.message}` : ''}`);
    }
  }
  if (summary.childWorkflows.length > 0) {
    lines.push('', 'Child workflows:');
    for (const c of summary.childWorkflows) {
      lines.push(`  ${String(c.eventId).padStart(5)}  ${c.workflowType ?? '?'}  ${c.workflowId ?? '?'}`);
    }
  }
  if (summary.signals.length > 0) {
    lines.push('', 'Signals:');
    for (const s of summary.signals) {
      lines.push(`  ${String(s.eventId).padStart(5)}  ${s.signalName ?? '?'}`);
    }
  }
  return lines.join('\n');
}

export function createHistoryCommand(getConfigPath: () => string): Command {
  return new Command('history')
    .description('Show a filtered, projected view of a workflow history')
    .argument('<workflowId>', 'Workflow ID')
    .option('-r, --run-id <id>', 'Run ID (default: latest run)')
    .addOption(new Option('-p, --preset <name>', 'Named event selection').choices([...PRESETS]))
    .option('-i, --include <types>', 'Event types to keep (comma-separated, repeatable)', parseList)
    .option('-x, --exclude <types>', 'Event types to drop (comma-separated, repeatable)', parseList)
    .addOption(new Option('--projection <level>', 'Fields per event').choices([...PROJECTIONS]))
    .option('-n, --limit <n>', 'Keep at most n events after filtering', parseInteger('--limit', 1))
    .option('--reverse', 'Most recent first')
    .option('--failure-context <n>', 'Events before the last failure (last_failure_context)', parseInteger('--failure-context', 0))
    .option('--summary', 'Show a compact summary instead of events')
    .action(async (workflowId: string, options: HistoryOptions) => {
      try {
        const { service } = await createContext(getConfigPath);

        if (options.summary) {
          const summary = await withSpinner('Fetching history...', () =>
            service.summarizeHistory(workflowId, options.runId)
          );
          output({ workflowId, ...summary }, formatSummary(workflowId, summary));
          return;
        }

        const spec = buildFilterSpec(options);
        const view = await withSpinner('Fetching history...', () =>
          service.inspectHistory(workflowId, options.runId, spec)
        );
        output(view, formatHistory(view));
      } catch (error) {
        outputError('Failed to read history', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });
}
