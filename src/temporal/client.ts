/**
 * temporal CLI client
 *
 * Implements the count / list / fetchEvents collaborators over the
 * temporal binary, parsing its JSON output.
 */

import { TemporalCliError } from '../errors.js';
import type { TemporalSettings } from '../types/config.js';
import { enumName } from '../utils/case.js';
import { logger } from '../utils/logger.js';
import { TemporalCommandBuilder } from './command-builder.js';
import { ProcessExecutor } from './executor.js';
import type { CommandExecutor, WorkflowExecution, WorkflowSource } from './types.js';

const STATUS_PREFIX = 'WORKFLOW_EXECUTION_STATUS_';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' && value !== '' ? value : null;
}

function integerOrNull(value: unknown): number | null {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof n === 'number' && Number.isSafeInteger(n) ? n : null;
}

/**
 * Parse CLI output: one JSON document, or one JSON value per line
 * @returns undefined for empty output
 */
export function parseJsonOutput(stdout: string): unknown {
  const text = stdout.trim();
  if (text === '') {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    const lines = text.split('\n').map((l) => l.trim()).filter(Boolean);
    if (lines.length < 2) {
      throw error;
    }
    return lines.map((line) => JSON.parse(line));
  }
}

/** Execution status as used in queries: WORKFLOW_EXECUTION_STATUS_TIMED_OUT -> TimedOut */
export function normalizeStatus(value: unknown): string | null {
  if (typeof value !== 'string' || value === '' || value.endsWith('UNSPECIFIED')) {
    return null;
  }
  return enumName(value, STATUS_PREFIX);
}

/**
 * One list row; accepts the nested ({ execution: { workflowId } }) and the flat shape
 */
export function normalizeExecution(raw: unknown): WorkflowExecution | null {
  if (!isRecord(raw)) {
    return null;
  }
  const execution = isRecord(raw.execution) ? raw.execution : raw;
  const workflowId = stringOrNull(execution.workflowId);
  if (!workflowId) {
    return null;
  }

  const type = isRecord(raw.type) ? raw.type.name : raw.workflowType;

  return {
    workflowId,
    runId: stringOrNull(execution.runId) ?? '',
    workflowType: stringOrNull(isRecord(type) ? type.name : type),
    status: normalizeStatus(raw.status),
    startTime: stringOrNull(raw.startTime),
    closeTime: stringOrNull(raw.closeTime),
    taskQueue: stringOrNull(raw.taskQueue),
    historyLength: integerOrNull(raw.historyLength),
  };
}

export class TemporalClient implements WorkflowSource {
  private readonly builder: TemporalCommandBuilder;

  constructor(
    private readonly settings: TemporalSettings,
    private readonly executor: CommandExecutor = new ProcessExecutor()
  ) {
    this.builder = new TemporalCommandBuilder(settings);
  }

  /**
   * Run one workflow subcommand and parse its JSON output
   * @throws TemporalCliError on a non-zero exit or unparseable output
   */
  async run(workflowArgs: string[]): Promise<unknown> {
    const spec = this.builder.build(workflowArgs);
    const argv = [spec.command, ...spec.args];
    logger.info(`$ ${argv.join(' ')}`, 'temporal');

    const result = await this.executor.execute(spec, this.settings.timeoutMs);

    if (result.exitCode !== 0) {
      const detail = result.stderr.trim().split('\n')[0] || `exit code ${result.exitCode}`;
      throw new TemporalCliError(
        `temporal ${workflowArgs.slice(0, 2).join(' ')} failed: ${detail}`,
        argv,
        result.exitCode,
        result.stderr
      );
    }

    try {
      return parseJsonOutput(result.stdout);
    } catch (error) {
      throw new TemporalCliError(
        `Failed to parse JSON output from temporal: ${error instanceof Error ? error.message : String(error)}`,
        argv,
        result.exitCode,
        result.stderr
      );
    }
  }

  async count(query: string): Promise<number> {
    const args = this.builder.count(query);
    const data = await this.run(args);
    const count = isRecord(data) ? integerOrNull(data.count) : null;
    if (count === null || count < 0) {
      throw new TemporalCliError(
        `Unexpected count output: ${JSON.stringify(data)}`,
        [this.settings.binary, ...args],
        0
      );
    }
    return count;
  }

  async list(query: string, limit: number): Promise<WorkflowExecution[]> {
    const data = await this.run(this.builder.list(query, limit));
    const rows = Array.isArray(data) ? data : data === undefined ? [] : [data];

    const executions: WorkflowExecution[] = [];
    for (const row of rows) {
      const execution = normalizeExecution(row);
      if (execution) {
        executions.push(execution);
      } else {
        logger.warn(`Skipping unrecognized list row: ${JSON.stringify(row)}`, 'temporal');
      }
    }
    return executions;
  }

  async fetchEvents(workflowId: string, runId?: string): Promise<unknown[]> {
    const data = await this.run(this.builder.show(workflowId, runId));
    if (Array.isArray(data)) {
      return data;
    }
    if (isRecord(data) && Array.isArray(data.events)) {
      return data.events;
    }
    throw new TemporalCliError(
      `Unexpected history output for workflow '${workflowId}'`,
      [this.settings.binary, ...this.builder.show(workflowId, runId)],
      0
    );
  }

  async describe(workflowId: string, runId?: string): Promise<Record<string, unknown>> {
    const data = await this.run(this.builder.describe(workflowId, runId));
    return isRecord(data) ? data : {};
  }

  /** Current stack trace of a running workflow (raw CLI output) */
  async stack(workflowId: string, runId?: string): Promise<unknown> {
    return this.run(this.builder.stack(workflowId, runId));
  }

  /** Run a query handler on a workflow; the result is returned as the CLI printed it */
  async queryWorkflow(workflowId: string, queryType: string, input?: unknown, runId?: string): Promise<unknown> {
    const inputJson = input === undefined ? undefined : JSON.stringify(input);
    return this.run(this.builder.query(workflowId, queryType, inputJson, runId));
  }
}
