/**
 * Workflow inspection service
 *
 * Composes the query engine, the history pipeline and a WorkflowSource:
 *   validate -> count (with fallback) -> scope -> list
 *   fetch -> parse -> filter/project/decode
 */

import { parseHistory } from '../history/event.js';
import { runHistoryPipeline, type HistoryView } from '../history/pipeline.js';
import { summarizeHistory, type HistorySummary } from '../history/summary.js';
import type { FilterSpec } from '../history/types.js';
import { and, makeComparison } from '../query/expression.js';
import { resolveWithFallback, type FallbackResolution } from '../query/fallback.js';
import { defaultRegistry, type TypeRegistry } from '../query/registry.js';
import { render } from '../query/renderer.js';
import { decide, type ScopeDecision } from '../query/scope.js';
import type { Expression, Query } from '../query/types.js';
import type { WorkflowExecution, WorkflowSource } from '../temporal/types.js';
import { logger } from '../utils/logger.js';

export interface WorkflowServiceOptions {
  maxLimit: number;
  payloadMaxLen: number;
  failureContext: number;
  registry?: TypeRegistry;
}

export interface ScopedList {
  resolution: FallbackResolution;
  decision: ScopeDecision;
  executions: WorkflowExecution[];
}

export interface HistoryInspection extends HistoryView {
  workflowId: string;
  runId?: string;
}

export interface FailedRuns {
  workflowId: string;
  failedCount: number;
  query: string;
}

export class WorkflowService {
  private readonly registry: TypeRegistry;

  constructor(
    private readonly source: WorkflowSource,
    private readonly options: WorkflowServiceOptions
  ) {
    this.registry = options.registry ?? defaultRegistry;
  }

  /**
   * Count matching executions, retrying a zero-count type equality as an id prefix
   */
  countWithFallback(query: Expression | Query | string): Promise<FallbackResolution> {
    return resolveWithFallback(query, (q) => this.source.count(q), { registry: this.registry });
  }

  /**
   * Count first, then list at most min(limit, maxLimit) executions
   * @param limit - Caller's cap; values above maxLimit are clamped
   */
  async listScoped(query: Expression | Query | string, limit?: number): Promise<ScopedList> {
    const resolution = await this.countWithFallback(query);
    const cap = Math.min(limit && limit > 0 ? limit : this.options.maxLimit, this.options.maxLimit);
    const decision = decide(resolution.count, cap);

    if (decision.strategy === 'Sampled') {
      logger.info(`${resolution.count} executions match, listing the first ${decision.limit}`, 'scope');
    }

    const executions =
      decision.strategy === 'Empty' ? [] : await this.source.list(resolution.query, decision.limit);

    return { resolution, decision, executions };
  }

  /**
   * Fetch, parse and run a history through the filter pipeline
   * @throws MalformedEventError, InvalidFilterSpecError
   */
  async inspectHistory(workflowId: string, runId: string | undefined, spec: FilterSpec): Promise<HistoryInspection> {
    const raw = await this.source.fetchEvents(workflowId, runId);
    const events = parseHistory(raw);
    const view = runHistoryPipeline(
      events,
      { ...spec, failureContext: spec.failureContext ?? this.options.failureContext },
      { maxLen: this.options.payloadMaxLen }
    );

    for (const warning of view.warnings) {
      logger.warn(warning.message, 'payload');
    }

    return { workflowId, ...(runId ? { runId } : {}), ...view };
  }

  async summarizeHistory(workflowId: string, runId?: string): Promise<HistorySummary> {
    const raw = await this.source.fetchEvents(workflowId, runId);
    return summarizeHistory(parseHistory(raw));
  }

  /**
   * Number of failed runs recorded for one workflow id (retry storms show up here)
   */
  async failedRuns(workflowId: string): Promise<FailedRuns> {
    const query = render(
      and(
        makeComparison('WorkflowId', 'EQ', workflowId, this.registry),
        makeComparison('ExecutionStatus', 'EQ', 'Failed', this.registry)
      )
    );
    const failedCount = await this.source.count(query);
    return { workflowId, failedCount, query };
  }
}
