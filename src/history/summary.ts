/**
 * History summary
 *
 * One pass over a parsed history: event counts, execution timeline,
 * failures, child workflows and signals.
 */

import { isFailureType } from './event-types.js';
import { failureMessage } from './pipeline.js';
import type { WorkflowEvent } from './types.js';

const TIMELINE_TYPES = new Set([
  'WorkflowExecutionStarted',
  'WorkflowExecutionCompleted',
  'WorkflowExecutionFailed',
  'WorkflowExecutionTerminated',
  'WorkflowExecutionTimedOut',
  'WorkflowExecutionCanceled',
  'WorkflowExecutionContinuedAsNew',
]);

const SIGNAL_TYPES = new Set([
  'WorkflowExecutionSignaled',
  'SignalExternalWorkflowExecutionInitiated',
  'SignalExternalWorkflowExecutionFailed',
  'ExternalWorkflowExecutionSignaled',
]);

export interface TimelineEntry {
  eventId: number;
  eventType: string;
  eventTime: string | null;
}

export interface FailureEntry extends TimelineEntry {
  message?: string;
}

export interface ChildWorkflowEntry {
  eventId: number;
  workflowId?: string;
  workflowType?: string;
  eventTime: string | null;
}

export interface SignalEntry extends TimelineEntry {
  signalName?: string;
}

export interface HistorySummary {
  totalEvents: number;
  /** Count per event type, in first-seen order */
  eventTypes: Record<string, number>;
  timeline: TimelineEntry[];
  failures: FailureEntry[];
  childWorkflows: ChildWorkflowEntry[];
  signals: SignalEntry[];
  /** Type of the last timeline event (Completed, Failed, ...), or null while running */
  outcome: string | null;
}

function stringAt(record: Readonly<Record<string, unknown>>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function nameAt(record: Readonly<Record<string, unknown>>, key: string): string | undefined {
  const value = record[key];
  if (typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string') {
    return value.name;
  }
  return undefined;
}

export function summarizeHistory(events: readonly WorkflowEvent[]): HistorySummary {
  const summary: HistorySummary = {
    totalEvents: events.length,
    eventTypes: {},
    timeline: [],
    failures: [],
    childWorkflows: [],
    signals: [],
    outcome: null,
  };

  for (const event of events) {
    const { eventId, eventType, eventTime, attributes } = event;
    summary.eventTypes[eventType] = (summary.eventTypes[eventType] ?? 0) + 1;

    if (TIMELINE_TYPES.has(eventType)) {
      summary.timeline.push({ eventId, eventType, eventTime });
      if (eventType !== 'WorkflowExecutionStarted') {
        summary.outcome = eventType.replace('WorkflowExecution', '');
      }
    }

    if (isFailureType(eventType)) {
      const message = failureMessage(attributes);
      summary.failures.push({ eventId, eventType, eventTime, ...(message !== undefined ? { message } : {}) });
    }

    if (eventType === 'StartChildWorkflowExecutionInitiated') {
      const workflowId = stringAt(attributes, 'workflowId');
      const workflowType = nameAt(attributes, 'workflowType');
      summary.childWorkflows.push({
        eventId,
        eventTime,
        ...(workflowId !== undefined ? { workflowId } : {}),
        ...(workflowType !== undefined ? { workflowType } : {}),
      });
    }

    if (SIGNAL_TYPES.has(eventType)) {
      const signalName = stringAt(attributes, 'signalName');
      summary.signals.push({ eventId, eventType, eventTime, ...(signalName !== undefined ? { signalName } : {}) });
    }
  }

  return summary;
}
