/**
 * Synthetic histories for history tests
 */

import type { WorkflowEvent } from '../types.js';

export function ev(
  eventId: number,
  eventType: string,
  attributes: Record<string, unknown> = {},
  payloads: string[] = []
): WorkflowEvent {
  return {
    eventId,
    eventType,
    eventTime: `2025-01-01T00:00:${String(eventId % 60).padStart(2, '0')}Z`,
    attributes,
    payloads,
  };
}

export function b64(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64');
}

const CYCLE = [
  'WorkflowTaskScheduled',
  'WorkflowTaskStarted',
  'WorkflowTaskCompleted',
  'ActivityTaskScheduled',
  'ActivityTaskStarted',
  'ActivityTaskCompleted',
  'TimerStarted',
  'TimerFired',
];

/**
 * History of `length` events; the given ids become ActivityTaskFailed
 */
export function longHistory(length: number, failedIds: number[] = []): WorkflowEvent[] {
  const failed = new Set(failedIds);
  const events: WorkflowEvent[] = [ev(1, 'WorkflowExecutionStarted')];
  for (let id = 2; id <= length; id++) {
    events.push(
      failed.has(id)
        ? ev(id, 'ActivityTaskFailed', { failure: { message: `attempt ${id} failed` } })
        : ev(id, CYCLE[(id - 2) % CYCLE.length])
    );
  }
  return events;
}
