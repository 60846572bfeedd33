/**
 * History presets
 *
 * A preset expands to a concrete include/exclude set; last_failure_context
 * additionally cuts the history to the window around the last failure.
 */

import { isFailureType } from './event-types.js';
import type { Preset, WorkflowEvent } from './types.js';

export const DEFAULT_FAILURE_CONTEXT = 10;

export const SUMMARY_TYPES: readonly string[] = [
  'WorkflowExecutionStarted',
  'WorkflowExecutionCompleted',
  'WorkflowExecutionFailed',
  'ChildWorkflowExecutionStarted',
  'ActivityTaskCompleted',
  'ActivityTaskFailed',
];

/** Scheduling noise dropped by critical_path */
export const NOISE_TYPES: readonly string[] = [
  'TimerFired',
  'TimerStarted',
  'MarkerRecorded',
  'WorkflowTaskScheduled',
  'WorkflowTaskStarted',
];

export const RESET_TYPES: readonly string[] = ['WorkflowTaskFailed'];

export interface TypeSelection {
  include?: ReadonlySet<string>;
  exclude?: ReadonlySet<string>;
}

export interface PresetExpansion {
  /** Events the type selection runs over */
  events: readonly WorkflowEvent[];
  selection: TypeSelection;
  /** Human-readable description of what was applied */
  applied: string;
}

/** Index of the last *Failed event, scanning tail to head */
export function findLastFailure(events: readonly WorkflowEvent[]): number {
  for (let i = events.length - 1; i >= 0; i--) {
    if (isFailureType(events[i].eventType)) {
      return i;
    }
  }
  return -1;
}

function criticalPath(events: readonly WorkflowEvent[]): PresetExpansion {
  return {
    events,
    selection: { exclude: new Set(NOISE_TYPES) },
    applied: 'preset=critical_path',
  };
}

/**
 * Expand a preset over a history
 * @param failureContext - Events kept before the last failure (default 10)
 */
export function expandPreset(
  preset: Preset,
  events: readonly WorkflowEvent[],
  failureContext: number = DEFAULT_FAILURE_CONTEXT
): PresetExpansion {
  switch (preset) {
    case 'summary':
      return { events, selection: { include: new Set(SUMMARY_TYPES) }, applied: 'preset=summary' };

    case 'critical_path':
      return criticalPath(events);

    case 'resets':
      return { events, selection: { include: new Set(RESET_TYPES) }, applied: 'preset=resets' };

    case 'last_failure_context': {
      const last = findLastFailure(events);
      if (last === -1) {
        // No failure: same events as critical_path
        return {
          ...criticalPath(events),
          applied: 'preset=last_failure_context (no failure found, using critical_path)',
        };
      }
      const start = Math.max(0, last - Math.max(0, failureContext));
      return {
        events: events.slice(start, last + 1),
        selection: {},
        applied: `preset=last_failure_context (event ${events[last].eventId}, ${last - start} before)`,
      };
    }
  }
}
