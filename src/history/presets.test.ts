/**
 * Tests for history presets
 */

import { describe, it, expect } from 'vitest';
import { SUMMARY_TYPES, expandPreset, findLastFailure } from './presets.js';
import { filterByType } from './pipeline.js';
import { ev, longHistory } from './__tests__/fixtures.js';

describe('findLastFailure', () => {
  it('finds the last *Failed event', () => {
    const events = longHistory(214, [50, 120, 200]);
    expect(findLastFailure(events)).toBe(199);
  });

  it('returns -1 without failures', () => {
    expect(findLastFailure(longHistory(20))).toBe(-1);
  });
});

describe('presets over a long history', () => {
  const events = longHistory(214, [50, 120, 200]);

  it('resets keeps only WorkflowTaskFailed', () => {
    const result = filterByType(events, { preset: 'resets' });
    expect(result.events).toEqual([]);
    expect(result.applied).toBe('preset=resets');
  });

  it('critical_path drops scheduling noise', () => {
    const result = filterByType(events, { preset: 'critical_path' });
    const types = new Set(result.events.map((e) => e.eventType));

    expect(types.has('TimerFired')).toBe(false);
    expect(types.has('WorkflowTaskStarted')).toBe(false);
    expect(types.has('ActivityTaskFailed')).toBe(true);
  });

  it('last_failure_context keeps the last failure and the events before it', () => {
    const result = filterByType(events, { preset: 'last_failure_context' });

    expect(result.events.map((e) => e.eventId)).toEqual([190, 191, 192, 193, 194, 195, 196, 197, 198, 199, 200]);
    expect(result.applied).toBe('preset=last_failure_context (event 200, 10 before)');
  });

  it('honours a custom failure context', () => {
    const result = filterByType(events, { preset: 'last_failure_context', failureContext: 2 });
    expect(result.events.map((e) => e.eventId)).toEqual([198, 199, 200]);
  });

  it('clips the context at the start of the history', () => {
    const short = [ev(1, 'WorkflowExecutionStarted'), ev(2, 'ActivityTaskFailed')];
    const result = filterByType(short, { preset: 'last_failure_context' });

    expect(result.events.map((e) => e.eventId)).toEqual([1, 2]);
    expect(result.applied).toBe('preset=last_failure_context (event 2, 1 before)');
  });
});

describe('last_failure_context without failures', () => {
  it('returns the same events as critical_path', () => {
    const events = longHistory(214);
    const fallback = filterByType(events, { preset: 'last_failure_context' });
    const critical = filterByType(events, { preset: 'critical_path' });

    expect(fallback.events).toEqual(critical.events);
    expect(fallback.applied).toBe('preset=last_failure_context (no failure found, using critical_path)');
  });
});

describe('summary preset', () => {
  it('keeps lifecycle and activity outcome events', () => {
    const events = [
      ev(1, 'WorkflowExecutionStarted'),
      ev(2, 'WorkflowTaskScheduled'),
      ev(3, 'ActivityTaskCompleted'),
      ev(4, 'TimerFired'),
      ev(5, 'WorkflowExecutionCompleted'),
    ];
    const expansion = expandPreset('summary', events);
    const result = filterByType(events, { preset: 'summary' });

    expect(expansion.applied).toBe('preset=summary');
    expect(result.events.map((e) => e.eventId)).toEqual([1, 3, 5]);
  });

  it('covers exactly the started, completed and failed class', () => {
    expect([...SUMMARY_TYPES].sort()).toEqual([
      'ActivityTaskCompleted',
      'ActivityTaskFailed',
      'ChildWorkflowExecutionStarted',
      'WorkflowExecutionCompleted',
      'WorkflowExecutionFailed',
      'WorkflowExecutionStarted',
    ]);
  });

  it('drops other terminal events', () => {
    const events = [
      ev(1, 'WorkflowExecutionStarted'),
      ev(2, 'ActivityTaskFailed'),
      ev(3, 'WorkflowExecutionTimedOut'),
      ev(4, 'WorkflowExecutionTerminated'),
      ev(5, 'WorkflowExecutionContinuedAsNew'),
    ];

    expect(filterByType(events, { preset: 'summary' }).events.map((e) => e.eventId)).toEqual([1, 2]);
  });
});
