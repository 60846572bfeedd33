/**
 * History filter pipeline
 *
 * Fixed stage order, each producing a new array:
 *   1. type filter   (preset, else includeTypes, else excludeTypes)
 *   2. window        (reverse, then the first `limit`)
 *   3. projection    (minimal | standard | full)
 *   4. payload decode (standard and full only)
 *
 * Input events are never mutated.
 */

import { InvalidFilterSpecError, type DecodeWarning } from '../errors.js';
import { canonicalEventType, isKnownEventType } from './event-types.js';
import { decodePayloads, DEFAULT_PAYLOAD_MAX_LEN } from './payload.js';
import { DEFAULT_FAILURE_CONTEXT, expandPreset, type TypeSelection } from './presets.js';
import type { FilterSpec, HistoryWindow, ProjectedEvent, Projection, WorkflowEvent } from './types.js';
import { PRESETS, PROJECTIONS } from './types.js';

export interface PipelineOptions {
  /** Truncation length for decoded payloads */
  maxLen?: number;
  /** Decode payloads for standard/full projections (default true) */
  decode?: boolean;
}

export interface HistoryView {
  events: ProjectedEvent[];
  /** Events in the input history */
  totalEvents: number;
  /** Events left after the type filter, before the window */
  matchedEvents: number;
  warnings: DecodeWarning[];
  /** What the type filter did, e.g. "preset=resets" */
  typeFilter: string;
}

/** Attributes that identify what an event is about, by priority */
const PRIMARY_ATTRIBUTES = [
  'activityType',
  'signalName',
  'workflowType',
  'timerId',
  'markerName',
  'scheduledEventId',
  'startedEventId',
  'initiatedEventId',
];

/**
 * Validate a filter spec and normalize its type names
 * @throws InvalidFilterSpecError
 */
export function validateFilterSpec(spec: FilterSpec): FilterSpec {
  if (spec.preset !== undefined && !PRESETS.includes(spec.preset)) {
    throw new InvalidFilterSpecError(`Unknown preset '${spec.preset}' (expected one of: ${PRESETS.join(', ')})`);
  }
  if (spec.projection !== undefined && !PROJECTIONS.includes(spec.projection)) {
    throw new InvalidFilterSpecError(
      `Unknown projection '${spec.projection}' (expected one of: ${PROJECTIONS.join(', ')})`
    );
  }
  if (spec.failureContext !== undefined && (!Number.isSafeInteger(spec.failureContext) || spec.failureContext < 0)) {
    throw new InvalidFilterSpecError(`failureContext must be a non-negative integer, got ${spec.failureContext}`);
  }

  const include = normalizeTypes(spec.includeTypes, 'includeTypes');
  const exclude = normalizeTypes(spec.excludeTypes, 'excludeTypes');
  if (include && exclude && spec.preset === undefined) {
    throw new InvalidFilterSpecError('includeTypes and excludeTypes are mutually exclusive');
  }

  return {
    ...spec,
    ...(include ? { includeTypes: include } : {}),
    ...(exclude ? { excludeTypes: exclude } : {}),
  };
}

function normalizeTypes(types: readonly string[] | undefined, label: string): string[] | undefined {
  if (!types || types.length === 0) {
    return undefined;
  }
  const normalized = types.map(canonicalEventType);
  const unknown = normalized.filter((t) => !isKnownEventType(t));
  if (unknown.length > 0) {
    throw new InvalidFilterSpecError(`${label}: unknown event type(s) ${unknown.join(', ')}`);
  }
  return normalized;
}

function applySelection(events: readonly WorkflowEvent[], selection: TypeSelection): WorkflowEvent[] {
  const { include, exclude } = selection;
  if (include) {
    return events.filter((e) => include.has(e.eventType));
  }
  if (exclude) {
    return events.filter((e) => !exclude.has(e.eventType));
  }
  return [...events];
}

/**
 * Stage 1: type filter
 */
export function filterByType(
  events: readonly WorkflowEvent[],
  spec: FilterSpec
): { events: WorkflowEvent[]; applied: string } {
  if (spec.preset) {
    const expansion = expandPreset(spec.preset, events, spec.failureContext ?? DEFAULT_FAILURE_CONTEXT);
    return { events: applySelection(expansion.events, expansion.selection), applied: expansion.applied };
  }
  if (spec.includeTypes && spec.includeTypes.length > 0) {
    return {
      events: applySelection(events, { include: new Set(spec.includeTypes) }),
      applied: `include=${spec.includeTypes.join(',')}`,
    };
  }
  if (spec.excludeTypes && spec.excludeTypes.length > 0) {
    return {
      events: applySelection(events, { exclude: new Set(spec.excludeTypes) }),
      applied: `exclude=${spec.excludeTypes.join(',')}`,
    };
  }
  return { events: [...events], applied: 'none' };
}

/**
 * Stage 2: window
 */
export function applyWindow<T>(events: readonly T[], window: HistoryWindow = {}): T[] {
  const ordered = window.reverse ? [...events].reverse() : [...events];
  const limit = window.limit ?? 0;
  return limit > 0 ? ordered.slice(0, limit) : ordered;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** failure.message of the event attributes, when present */
export function failureMessage(attributes: Readonly<Record<string, unknown>>): string | undefined {
  const failure = attributes.failure;
  if (isRecord(failure) && typeof failure.message === 'string') {
    return failure.message;
  }
  return undefined;
}

/** First identifying attribute; named types ({ name }) are reduced to the name */
export function primaryAttribute(
  attributes: Readonly<Record<string, unknown>>
): { name: string; value: string | number } | undefined {
  for (const name of PRIMARY_ATTRIBUTES) {
    const value = attributes[name];
    if (typeof value === 'string' || typeof value === 'number') {
      return { name, value };
    }
    if (isRecord(value) && typeof value.name === 'string') {
      return { name, value: value.name };
    }
  }
  return undefined;
}

/**
 * Stage 3: projection
 */
export function projectEvent(event: WorkflowEvent, projection: Projection): ProjectedEvent {
  const projected: ProjectedEvent = {
    eventId: event.eventId,
    eventType: event.eventType,
    eventTime: event.eventTime,
  };
  if (projection === 'minimal') {
    return projected;
  }

  const message = failureMessage(event.attributes);
  if (message !== undefined) {
    projected.failureMessage = message;
  }
  const primary = primaryAttribute(event.attributes);
  if (primary) {
    projected.primaryAttribute = primary;
  }

  if (projection === 'full') {
    projected.attributes = event.attributes;
    projected.payloads = event.payloads;
  }
  return projected;
}

/**
 * Run the whole pipeline over a parsed history
 * @throws InvalidFilterSpecError before any stage runs
 */
export function runHistoryPipeline(
  events: readonly WorkflowEvent[],
  spec: FilterSpec = {},
  options: PipelineOptions = {}
): HistoryView {
  const normalized = validateFilterSpec(spec);
  const projection = normalized.projection ?? 'standard';
  const maxLen = options.maxLen ?? DEFAULT_PAYLOAD_MAX_LEN;
  const decode = options.decode ?? true;

  const filtered = filterByType(events, normalized);
  const windowed = applyWindow(filtered.events, normalized.window);

  const warnings: DecodeWarning[] = [];
  const projected = windowed.map((event) => {
    const view = projectEvent(event, projection);
    if (projection !== 'minimal' && decode && event.payloads.length > 0) {
      const result = decodePayloads(event.eventId, event.payloads, maxLen);
      view.decodedPayloads = result.payloads;
      warnings.push(...result.warnings);
    }
    return view;
  });

  return {
    events: projected,
    totalEvents: events.length,
    matchedEvents: filtered.events.length,
    warnings,
    typeFilter: filtered.applied,
  };
}
