/**
 * Event model
 *
 * Parses raw `temporal workflow show -o json` records into WorkflowEvents.
 * A history is either { "events": [...] } or a bare array.
 */

import { MalformedEventError } from '../errors.js';
import { canonicalEventType } from './event-types.js';
import type { WorkflowEvent } from './types.js';

const ATTRIBUTES_SUFFIX = 'EventAttributes';
const NUMERIC_ID = /^\d+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEventId(value: unknown): number | null {
  if (typeof value === 'number' && Number.isSafeInteger(value) && value > 0) {
    return value;
  }
  if (typeof value === 'string' && NUMERIC_ID.test(value)) {
    const id = Number(value);
    return Number.isSafeInteger(id) && id > 0 ? id : null;
  }
  return null;
}

function findAttributes(record: Record<string, unknown>): Record<string, unknown> {
  for (const [key, value] of Object.entries(record)) {
    if (key.endsWith(ATTRIBUTES_SUFFIX) && isRecord(value)) {
      return value;
    }
  }
  return isRecord(record.attributes) ? record.attributes : {};
}

/**
 * Every payloads[].data string below a value, depth first in key order
 */
export function collectPayloads(value: unknown, out: string[] = []): string[] {
  if (Array.isArray(value)) {
    for (const item of value) {
      collectPayloads(item, out);
    }
    return out;
  }
  if (!isRecord(value)) {
    return out;
  }

  for (const [key, child] of Object.entries(value)) {
    if (key === 'payloads' && Array.isArray(child)) {
      for (const payload of child) {
        if (isRecord(payload) && typeof payload.data === 'string') {
          out.push(payload.data);
        }
      }
    } else {
      collectPayloads(child, out);
    }
  }
  return out;
}

/**
 * Parse one raw event record
 * @param position - Index in the raw sequence, used when the id itself is missing
 * @throws MalformedEventError when eventId or eventType is missing
 */
export function parseEvent(raw: unknown, position: number): WorkflowEvent {
  if (!isRecord(raw)) {
    throw new MalformedEventError(`#${position}`, 'record is not an object');
  }

  const eventId = parseEventId(raw.eventId);
  if (eventId === null) {
    throw new MalformedEventError(
      `#${position}`,
      raw.eventId === undefined ? 'missing eventId' : `invalid eventId ${JSON.stringify(raw.eventId)}`
    );
  }

  if (typeof raw.eventType !== 'string' || raw.eventType === '') {
    throw new MalformedEventError(String(eventId), 'missing eventType');
  }

  const attributes = findAttributes(raw);

  const event: WorkflowEvent = {
    eventId,
    eventType: canonicalEventType(raw.eventType),
    eventTime: typeof raw.eventTime === 'string' ? raw.eventTime : null,
    attributes,
    payloads: Object.freeze(collectPayloads(attributes)),
  };
  return Object.freeze(event);
}

/**
 * Parse a full history
 * @throws MalformedEventError for a malformed record or a non-increasing eventId
 */
export function parseHistory(raw: unknown): WorkflowEvent[] {
  const records = Array.isArray(raw) ? raw : isRecord(raw) && Array.isArray(raw.events) ? raw.events : null;
  if (!records) {
    throw new MalformedEventError('<history>', 'expected an array of events or { "events": [...] }');
  }

  const events: WorkflowEvent[] = [];
  let previous = 0;

  records.forEach((record, position) => {
    const event = parseEvent(record, position);
    if (event.eventId <= previous) {
      throw new MalformedEventError(
        String(event.eventId),
        `eventId must be strictly increasing (follows ${previous})`
      );
    }
    previous = event.eventId;
    events.push(event);
  });

  return events;
}
