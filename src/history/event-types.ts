/**
 * History event type vocabulary
 *
 * The list ships as data/event-types.json. Both spellings found in
 * `temporal -o json` output are accepted:
 *   EVENT_TYPE_ACTIVITY_TASK_FAILED -> ActivityTaskFailed
 */

import { createRequire } from 'module';
import { enumName } from '../utils/case.js';

const require = createRequire(import.meta.url);

function loadEventTypes(): readonly string[] {
  const data: unknown = require('../../data/event-types.json');
  if (!Array.isArray(data) || !data.every((t): t is string => typeof t === 'string')) {
    throw new Error('data/event-types.json must be an array of strings');
  }
  return Object.freeze(data);
}

export const EVENT_TYPES: readonly string[] = loadEventTypes();

const KNOWN = new Set(EVENT_TYPES);

const SCREAMING_PREFIX = 'EVENT_TYPE_';

export function isKnownEventType(type: string): boolean {
  return KNOWN.has(type);
}

/**
 * Canonical PascalCase event type
 * Unknown types pass through converted but unchecked (newer servers add types).
 */
export function canonicalEventType(type: string): string {
  return enumName(type, SCREAMING_PREFIX);
}

/** Event types of the *Failed taxonomy */
export function isFailureType(type: string): boolean {
  return type.endsWith('Failed');
}
