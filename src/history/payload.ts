/**
 * Payload codec
 *
 * base64 -> UTF-8 text -> JSON (pretty-printed) when it parses, plain text
 * otherwise. Text longer than maxLen is cut to exactly maxLen characters.
 */

import { DecodeWarning } from '../errors.js';
import type { DecodedPayload } from './types.js';

export const DEFAULT_PAYLOAD_MAX_LEN = 4000;

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Strict base64 decode
 * @returns null when the text is not canonical padded base64
 */
export function decodeBase64(text: string): Uint8Array | null {
  if (text.length % 4 !== 0 || !BASE64.test(text)) {
    return null;
  }
  return Buffer.from(text, 'base64');
}

export type PayloadDecodeResult =
  | { ok: true; payload: DecodedPayload }
  | { ok: false; payload: DecodedPayload; reason: string };

/**
 * Decode one payload
 * Never throws; a failure is reported as { ok: false } with decoded = null.
 */
export function decodePayload(raw: string, maxLen: number = DEFAULT_PAYLOAD_MAX_LEN): PayloadDecodeResult {
  const failed = (reason: string): PayloadDecodeResult => ({
    ok: false,
    reason,
    payload: { raw, decoded: null, parsedJson: null, truncated: false, originalLength: 0 },
  });

  const bytes = decodeBase64(raw);
  if (!bytes) {
    return failed('invalid base64');
  }

  let text: string;
  try {
    text = utf8.decode(bytes);
  } catch {
    return failed('not valid UTF-8');
  }

  let parsedJson: unknown = null;
  try {
    parsedJson = JSON.parse(text);
    text = JSON.stringify(parsedJson, null, 2);
  } catch {
    // Not JSON: keep the plain text
    parsedJson = null;
  }

  // Counted in code points so a surrogate pair is never split
  const codePoints = Array.from(text);
  const originalLength = codePoints.length;
  const truncated = originalLength > maxLen;

  return {
    ok: true,
    payload: {
      raw,
      decoded: truncated ? codePoints.slice(0, maxLen).join('') : text,
      parsedJson,
      truncated,
      originalLength,
    },
  };
}

export interface PayloadBatchResult {
  payloads: DecodedPayload[];
  warnings: DecodeWarning[];
}

/**
 * Decode every payload of one event; a bad payload never stops the batch
 */
export function decodePayloads(
  eventId: number,
  raws: readonly string[],
  maxLen: number = DEFAULT_PAYLOAD_MAX_LEN
): PayloadBatchResult {
  const payloads: DecodedPayload[] = [];
  const warnings: DecodeWarning[] = [];

  raws.forEach((raw, index) => {
    const result = decodePayload(raw, maxLen);
    payloads.push(result.payload);
    if (!result.ok) {
      warnings.push(new DecodeWarning(eventId, index, result.reason));
    }
  });

  return { payloads, warnings };
}
