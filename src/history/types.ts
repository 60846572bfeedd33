/**
 * Workflow history types
 */

/** One parsed history event */
export interface WorkflowEvent {
  /** Strictly increasing within one history */
  readonly eventId: number;
  /** Canonical PascalCase type, e.g. ActivityTaskFailed */
  readonly eventType: string;
  /** ISO-8601 as reported by the server, or null when absent */
  readonly eventTime: string | null;
  /** The event's *EventAttributes object */
  readonly attributes: Readonly<Record<string, unknown>>;
  /** Base64 payload data, in document order */
  readonly payloads: readonly string[];
}

export type Preset = 'summary' | 'critical_path' | 'last_failure_context' | 'resets';

export const PRESETS: readonly Preset[] = ['summary', 'critical_path', 'last_failure_context', 'resets'];

export type Projection = 'minimal' | 'standard' | 'full';

export const PROJECTIONS: readonly Projection[] = ['minimal', 'standard', 'full'];

export interface HistoryWindow {
  /** ≤0 or unset = uncapped */
  limit?: number;
  /** Most recent first */
  reverse?: boolean;
}

export interface FilterSpec {
  includeTypes?: readonly string[];
  excludeTypes?: readonly string[];
  /** Overrides includeTypes/excludeTypes */
  preset?: Preset;
  /** Events kept before the last failure (last_failure_context) */
  failureContext?: number;
  projection?: Projection;
  window?: HistoryWindow;
}

export interface DecodedPayload {
  raw: string;
  /** Decoded text (pretty-printed when JSON), possibly truncated; null when base64 was invalid */
  decoded: string | null;
  parsedJson: unknown;
  truncated: boolean;
  /** Length of the decoded text before truncation */
  originalLength: number;
}

/** Event after projection */
export interface ProjectedEvent {
  eventId: number;
  eventType: string;
  eventTime: string | null;
  /** standard, full */
  failureMessage?: string;
  /** standard: one identifying attribute, e.g. { name: 'activityType', value: 'ChargeCard' } */
  primaryAttribute?: { name: string; value: string | number };
  /** full */
  attributes?: Readonly<Record<string, unknown>>;
  /** full */
  payloads?: readonly string[];
  /** standard, full */
  decodedPayloads?: DecodedPayload[];
}
