/**
 * Configuration types for wfscope
 */

import type { FieldType } from '../query/types.js';

/**
 * How to reach the temporal CLI and which server/namespace it talks to
 */
export interface TemporalSettings {
  /** temporal executable (name on PATH or absolute path) */
  binary: string;
  /** Named temporal CLI environment (--env) */
  env?: string;
  /** host:port of the frontend service (--address) */
  address?: string;
  namespace?: string;
  /** Passed to the child process as TEMPORAL_API_KEY, never on argv */
  apiKey?: string;
  /** Per-command timeout */
  timeoutMs: number;
}

export interface QuerySettings {
  /** Largest list request issued after counting */
  maxLimit: number;
  /** Custom search attributes: name -> type */
  customFields: Record<string, FieldType>;
}

export interface HistorySettings {
  /** Truncation length for decoded payloads */
  payloadMaxLen: number;
  /** Events kept before the last failure (last_failure_context preset) */
  failureContext: number;
}

export interface Config {
  version: 1;
  temporal: TemporalSettings;
  query: QuerySettings;
  history: HistorySettings;
}

export const DEFAULT_TIMEOUT_MS = 60_000;

export const DEFAULT_CONFIG: Config = {
  version: 1,
  temporal: {
    binary: 'temporal',
    timeoutMs: DEFAULT_TIMEOUT_MS,
  },
  query: {
    maxLimit: 50,
    customFields: {},
  },
  history: {
    payloadMaxLen: 4000,
    failureContext: 10,
  },
};

/** Deep copy of the defaults, safe to mutate */
export function defaultConfig(): Config {
  return {
    version: 1,
    temporal: { ...DEFAULT_CONFIG.temporal },
    query: { ...DEFAULT_CONFIG.query, customFields: { ...DEFAULT_CONFIG.query.customFields } },
    history: { ...DEFAULT_CONFIG.history },
  };
}
