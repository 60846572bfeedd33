/**
 * Config schema validation
 */

import { TypeRegistry } from '../query/registry.js';
import { FIELD_TYPES, isFieldType, type FieldType } from '../query/types.js';
import type { Config, HistorySettings, QuerySettings, TemporalSettings } from '../types/index.js';
import { WfscopeError } from '../errors.js';

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value > 0;
}

function optionalString(section: Record<string, unknown>, key: string, path: string, errors: ValidationError[]): void {
  const value = section[key];
  if (value !== undefined && (typeof value !== 'string' || !value.trim())) {
    errors.push({ path: `${path}.${key}`, message: `${key} must be a non-empty string` });
  }
}

function validateTemporal(section: unknown, path: string): ValidationError[] {
  if (!isRecord(section)) {
    return [{ path, message: 'temporal must be an object' }];
  }
  const errors: ValidationError[] = [];

  if (typeof section.binary !== 'string' || !section.binary.trim()) {
    errors.push({ path: `${path}.binary`, message: 'binary must be a non-empty string' });
  }
  optionalString(section, 'env', path, errors);
  optionalString(section, 'address', path, errors);
  optionalString(section, 'namespace', path, errors);
  optionalString(section, 'apiKey', path, errors);

  if (!isPositiveInteger(section.timeoutMs)) {
    errors.push({ path: `${path}.timeoutMs`, message: 'timeoutMs must be a positive integer' });
  }

  return errors;
}

function validateQuery(section: unknown, path: string): ValidationError[] {
  if (!isRecord(section)) {
    return [{ path, message: 'query must be an object' }];
  }
  const errors: ValidationError[] = [];

  if (!isPositiveInteger(section.maxLimit)) {
    errors.push({ path: `${path}.maxLimit`, message: 'maxLimit must be a positive integer' });
  }

  const customFields = section.customFields;
  if (!isRecord(customFields)) {
    errors.push({ path: `${path}.customFields`, message: 'customFields must be an object of name -> type' });
    return errors;
  }

  const typed: Record<string, FieldType> = {};
  for (const [name, type] of Object.entries(customFields)) {
    if (!isFieldType(type)) {
      errors.push({
        path: `${path}.customFields.${name}`,
        message: `type must be one of: ${FIELD_TYPES.join(', ')}`,
      });
    } else {
      typed[name] = type;
    }
  }

  // Names the registry would refuse (empty, back-ticks, builtin shadowing)
  for (const [name, type] of Object.entries(typed)) {
    try {
      new TypeRegistry({ [name]: type });
    } catch (error) {
      if (!(error instanceof WfscopeError)) throw error;
      errors.push({ path: `${path}.customFields.${name}`, message: error.message });
    }
  }

  return errors;
}

function validateHistory(section: unknown, path: string): ValidationError[] {
  if (!isRecord(section)) {
    return [{ path, message: 'history must be an object' }];
  }
  const errors: ValidationError[] = [];

  if (!isPositiveInteger(section.payloadMaxLen)) {
    errors.push({ path: `${path}.payloadMaxLen`, message: 'payloadMaxLen must be a positive integer' });
  }
  const failureContext = section.failureContext;
  if (typeof failureContext !== 'number' || !Number.isSafeInteger(failureContext) || failureContext < 0) {
    errors.push({ path: `${path}.failureContext`, message: 'failureContext must be a non-negative integer' });
  }

  return errors;
}

export function validateConfig(config: unknown): ValidationResult {
  if (!isRecord(config)) {
    return { valid: false, errors: [{ path: '', message: 'config must be an object' }] };
  }

  const errors: ValidationError[] = [];

  if (config.version !== 1) {
    errors.push({ path: 'version', message: 'version must be 1' });
  }
  errors.push(...validateTemporal(config.temporal, 'temporal'));
  errors.push(...validateQuery(config.query, 'query'));
  errors.push(...validateHistory(config.history, 'history'));

  return { valid: errors.length === 0, errors };
}

function stringOrUndefined(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Build a typed Config from a document validateConfig accepted
 */
function toConfig(doc: Record<string, unknown>): Config | null {
  const { temporal, query, history } = doc;
  if (!isRecord(temporal) || !isRecord(query) || !isRecord(history) || !isRecord(query.customFields)) {
    return null;
  }
  if (
    typeof temporal.binary !== 'string' ||
    typeof temporal.timeoutMs !== 'number' ||
    typeof query.maxLimit !== 'number' ||
    typeof history.payloadMaxLen !== 'number' ||
    typeof history.failureContext !== 'number'
  ) {
    return null;
  }

  const customFields: Record<string, FieldType> = {};
  for (const [name, type] of Object.entries(query.customFields)) {
    if (isFieldType(type)) {
      customFields[name] = type;
    }
  }

  const temporalSettings: TemporalSettings = {
    binary: temporal.binary,
    timeoutMs: temporal.timeoutMs,
  };
  for (const key of ['env', 'address', 'namespace', 'apiKey'] as const) {
    const value = stringOrUndefined(temporal[key]);
    if (value !== undefined) {
      temporalSettings[key] = value;
    }
  }
  const querySettings: QuerySettings = { maxLimit: query.maxLimit, customFields };
  const historySettings: HistorySettings = {
    payloadMaxLen: history.payloadMaxLen,
    failureContext: history.failureContext,
  };

  return { version: 1, temporal: temporalSettings, query: querySettings, history: historySettings };
}

/**
 * Parse and validate config JSON
 */
export function parseConfig(jsonString: string): { config: Config | null; errors: ValidationError[] } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonString);
  } catch (e) {
    return {
      config: null,
      errors: [{ path: '', message: `Invalid JSON: ${e instanceof Error ? e.message : 'parse error'}` }],
    };
  }

  const result = validateConfig(parsed);
  if (!result.valid || !isRecord(parsed)) {
    return { config: null, errors: result.errors };
  }

  return { config: toConfig(parsed), errors: [] };
}
