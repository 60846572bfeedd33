/**
 * Search attribute registry
 *
 * Resolves field names to declared types: builtin attributes first,
 * then the custom map supplied from configuration. Lookup is case-sensitive.
 */

import { InvalidFieldNameError, TypeMismatchError, UnknownFieldError } from '../errors.js';
import type { FieldDescriptor, FieldType } from './types.js';
import { isFieldType } from './types.js';

/** Builtin attribute with help metadata */
export interface FieldDefinition {
  name: string;
  type: FieldType;
  description: string;
  examples?: string[];
}

/** Execution status vocabulary */
export const EXECUTION_STATUSES: readonly string[] = [
  'Running',
  'Completed',
  'Failed',
  'Canceled',
  'Terminated',
  'ContinuedAsNew',
  'TimedOut',
];

/** All builtin search attributes with metadata */
export const BUILTIN_FIELDS: FieldDefinition[] = [
  {
    name: 'WorkflowId',
    type: 'Keyword',
    description: 'Workflow ID',
    examples: ["WorkflowId = 'order-1234'", "WorkflowId STARTS_WITH 'order-'"],
  },
  {
    name: 'WorkflowType',
    type: 'Keyword',
    description: 'Workflow type name',
    examples: ["WorkflowType = 'OnboardingFlow'"],
  },
  {
    name: 'RunId',
    type: 'Keyword',
    description: 'Run ID of one execution',
  },
  {
    name: 'ExecutionStatus',
    type: 'Keyword',
    description: 'Execution status',
    examples: EXECUTION_STATUSES.map((s) => `ExecutionStatus = '${s}'`),
  },
  {
    name: 'StartTime',
    type: 'Datetime',
    description: 'Execution start time (ISO-8601)',
    examples: ["StartTime > '2025-01-01T00:00:00Z'"],
  },
  {
    name: 'CloseTime',
    type: 'Datetime',
    description: 'Execution close time (ISO-8601)',
  },
  {
    name: 'ExecutionTime',
    type: 'Datetime',
    description: 'First workflow task time, including start delay or cron wait',
  },
  {
    name: 'TaskQueue',
    type: 'Keyword',
    description: 'Task queue the workflow was started on',
  },
  {
    name: 'BuildIds',
    type: 'KeywordList',
    description: 'Worker build IDs that processed the execution',
  },
  {
    name: 'TemporalReportedProblems',
    type: 'KeywordList',
    description: 'Problems reported by the server (e.g. category=WorkflowTaskFailed)',
  },
];

const PLAIN_NAME = /^[A-Za-z0-9_]+$/;

/** True when a field name must be back-tick escaped in a query */
export function needsEscaping(name: string): boolean {
  return !PLAIN_NAME.test(name);
}

/**
 * Create a field descriptor
 * @throws InvalidFieldNameError for empty names or names containing a back-tick
 */
export function createFieldDescriptor(
  name: string,
  type: FieldType,
  isCustom: boolean,
  allowedValues?: readonly string[]
): FieldDescriptor {
  if (name.trim() === '') {
    throw new InvalidFieldNameError(name, 'name must not be empty');
  }
  if (name.includes('`')) {
    throw new InvalidFieldNameError(name, 'back-ticks cannot be escaped in field names');
  }

  return Object.freeze({
    name,
    type,
    isCustom,
    ...(allowedValues && { allowedValues }),
  });
}

const BUILTIN_DESCRIPTORS: ReadonlyMap<string, FieldDescriptor> = new Map(
  BUILTIN_FIELDS.map((f) => [
    f.name,
    createFieldDescriptor(
      f.name,
      f.type,
      false,
      f.name === 'ExecutionStatus' ? EXECUTION_STATUSES : undefined
    ),
  ])
);

/**
 * Type registry
 *
 * The custom map is replaced as a whole by configure(); readers always see
 * either the previous or the new frozen map, never a partial one.
 */
export class TypeRegistry {
  private custom: ReadonlyMap<string, FieldDescriptor>;

  constructor(customFields: Record<string, FieldType> = {}) {
    this.custom = TypeRegistry.buildCustomMap(customFields);
  }

  /**
   * Replace the custom-field declarations
   * @throws InvalidFieldNameError / TypeMismatchError; the current map is kept on error
   */
  configure(customFields: Record<string, FieldType>): void {
    this.custom = TypeRegistry.buildCustomMap(customFields);
  }

  describe(name: string): FieldDescriptor {
    const descriptor = this.tryDescribe(name);
    if (!descriptor) {
      throw new UnknownFieldError(name, this.suggest(name));
    }
    return descriptor;
  }

  tryDescribe(name: string): FieldDescriptor | null {
    return BUILTIN_DESCRIPTORS.get(name) ?? this.custom.get(name) ?? null;
  }

  /**
   * Case-insensitive near miss for a name that failed exact lookup
   */
  suggest(name: string): string | undefined {
    const lower = name.toLowerCase();
    for (const known of this.fieldNames()) {
      if (known !== name && known.toLowerCase() === lower) {
        return known;
      }
    }
    return undefined;
  }

  fieldNames(): string[] {
    return [...BUILTIN_DESCRIPTORS.keys(), ...this.custom.keys()];
  }

  list(): FieldDescriptor[] {
    return [...BUILTIN_DESCRIPTORS.values(), ...this.custom.values()];
  }

  private static buildCustomMap(customFields: Record<string, FieldType>): ReadonlyMap<string, FieldDescriptor> {
    const map = new Map<string, FieldDescriptor>();

    for (const [name, type] of Object.entries(customFields)) {
      if (BUILTIN_DESCRIPTORS.has(name)) {
        throw new InvalidFieldNameError(name, 'shadows a builtin search attribute');
      }
      if (!isFieldType(type)) {
        throw new TypeMismatchError(name, `unknown field type '${String(type)}'`);
      }
      map.set(name, createFieldDescriptor(name, type, true));
    }

    return map;
  }
}

/** Process-wide registry, configured once from the config file */
export const defaultRegistry = new TypeRegistry();

/**
 * Resolve a field name against the default registry
 * @throws UnknownFieldError
 */
export function describe(name: string): FieldDescriptor {
  return defaultRegistry.describe(name);
}
