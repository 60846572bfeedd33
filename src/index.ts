/**
 * wfscope - Temporal workflow query and history inspector
 * Programmatic API exports
 */

// Types
export type { Config, HistorySettings, QuerySettings, TemporalSettings } from './types/config.js';
export { DEFAULT_CONFIG, DEFAULT_TIMEOUT_MS, defaultConfig } from './types/config.js';

// Config
export { ConfigManager, parseConfig, validateConfig } from './config/index.js';
export type { ValidationError, ValidationResult } from './config/index.js';

// Query engine
export * from './query/index.js';

// Workflow history
export * from './history/index.js';

// temporal CLI adapter
export * from './temporal/index.js';

// Service
export { WorkflowService } from './workflow/service.js';
export type { FailedRuns, HistoryInspection, ScopedList, WorkflowServiceOptions } from './workflow/service.js';

// Errors
export * from './errors.js';
