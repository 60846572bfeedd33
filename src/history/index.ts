/**
 * Workflow history: event model, filter pipeline, payload codec
 */

export type {
  DecodedPayload,
  FilterSpec,
  HistoryWindow,
  Preset,
  ProjectedEvent,
  Projection,
  WorkflowEvent,
} from './types.js';
export { PRESETS, PROJECTIONS } from './types.js';

export { EVENT_TYPES, canonicalEventType, isFailureType, isKnownEventType } from './event-types.js';
export { collectPayloads, parseEvent, parseHistory } from './event.js';

export type { PresetExpansion, TypeSelection } from './presets.js';
export {
  DEFAULT_FAILURE_CONTEXT,
  NOISE_TYPES,
  RESET_TYPES,
  SUMMARY_TYPES,
  expandPreset,
  findLastFailure,
} from './presets.js';

export type { PayloadBatchResult, PayloadDecodeResult } from './payload.js';
export { DEFAULT_PAYLOAD_MAX_LEN, decodeBase64, decodePayload, decodePayloads } from './payload.js';

export type { HistoryView, PipelineOptions } from './pipeline.js';
export {
  applyWindow,
  failureMessage,
  filterByType,
  primaryAttribute,
  projectEvent,
  runHistoryPipeline,
  validateFilterSpec,
} from './pipeline.js';

export type { ChildWorkflowEntry, FailureEntry, HistorySummary, SignalEntry, TimelineEntry } from './summary.js';
export { summarizeHistory } from './summary.js';
