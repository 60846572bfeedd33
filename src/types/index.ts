export type { Config, HistorySettings, QuerySettings, TemporalSettings } from './config.js';
export { DEFAULT_CONFIG, DEFAULT_TIMEOUT_MS, defaultConfig } from './config.js';
