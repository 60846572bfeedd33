export { ConfigManager } from './manager.js';
export type { ValidationError, ValidationResult } from './schema.js';
export { parseConfig, validateConfig } from './schema.js';
