export * from './config.js';
export * from './query.js';
export * from './count.js';
export * from './list.js';
export * from './history.js';
export * from './failed-runs.js';
export * from './describe.js';
