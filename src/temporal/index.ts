/**
 * temporal CLI adapter
 */

export type { CommandExecutor, CommandResult, CommandSpec, WorkflowExecution, WorkflowSource } from './types.js';
export { API_KEY_ENV, TemporalCommandBuilder } from './command-builder.js';
export { ProcessExecutor } from './executor.js';
export { TemporalClient, normalizeExecution, normalizeStatus, parseJsonOutput } from './client.js';
