/**
 * temporal CLI adapter types
 */

/** Fully materialized child-process invocation */
export interface CommandSpec {
  command: string;
  args: string[];
  /** Extra environment for the child (merged over process.env) */
  env?: Record<string, string>;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs one command to completion
 * Implementations reject with TemporalCliNotFoundError / CommandTimeoutError;
 * a non-zero exit is a normal result.
 */
export interface CommandExecutor {
  execute(spec: CommandSpec, timeoutMs: number): Promise<CommandResult>;
}

/** One row of `temporal workflow list` */
export interface WorkflowExecution {
  workflowId: string;
  runId: string;
  workflowType: string | null;
  /** Execution status vocabulary (Running, Completed, ...) */
  status: string | null;
  startTime: string | null;
  closeTime: string | null;
  taskQueue: string | null;
  historyLength: number | null;
}

/**
 * Collaborators the query and history engines consume
 */
export interface WorkflowSource {
  count(query: string): Promise<number>;
  list(query: string, limit: number): Promise<WorkflowExecution[]>;
  /** Raw history records in eventId order */
  fetchEvents(workflowId: string, runId?: string): Promise<unknown[]>;
}
