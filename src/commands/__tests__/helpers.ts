/**
 * Shared setup for command tests: canned temporal CLI responses
 */

import { vi } from 'vitest';
import { ProcessExecutor } from '../../temporal/executor.js';
import type { CommandResult, CommandSpec } from '../../temporal/types.js';

export const ok = (stdout: string): CommandResult => ({ exitCode: 0, stdout, stderr: '' });

/**
 * Make every new ProcessExecutor answer with the given results, in order.
 * Requires vi.mock('../../temporal/executor.js') in the calling test file.
 */
export function respondWith(...results: CommandResult[]) {
  const queue = [...results];
  const execute = vi.fn(async (_spec: CommandSpec, _timeoutMs: number): Promise<CommandResult> => {
    const next = queue.shift();
    if (!next) {
      throw new Error('unexpected temporal call');
    }
    return next;
  });
  vi.mocked(ProcessExecutor).mockImplementation(function () {
    return { execute };
  });
  return execute;
}

/** Every console.log call, first argument only */
export function loggedLines(spy: { mock: { calls: unknown[][] } }): unknown[] {
  return spy.mock.calls.map((call) => call[0]);
}
