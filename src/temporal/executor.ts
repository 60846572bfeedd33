/**
 * Child-process executor for the temporal CLI
 */

import { spawn } from 'child_process';
import { CommandTimeoutError, TemporalCliNotFoundError } from '../errors.js';
import type { CommandExecutor, CommandResult, CommandSpec } from './types.js';

export class ProcessExecutor implements CommandExecutor {
  execute(spec: CommandSpec, timeoutMs: number): Promise<CommandResult> {
    const { command, args, env } = spec;

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env, ...env },
        shell: false,
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (data: string) => {
        stdout += data;
      });
      child.stderr.on('data', (data: string) => {
        stderr += data;
      });

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        child.kill('SIGKILL');
        reject(new CommandTimeoutError([command, ...args], timeoutMs));
      }, timeoutMs);

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(error.code === 'ENOENT' ? new TemporalCliNotFoundError(command) : error);
      });

      child.on('close', (code) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({ exitCode: code, stdout, stderr });
      });
    });
  }
}
