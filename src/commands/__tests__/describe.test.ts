/**
 * describe / trace command tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Command } from 'commander';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  createDescribeCommand,
  createTraceCommand,
  createWorkflowQueryCommand,
  formatDescription,
  formatQueryResult,
  formatTrace,
} from '../describe.js';
import { setEnvOverride } from '../context.js';
import { setOutputOptions } from '../../utils/output.js';
import { ok, respondWith } from './helpers.js';

vi.mock('../../temporal/executor.js');

const DESCRIPTION = {
  workflowExecutionInfo: {
    execution: { workflowId: 'order-1', runId: 'run-1' },
    type: { name: 'OrderFlow' },
    status: 'WORKFLOW_EXECUTION_STATUS_RUNNING',
    startTime: '2025-01-01T00:00:00Z',
    taskQueue: 'orders',
    historyLength: '12',
  },
  pendingActivities: [
    { activityId: '5', activityType: { name: 'ChargeCard' }, attempt: 3 },
  ],
};

describe('formatDescription', () => {
  it('prints execution info and pending activities', () => {
    expect(formatDescription('order-1', DESCRIPTION).split('\n')).toEqual([
      'Workflow order-1',
      '  Run ID:      run-1',
      '  Type:        OrderFlow',
      '  Status:      Running',
      '  Task queue:  orders',
      '  Started:     2025-01-01T00:00:00Z',
      '  Closed:      -',
      '  Events:      12',
      '',
      'Pending activities (1):',
      '  5  ChargeCard  attempt=3',
    ]);
  });

  it('falls back to raw JSON for an unrecognized shape', () => {
    expect(formatDescription('order-1', { foo: 1 })).toBe('Workflow order-1\n{\n  "foo": 1\n}');
  });
});

describe('formatTrace', () => {
  it('unwraps the query result', () => {
    expect(formatTrace({ queryResult: ['coroutine root [blocked on signal]', '  at main'] })).toBe(
      'coroutine root [blocked on signal]\n  at main'
    );
    expect(formatTrace({ queryResult: 'single' })).toBe('single');
    expect(formatTrace('plain')).toBe('plain');
  });
});

describe('formatQueryResult', () => {
  it('prints a single string result bare', () => {
    expect(formatQueryResult({ queryResult: ['shipped'] })).toBe('shipped');
  });

  it('prints other results as indented JSON', () => {
    expect(formatQueryResult({ queryResult: [{ state: 'shipped' }] })).toBe('{\n  "state": "shipped"\n}');
    expect(formatQueryResult({ queryResult: [1, 2] })).toBe('[\n  1,\n  2\n]');
  });
});

describe('describe, trace and workflow-query commands', () => {
  let program: Command;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();
    setOutputOptions({ json: false, verbose: false });
    const getConfigPath = () => join(tmpdir(), 'wfscope-test-missing', 'config.json');

    program = new Command();
    program.addCommand(createDescribeCommand(getConfigPath));
    program.addCommand(createTraceCommand(getConfigPath));
    program.addCommand(createWorkflowQueryCommand(getConfigPath));

    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    setEnvOverride(undefined);
    vi.restoreAllMocks();
  });

  it('describes a run', async () => {
    const execute = respondWith(ok(JSON.stringify(DESCRIPTION)));

    await program.parseAsync(['node', 'test', 'describe', 'order-1', '--run-id', 'run-1']);

    expect(execute.mock.calls[0][0].args.slice(-6)).toEqual([
      'workflow', 'describe', '--workflow-id', 'order-1', '--run-id', 'run-1',
    ]);
    expect(String(logSpy.mock.calls[0][0]).split('\n')[3]).toBe('  Status:      Running');
  });

  it('passes the --env override to temporal', async () => {
    setEnvOverride('staging');
    const execute = respondWith(ok('{"queryResult":["at main"]}'));

    await program.parseAsync(['node', 'test', 'trace', 'order-1']);

    expect(execute.mock.calls[0][0].args.slice(0, 2)).toEqual(['--env', 'staging']);
    expect(logSpy).toHaveBeenCalledWith('at main');
  });

  it('runs a query handler with JSON input', async () => {
    const execute = respondWith(ok('{"queryResult":[{"state":"shipped","items":2}]}'));

    await program.parseAsync([
      'node', 'test', 'workflow-query', 'order-1', '--type', 'getState', '--input', '{"verbose": true}',
    ]);

    expect(execute.mock.calls[0][0].args.slice(-8)).toEqual([
      'workflow', 'query', '--workflow-id', 'order-1', '--type', 'getState', '--input', '{"verbose":true}',
    ]);
    expect(logSpy).toHaveBeenCalledWith('{\n  "state": "shipped",\n  "items": 2\n}');
  });

  it('rejects input that is not JSON before calling temporal', async () => {
    const execute = respondWith();
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exit called');
    });

    await expect(
      program.parseAsync(['node', 'test', 'workflow-query', 'order-1', '-t', 'getState', '-i', '{oops'])
    ).rejects.toThrow('exit called');

    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(execute).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/^Error: Failed to query workflow: --input is not valid JSON: /)
    );
  });
});

