import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TemporalCliError, UnsupportedOperatorError } from '../errors.js';
import { defaultConfig } from '../types/config.js';
import { maskConfig, maskSecret, output, outputError, outputSuccess, outputTable, setOutputOptions } from './output.js';

describe('output', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    setOutputOptions({ json: false, verbose: false });
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    setOutputOptions({ json: false, verbose: false });
    vi.restoreAllMocks();
  });

  describe('output', () => {
    it('prints the human form by default', () => {
      output({ count: 3 }, '3 execution(s)');
      expect(logSpy).toHaveBeenCalledWith('3 execution(s)');
    });

    it('prints JSON with --json', () => {
      setOutputOptions({ json: true });
      output({ count: 3 }, '3 execution(s)');
      expect(logSpy).toHaveBeenCalledWith('{\n  "count": 3\n}');
    });
  });

  describe('outputError', () => {
    it('includes the cause message', () => {
      outputError('Failed to count executions', new Error('temporal not found'));
      expect(errorSpy).toHaveBeenCalledWith('Error: Failed to count executions: temporal not found');
    });

    it('emits a JSON record with --json', () => {
      setOutputOptions({ json: true });
      const error = new Error('bad');
      error.name = 'CaseError';
      outputError('Failed to validate query', error);
      expect(errorSpy).toHaveBeenCalledWith('{"error":"Failed to validate query","type":"CaseError","details":"bad"}');
    });
  });

  describe('outputError hints', () => {
    it('prints the suggested rewrite', () => {
      outputError(
        'Failed to count executions',
        new UnsupportedOperatorError("Unsupported operator 'LIKE'. Use 'STARTS_WITH' instead.", "WorkflowId STARTS_WITH 'a'")
      );

      expect(errorSpy.mock.calls.map((call) => call[0])).toEqual([
        "Error: Failed to count executions: Unsupported operator 'LIKE'. Use 'STARTS_WITH' instead.",
        "  try: WorkflowId STARTS_WITH 'a'",
      ]);
    });

    it('shows temporal stderr in verbose mode', () => {
      setOutputOptions({ verbose: true });
      const error = new TemporalCliError('temporal workflow count failed: boom', ['temporal', 'workflow', 'count'], 1, 'boom\n');

      outputError('Failed to count executions', error);

      expect(errorSpy.mock.calls[1][0]).toBe('  $ temporal workflow count\nboom');
    });
  });

  describe('outputSuccess', () => {
    it('wraps data in a success record with --json', () => {
      setOutputOptions({ json: true });
      outputSuccess('Config is valid', { path: '/tmp/config.json' });
      expect(logSpy).toHaveBeenCalledWith(
        '{"success":true,"message":"Config is valid","data":{"path":"/tmp/config.json"}}'
      );
    });
  });

  describe('outputTable', () => {
    it('pads columns to the widest cell', () => {
      outputTable(['Field', 'Type'], [['WorkflowId', 'Keyword'], ['StartTime', 'Datetime']]);

      expect(logSpy.mock.calls.map((call) => call[0])).toEqual([
        'Field       Type',
        '----------------',
        'WorkflowId  Keyword',
        'StartTime   Datetime',
      ]);
    });

    it('emits one object per row with --json', () => {
      setOutputOptions({ json: true });
      outputTable(['Field', 'Type'], [['WorkflowId', 'Keyword']]);
      expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual([{ Field: 'WorkflowId', Type: 'Keyword' }]);
    });
  });

  describe('masking', () => {
    it('keeps the ends of long secrets', () => {
      expect(maskSecret('abcdefghijkl')).toBe('abcd****ijkl');
      expect(maskSecret('short')).toBe('****');
    });

    it('masks the temporal API key only', () => {
      const config = defaultConfig();
      config.temporal.apiKey = 'test-secret-value';
      config.temporal.namespace = 'default';

      const masked = maskConfig(config);

      expect(masked.temporal).toMatchObject({ apiKey: 'test****alue', namespace: 'default' });
      expect(config.temporal.apiKey).toBe('test-secret-value');
    });

    it('returns a config without a key unchanged', () => {
      const config = defaultConfig();
      expect(maskConfig(config)).toBe(config);
    });
  });
});
