/**
 * fieldcalc CLI Tests: eval command and shared formatting
 */

import { describe, expect, it } from 'vitest';
import {
  createVerboseCallbacks,
  formatError,
  formatOutput,
  readVersion,
  toFormulaValue,
  type CommandOptions,
} from '../../src/cli-shared.js';
import { parseFieldAssignment, runEval } from '../../src/cli-eval.js';
import {
  CircularDependencyError,
  CoercionError,
  DivisionByZeroError,
} from '../../src/index.js';

const human: CommandOptions = { format: 'human', budgetMs: undefined };
const json: CommandOptions = { format: 'json', budgetMs: undefined };

describe('fieldcalc eval', () => {
  describe('parseFieldAssignment', () => {
    it('reads scalar values as YAML', () => {
      expect(parseFieldAssignment('depth=5')).toEqual(['depth', 5]);
      expect(parseFieldAssignment('ratio=0.25')).toEqual(['ratio', 0.25]);
      expect(parseFieldAssignment('sampled=true')).toEqual(['sampled', true]);
      expect(parseFieldAssignment('name=core')).toEqual(['name', 'core']);
      expect(parseFieldAssignment('code="007"')).toEqual(['code', '007']);
      expect(parseFieldAssignment('note=~')).toEqual(['note', null]);
    });

    it('keeps everything after the first equals sign', () => {
      expect(parseFieldAssignment('expr=a=b')).toEqual(['expr', 'a=b']);
    });

    it('requires a name and a separator', () => {
      expect(() => parseFieldAssignment('depth')).toThrow(
        'Invalid field assignment: depth (expected name=value)'
      );
      expect(() => parseFieldAssignment('=5')).toThrow(
        'Invalid field assignment: =5 (expected name=value)'
      );
    });

    it('rejects collections', () => {
      expect(() => parseFieldAssignment('depths=[1, 2]')).toThrow(
        'Invalid value for field depths: expected a number, text, boolean or null'
      );
    });
  });

  describe('runEval', () => {
    it('prints the value', () => {
      expect(
        runEval('depth_from + depth_to', { depth_from: 5, depth_to: 10 }, human)
      ).toEqual({ code: 0, stdout: '15.0', stderr: '' });
    });

    it('prints null distinctly from empty text', () => {
      expect(runEval('a', { a: null }, human).stdout).toBe('null');
      expect(runEval('""', {}, human).stdout).toBe('');
    });

    it('reports a runtime failure on stderr with exit code 1', () => {
      expect(runEval('x / 0', { x: 1 }, human)).toEqual({
        code: 1,
        stdout: '',
        stderr: "Runtime error [CALC-R003] at position 0: Division by zero in '/'",
      });
    });

    it('reports syntax errors', () => {
      expect(runEval('1 2', {}, human).stderr).toBe(
        'Syntax error [CALC-P001] at position 2: Unexpected token number 2'
      );
    });

    it('writes JSON on request', () => {
      const success = runEval('upper(name)', { name: 'core' }, json);
      expect(success.code).toBe(0);
      expect(JSON.parse(success.stdout)).toEqual({ ok: true, value: 'CORE' });

      const failed = runEval('missing', {}, json);
      expect(failed.code).toBe(1);
      expect(JSON.parse(failed.stdout)).toEqual({
        ok: false,
        error: {
          errorId: 'CALC-R001',
          message: "Field 'missing' is not defined",
          location: { line: 1, column: 1, offset: 0 },
        },
      });
    });

    it('traces through the observability callbacks', () => {
      const lines: string[] = [];
      runEval('missing', {}, {
        ...human,
        observability: createVerboseCallbacks((line) => lines.push(line)),
      });
      expect(lines).toEqual([
        "[error] Runtime error [CALC-R001] at position 0: Field 'missing' is not defined",
      ]);
    });
  });

  describe('createVerboseCallbacks', () => {
    it('formats field and function events', () => {
      const lines: string[] = [];
      const callbacks = createVerboseCallbacks((line) => lines.push(line));
      callbacks.onFieldStart?.({ field: 'total' });
      callbacks.onFunctionCall?.({ name: 'max', args: [1, null, 'a'] });
      callbacks.onFunctionReturn?.({ name: 'max', value: 3, durationMs: 0.25 });
      callbacks.onFieldEnd?.({
        field: 'total',
        result: { ok: true, value: 3 },
        durationMs: 1.5,
      });
      callbacks.onError?.({ field: 'total', error: new DivisionByZeroError('%') });

      expect(lines).toEqual([
        '[field] total start',
        '[call] max(1.0, null, a)',
        '[return] max = 3.0 (0.25ms)',
        '[field] total = 3.0 (1.50ms)',
        "[error] total: Runtime error [CALC-R003]: Division by zero in '%'",
      ]);
    });
  });

  describe('formatError', () => {
    it('labels formula errors by category', () => {
      expect(formatError(new CircularDependencyError(['a', 'b']))).toBe(
        'Dependency error [CALC-D001]: Circular dependency: a → b → a'
      );
      expect(formatError(new CoercionError('boolean', 'NUMBER'))).toBe(
        'Coercion error [CALC-C001]: Cannot convert BOOLEAN to NUMBER'
      );
    });

    it('names the missing file', () => {
      const err = Object.assign(new Error('ENOENT: no such file'), {
        code: 'ENOENT',
        path: '/tmp/entity.yaml',
      });
      expect(formatError(err)).toBe('File not found: /tmp/entity.yaml');
    });

    it('passes other messages through', () => {
      expect(formatError(new Error('boom'))).toBe('boom');
    });
  });

  describe('formatOutput', () => {
    it('renders values the way TEXT coercion does, except null', () => {
      expect(formatOutput(15)).toBe('15.0');
      expect(formatOutput(false)).toBe('false');
      expect(formatOutput(null)).toBe('null');
    });
  });

  it('toFormulaValue rejects non-finite numbers', () => {
    expect(() => toFormulaValue(Number.POSITIVE_INFINITY, 'values.x')).toThrow(
      'Invalid value for values.x: expected a number, text, boolean or null'
    );
    expect(toFormulaValue(undefined, 'values.x')).toBeNull();
  });

  it('reads the package version', () => {
    expect(readVersion()).toBe('0.1.0');
  });
});
