/**
 * Output Mapping Tests
 * First-success resolution and aggregated failures
 */

import { describe, expect, it, vi } from 'vitest';

import {
  createEvaluationContext,
  evaluateEntityOutputs,
  evaluateOutputMappings,
  FormulaCache,
  OutputMappingError,
  type OutputMapping,
} from '../../src/index.js';

describe('Output Mappings', () => {
  const ctx = createEvaluationContext();

  it('first successful mapping wins', () => {
    const result = evaluateOutputMappings(
      [
        { formula: 'label', target: 'NUMBER' },
        { formula: 'label', target: 'TEXT' },
        { formula: '1', target: 'NUMBER' },
      ],
      { label: 'A1' },
      ctx
    );
    expect(result).toEqual({
      ok: true,
      value: { value: 'A1', target: 'TEXT', index: 1 },
    });
  });

  it('evaluation failures move on to the next mapping', () => {
    const result = evaluateOutputMappings(
      [
        { formula: 'missing * 2', target: 'NUMBER' },
        { formula: 'depth * 2', target: 'NUMBER' },
      ],
      { depth: 4 },
      ctx
    );
    expect(result.ok && result.value.value).toBe(8);
  });

  it('aggregates every failed attempt', () => {
    const result = evaluateOutputMappings(
      [
        { formula: 'a > 1', target: 'NUMBER' },
        { formula: 'b / 0', target: 'NUMBER' },
        { formula: '(', target: 'TEXT' },
      ],
      { a: 2, b: 1 },
      ctx,
      { fieldName: 'ratio' }
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(OutputMappingError);
    expect(result.error.errorId).toBe('CALC-C002');
    expect(result.error.attempts.map((a) => a.error.errorId)).toEqual([
      'CALC-C001',
      'CALC-R003',
      'CALC-P001',
    ]);
    expect(result.error.message).toBe(
      "All output mappings failed: Target 'NUMBER': Cannot convert BOOLEAN to NUMBER; " +
        "Target 'NUMBER': Division by zero in '/' at position 0; " +
        "Target 'TEXT': Unexpected token end of formula at position 1"
    );
    expect(result.error.toData().message).toBe(result.error.message);
  });

  it('no mappings is a failure naming the field', () => {
    const result = evaluateOutputMappings([], {}, ctx, { fieldName: 'depth_label' });
    expect(!result.ok && result.error.message).toBe(
      "No output mapping defined for field 'depth_label'"
    );
    expect(!result.ok && result.error.errorId).toBe('CALC-C003');
  });

  it('reports the aggregated failure to onError', () => {
    const onError = vi.fn();
    const observed = createEvaluationContext({ observability: { onError } });
    evaluateOutputMappings([{ formula: 'true', target: 'NUMBER' }], {}, observed, {
      fieldName: 'flag',
    });
    const last = onError.mock.calls.at(-1)?.[0];
    expect(last?.field).toBe('flag');
    expect(last?.error.errorId).toBe('CALC-C002');
  });

  describe('evaluateEntityOutputs', () => {
    it('resolves every field and collects failures', () => {
      const outputs = evaluateEntityOutputs(
        {
          total: [{ formula: 'depth_from + depth_to', target: 'TEXT' }],
          broken: [{ formula: 'name', target: 'NUMBER' }],
          flag: [{ formula: 'depth_to', target: 'BOOLEAN' }],
        },
        { depth_from: 5, depth_to: 10, name: 'core' },
        ctx,
        new FormulaCache()
      );

      expect(outputs.values).toEqual({
        flag: { value: true, target: 'BOOLEAN', index: 0 },
        total: { value: '15.0', target: 'TEXT', index: 0 },
      });
      expect(Object.keys(outputs.failures)).toEqual(['broken']);
      expect(outputs.failures['broken']?.message).toBe(
        "All output mappings failed: Target 'NUMBER': Cannot convert TEXT to NUMBER"
      );
      expect(outputs.blocked).toBe(true);
    });

    it('is not blocked when every field resolves', () => {
      const outputs = evaluateEntityOutputs(
        { a: [{ formula: '1', target: 'NUMBER' }] },
        {},
        ctx
      );
      expect(outputs.blocked).toBe(false);
      expect(outputs.failures).toEqual({});
    });

    it('skips fields without mappings', () => {
      const outputs = evaluateEntityOutputs(
        { plain: [], total: [{ formula: '1', target: 'NUMBER' }] },
        {},
        ctx
      );
      expect(outputs.blocked).toBe(false);
      expect(outputs.failures).toEqual({});
      expect(Object.keys(outputs.values)).toEqual(['total']);
    });

    it('keeps a field named __proto__', () => {
      const fields: Record<string, OutputMapping[]> = JSON.parse(
        '{"__proto__": [{"formula": "x", "target": "NUMBER"}], "bad": [{"formula": "y", "target": "NUMBER"}]}'
      );
      const outputs = evaluateEntityOutputs(fields, { x: 3, y: 'text' }, ctx);

      expect(Object.keys(outputs.values)).toEqual(['__proto__']);
      expect(outputs.values['__proto__']).toEqual({ value: 3, target: 'NUMBER', index: 0 });
      expect(Object.keys(outputs.failures)).toEqual(['bad']);
    });
  });
});
