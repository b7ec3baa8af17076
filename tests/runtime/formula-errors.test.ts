/**
 * Error Registry and Error Class Tests
 */

import { describe, expect, it } from 'vitest';

import {
  CircularDependencyError,
  ERROR_REGISTRY,
  FormulaError,
  LexerError,
  OutputMappingError,
  ParseError,
  renderMessage,
  RuntimeError,
  TypeMismatchError,
  UndefinedFieldError,
} from '../../src/index.js';

const at = (offset: number) => ({ line: 1, column: offset + 1, offset });

describe('Error Registry', () => {
  it('holds every error condition under a categorized id', () => {
    const prefixes: Record<string, string> = {
      lexer: 'L',
      parse: 'P',
      runtime: 'R',
      dependency: 'D',
      coercion: 'C',
    };
    expect(ERROR_REGISTRY.size).toBe(18);
    for (const [id, definition] of ERROR_REGISTRY.entries()) {
      expect(id).toBe(definition.errorId);
      expect(id).toMatch(new RegExp(`^CALC-${prefixes[definition.category]}\\d{3}$`));
      expect(definition.description.length).toBeLessThanOrEqual(50);
    }
  });

  describe('renderMessage', () => {
    it('fills placeholders from the context', () => {
      expect(renderMessage("Field '{name}' is not defined", { name: 'total' })).toBe(
        "Field 'total' is not defined"
      );
    });

    it('renders missing values as empty text', () => {
      expect(renderMessage('a{x}b', {})).toBe('ab');
    });

    it('keeps doubled braces and unclosed braces literal', () => {
      expect(renderMessage('{{x}} {y', { x: 1 })).toBe('{x} {y');
    });
  });
});

describe('Error Classes', () => {
  it('rejects unknown ids', () => {
    expect(
      () => new FormulaError({ errorId: 'CALC-X999', message: 'nope' })
    ).toThrow('Unknown error ID: CALC-X999');
  });

  it('rejects ids from another category', () => {
    expect(() => new RuntimeError('CALC-P001', 'wrong')).toThrow(
      'Expected runtime error ID, got: CALC-P001'
    );
    expect(() => new ParseError('CALC-R001', 'wrong', at(0))).toThrow(
      'Expected parse error ID, got: CALC-R001'
    );
    expect(() => new LexerError('CALC-P001', at(0))).toThrow(
      'Expected lexer error ID, got: CALC-P001'
    );
  });

  it('appends the position to the message', () => {
    const error = new UndefinedFieldError('depth', at(7));
    expect(error.message).toBe("Field 'depth' is not defined at position 7");
    expect(error.fieldName).toBe('depth');
    expect(error).toBeInstanceOf(RuntimeError);
    expect(error).toBeInstanceOf(FormulaError);
  });

  it('toData strips the position from the message', () => {
    const error = new TypeMismatchError('+', ['text', 'number'], at(2));
    expect(error.toData()).toEqual({
      errorId: 'CALC-R002',
      message: "Operator '+' cannot be applied to text and number",
      location: at(2),
      context: { operator: '+', operandKinds: ['text', 'number'] },
    });
  });

  it('toData keeps a position that belongs to the message text', () => {
    const error = OutputMappingError.allFailed([
      {
        formula: '(',
        target: 'TEXT',
        error: new ParseError('CALC-P001', 'Unexpected token end of formula', at(1)),
      },
    ]);
    expect(error.location).toBeUndefined();
    expect(error.toData().message).toBe(
      "All output mappings failed: Target 'TEXT': Unexpected token end of formula at position 1"
    );
  });

  it('format delegates to a host formatter', () => {
    const error = new UndefinedFieldError('x', at(0));
    expect(error.format()).toBe("Field 'x' is not defined at position 0");
    expect(error.format((data) => `${data.errorId}: ${data.message}`)).toBe(
      "CALC-R001: Field 'x' is not defined"
    );
  });

  it('circular dependencies close the path on the first field', () => {
    const error = new CircularDependencyError(['a', 'b', 'c']);
    expect(error.message).toBe('Circular dependency: a → b → c → a');
    expect(error.context).toEqual({ cycle: ['a', 'b', 'c'] });
  });

  it('lexer errors render their registry template', () => {
    const error = new LexerError('CALC-L002', at(3), { char: '$' });
    expect(error.message).toBe("Unexpected character '$' at position 3");
  });
});
