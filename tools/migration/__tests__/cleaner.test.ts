import { describe, it, expect } from 'vitest';
import { bitValue, coerceValue, fieldOf, identifierOf } from '../cleaner';

const integer = { type: 'integer' as const };
const real = { type: 'real' as const };
const numeric = { type: 'numeric' as const };
const text = { type: 'text' as const };
const blob = { type: 'blob' as const };

describe('coerceValue', () => {
  it('maps absent and null values to NULL', () => {
    expect(coerceValue(undefined, integer)).toEqual({ kind: 'ok', literal: { kind: 'null' } });
    expect(coerceValue(null, text)).toEqual({ kind: 'ok', literal: { kind: 'null' } });
  });

  describe('integer columns', () => {
    it('keeps integers', () => {
      expect(coerceValue(42, integer)).toEqual({ kind: 'ok', literal: { kind: 'integer', value: 42 } });
    });

    it('parses numeric-looking strings', () => {
      expect(coerceValue(' -17 ', integer)).toEqual({ kind: 'ok', literal: { kind: 'integer', value: -17 } });
    });

    it('turns booleans and boolean-like strings into 0/1', () => {
      expect(coerceValue(true, integer)).toEqual({ kind: 'ok', literal: { kind: 'integer', value: 1 } });
      expect(coerceValue(false, integer)).toEqual({ kind: 'ok', literal: { kind: 'integer', value: 0 } });
      expect(coerceValue('Yes', integer)).toEqual({ kind: 'ok', literal: { kind: 'integer', value: 1 } });
    });

    it('falls back to text for fractional numbers', () => {
      expect(coerceValue(1.5, integer)).toEqual({
        kind: 'fallback',
        literal: { kind: 'text', value: '1.5' },
        reason: 'non-integer number for integer column',
      });
    });

    it('falls back to text for words', () => {
      const result = coerceValue('twelve', integer);
      expect(result.kind).toBe('fallback');
      expect(result.literal).toEqual({ kind: 'text', value: 'twelve' });
    });

    it('falls back to text for integers beyond the safe range', () => {
      const result = coerceValue('12345678901234567890', integer);
      expect(result).toEqual({
        kind: 'fallback',
        literal: { kind: 'text', value: '12345678901234567890' },
        reason: 'integer out of range for integer column',
      });
    });

    it('falls back to JSON text for objects', () => {
      expect(coerceValue({ a: 1 }, integer).literal).toEqual({ kind: 'text', value: '{"a":1}' });
    });
  });

  describe('real columns', () => {
    it('parses decimal and exponent strings', () => {
      expect(coerceValue('3.25', real)).toEqual({ kind: 'ok', literal: { kind: 'real', value: 3.25 } });
      expect(coerceValue('1e3', real)).toEqual({ kind: 'ok', literal: { kind: 'real', value: 1000 } });
    });

    it('keeps integral numbers as reals', () => {
      expect(coerceValue(2, real)).toEqual({ kind: 'ok', literal: { kind: 'real', value: 2 } });
    });

    it('falls back for non-numeric strings', () => {
      expect(coerceValue('n/a', real).kind).toBe('fallback');
    });
  });

  describe('numeric columns', () => {
    it('picks integer or real by value', () => {
      expect(coerceValue('7', numeric).literal).toEqual({ kind: 'integer', value: 7 });
      expect(coerceValue('7.5', numeric).literal).toEqual({ kind: 'real', value: 7.5 });
      expect(coerceValue(false, numeric).literal).toEqual({ kind: 'integer', value: 0 });
    });

    it('keeps non-numeric strings as text without a fallback', () => {
      expect(coerceValue('2024-03-01T09:30:00Z', numeric)).toEqual({
        kind: 'ok',
        literal: { kind: 'text', value: '2024-03-01T09:30:00Z' },
      });
      expect(coerceValue('2024-03-01', numeric).kind).toBe('ok');
    });

    it('falls back for structured values', () => {
      expect(coerceValue({ at: 1 }, numeric)).toEqual({
        kind: 'fallback',
        literal: { kind: 'text', value: '{"at":1}' },
        reason: 'not a number for numeric column',
      });
    });
  });

  describe('text columns', () => {
    it('keeps strings verbatim, including quotes and newlines', () => {
      expect(coerceValue("it's\nfine", text)).toEqual({ kind: 'ok', literal: { kind: 'text', value: "it's\nfine" } });
    });

    it('stores other values as their JSON text', () => {
      expect(coerceValue(12, text).literal).toEqual({ kind: 'text', value: '12' });
      expect(coerceValue(true, text).literal).toEqual({ kind: 'text', value: 'true' });
      expect(coerceValue(['a'], text).literal).toEqual({ kind: 'text', value: '["a"]' });
    });
  });

  describe('blob columns', () => {
    it('encodes objects as JSON bytes', () => {
      const result = coerceValue({ k: 'v' }, blob);
      expect(result.kind).toBe('ok');
      expect(result.literal).toEqual({ kind: 'blob', bytes: new TextEncoder().encode('{"k":"v"}') });
    });

    it('keeps strings as text', () => {
      expect(coerceValue('raw', blob).literal).toEqual({ kind: 'text', value: 'raw' });
    });
  });
});

describe('bitValue', () => {
  it('recognizes boolean-like values', () => {
    expect(bitValue(true)).toBe(1);
    expect(bitValue('off')).toBe(0);
    expect(bitValue('maybe')).toBeNull();
    expect(bitValue(1)).toBeNull();
  });
});

describe('identifierOf', () => {
  it('accepts non-empty strings and finite numbers', () => {
    expect(identifierOf('a1')).toBe('a1');
    expect(identifierOf(7)).toBe('7');
  });

  it('rejects everything else', () => {
    expect(identifierOf(undefined)).toBeNull();
    expect(identifierOf(null)).toBeNull();
    expect(identifierOf('  ')).toBeNull();
    expect(identifierOf(true)).toBeNull();
    expect(identifierOf({ id: 1 })).toBeNull();
  });
});

describe('fieldOf', () => {
  it('ignores inherited properties', () => {
    expect(fieldOf({}, 'constructor')).toBeUndefined();
    expect(fieldOf({ constructor: 'x' }, 'constructor')).toBe('x');
  });
});
