/**
 * Value Coercion
 *
 * Turns loosely-typed document values into literals of a column's
 * declared type category. A value that does not fit is never dropped:
 * it is emitted as text and the result says so, so the caller can
 * report it.
 *
 *   integer   numeric strings, booleans (0/1); non-integers fall back
 *   real      numbers, numeric strings, booleans (0.0/1.0)
 *   numeric   integer or real, whichever the value is; other strings as text
 *   text      strings as-is; anything else as its JSON text
 *   blob      objects and arrays as JSON bytes; scalars keep their kind
 */
import type { Column, ColumnType, JsonValue, Literal, SourceDocument } from './types';

export type Coercion =
  | { kind: 'ok'; literal: Literal }
  | { kind: 'fallback'; literal: Literal; reason: string };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const REAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const TRUE_VALUES = new Set(['true', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', 'no', 'off']);

export const NULL_LITERAL: Literal = { kind: 'null' };

/** Boolean-like value as 0/1, or null when it is not boolean-like */
export function bitValue(value: JsonValue): 0 | 1 | null {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value !== 'string') return null;
  const str = value.trim().toLowerCase();
  if (TRUE_VALUES.has(str)) return 1;
  if (FALSE_VALUES.has(str)) return 0;
  return null;
}

/** Own field of a document; inherited properties never count */
export function fieldOf(document: SourceDocument, name: string): JsonValue | undefined {
  return Object.hasOwn(document, name) ? document[name] : undefined;
}

/** Original identifier carried by a field, or null when the field holds none */
export function identifierOf(value: JsonValue | undefined): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'string' && value.trim() !== '') return value;
  return null;
}

function asText(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function ok(literal: Literal): Coercion {
  return { kind: 'ok', literal };
}

function fallback(value: JsonValue, type: ColumnType, why: string): Coercion {
  return {
    kind: 'fallback',
    literal: { kind: 'text', value: asText(value) },
    reason: `${why} for ${type} column`,
  };
}

function toInteger(value: JsonValue, type: ColumnType): Coercion {
  if (typeof value === 'number') {
    if (Number.isSafeInteger(value)) return ok({ kind: 'integer', value });
    return fallback(value, type, Number.isInteger(value) ? 'integer out of range' : 'non-integer number');
  }
  const bit = bitValue(value);
  if (bit !== null) return ok({ kind: 'integer', value: bit });
  if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    const n = Number(value.trim());
    if (Number.isSafeInteger(n)) return ok({ kind: 'integer', value: n });
    return fallback(value, type, 'integer out of range');
  }
  return fallback(value, type, 'not an integer');
}

function toReal(value: JsonValue, type: ColumnType): Coercion {
  if (typeof value === 'number') return ok({ kind: 'real', value });
  const bit = bitValue(value);
  if (bit !== null) return ok({ kind: 'real', value: bit });
  if (typeof value === 'string' && REAL_PATTERN.test(value.trim())) {
    const n = Number(value.trim());
    if (Number.isFinite(n)) return ok({ kind: 'real', value: n });
    return fallback(value, type, 'number out of range');
  }
  return fallback(value, type, 'not a number');
}

function toNumeric(value: JsonValue, type: ColumnType): Coercion {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value)
      ? ok({ kind: 'integer', value })
      : ok({ kind: 'real', value });
  }
  const bit = bitValue(value);
  if (bit !== null) return ok({ kind: 'integer', value: bit });
  if (typeof value === 'string') {
    const str = value.trim();
    if (INTEGER_PATTERN.test(str)) return toInteger(value, type);
    if (REAL_PATTERN.test(str)) return toReal(value, type);
    // Stored as TEXT under NUMERIC affinity (dates, times, codes)
    return ok({ kind: 'text', value });
  }
  return fallback(value, type, 'not a number');
}

function toBlob(value: JsonValue): Coercion {
  if (typeof value === 'string') return ok({ kind: 'text', value });
  if (typeof value === 'number') {
    return Number.isSafeInteger(value)
      ? ok({ kind: 'integer', value })
      : ok({ kind: 'real', value });
  }
  if (typeof value === 'boolean') return ok({ kind: 'integer', value: value ? 1 : 0 });
  return ok({ kind: 'blob', bytes: new TextEncoder().encode(JSON.stringify(value)) });
}

/** Coerce one document value to a literal for `column` */
export function coerceValue(value: JsonValue | undefined, column: Pick<Column, 'type'>): Coercion {
  if (value === undefined || value === null) return ok(NULL_LITERAL);

  switch (column.type) {
    case 'integer':
      return toInteger(value, column.type);
    case 'real':
      return toReal(value, column.type);
    case 'numeric':
      return toNumeric(value, column.type);
    case 'text':
      return ok({ kind: 'text', value: asText(value) });
    case 'blob':
      return toBlob(value);
  }
}
