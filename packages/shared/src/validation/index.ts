import { z } from 'zod';
import { ValidationError } from '../errors';

/**
 * Assert that a Zod safeParse result succeeded, throwing a ValidationError if not.
 * After calling this, `parsed.data` is type-safe.
 *
 * @example
 * ```ts
 * const parsed = configSchema.safeParse(raw);
 * assertValidated(parsed, 'Invalid migration config');
 * return parsed.data;
 * ```
 */
export function assertValidated<T>(
  parsed: z.SafeParseReturnType<unknown, T>,
  message = 'Validation failed',
): asserts parsed is z.SafeParseSuccess<T> {
  if (!parsed.success) {
    throw new ValidationError(
      message,
      parsed.error.issues.map((i) => ({
        field: i.path.join('.'),
        message: i.message,
      })),
    );
  }
}

/** `{ [name]: name }` string maps, used for directory → table overrides */
export const nameMapSchema = z.record(z.string().min(1), z.string().min(1));

/**
 * Parse a name map from either JSON (`{"events":"event"}`) or the
 * compact `key=value,key=value` form used on the command line.
 */
export function parseNameMap(input: string | undefined): Record<string, string> | undefined {
  if (input == null) return undefined;
  const trimmed = input.trim();
  if (trimmed === '') return {};

  if (trimmed.startsWith('{')) {
    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch (e) {
      throw new ValidationError(`Invalid name map JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    const parsed = nameMapSchema.safeParse(raw);
    assertValidated(parsed, 'Invalid name map');
    return parsed.data;
  }

  const map: Record<string, string> = {};
  for (const pair of trimmed.split(',')) {
    if (pair.trim() === '') continue;
    const eq = pair.indexOf('=');
    const key = eq > 0 ? pair.slice(0, eq).trim() : '';
    const value = eq > 0 ? pair.slice(eq + 1).trim() : '';
    if (!key || !value) {
      throw new ValidationError(`Invalid name map entry "${pair.trim()}"`, [
        { field: pair.trim(), message: 'expected key=value' },
      ]);
    }
    map[key] = value;
  }
  return map;
}
