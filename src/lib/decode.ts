/**
 * Weak decoding of untyped configuration fields
 *
 * Build definitions arrive as loosely typed maps (JSON, HCL converted to
 * JSON, host overlays). These schemas accept the shapes authors actually
 * write (numbers as strings, "" for false) and reject the rest with a
 * message naming the field.
 *
 * Fields are decoded one at a time so that one bad value never hides the
 * errors of the others.
 */

import { z } from 'zod';
import { parseDuration } from './duration';
import { MultiError, ERROR_MESSAGES } from './errors';

const TRUE_STRINGS = new Set(['1', 't', 'true']);
const FALSE_STRINGS = new Set(['', '0', 'f', 'false']);

/**
 * Check whether a value is a plain key/value object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Boolean that also accepts "" and the usual boolean literals as strings
 */
export const weakBoolean = z.union([z.boolean(), z.string()]).transform((value, ctx) => {
  if (typeof value === 'boolean') return value;
  const lowered = value.trim().toLowerCase();
  if (TRUE_STRINGS.has(lowered)) return true;
  if (FALSE_STRINGS.has(lowered)) return false;
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: `cannot parse "${value}" as a boolean`,
  });
  return z.NEVER;
});

const DECIMAL_INTEGER = /^[+-]?\d+$/;

/**
 * Safe integer given as a number or a decimal string; hex, exponent and
 * fractional notations are rejected
 */
export const weakInt = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const text = typeof value === 'string' ? value.trim() : '';
  const parsed = typeof value === 'number' ? value : DECIMAL_INTEGER.test(text) ? Number(text) : NaN;
  if (!Number.isSafeInteger(parsed)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected an integer, got ${JSON.stringify(value)}`,
    });
    return z.NEVER;
  }
  return parsed;
});

/**
 * Duration string decoded to milliseconds
 */
export const duration = z.string().transform((value, ctx) => {
  const parsed = parseDuration(value);
  if (!parsed.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error });
    return z.NEVER;
  }
  return parsed.value;
});

/**
 * Accept either one item or a list of items, always yielding a list
 */
export function singleOrArray<T extends z.ZodTypeAny>(item: T) {
  return z.union([z.array(item), item]).transform((value): Array<z.output<T>> =>
    Array.isArray(value) ? value : [value],
  );
}

export const stringList = z.array(z.string());
export const stringMap = z.record(z.string());

/**
 * Define `key` as an own data property, including `__proto__`, which plain
 * assignment would treat as the prototype setter
 */
export function setOwn(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Rename keys that differ from a known key only by case
 */
export function canonicalizeKeys(
  raw: Record<string, unknown>,
  known: Iterable<string>,
): Record<string, unknown> {
  const byLower = new Map<string, string>();
  for (const key of known) byLower.set(key.toLowerCase(), key);

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    setOwn(out, byLower.get(key.toLowerCase()) ?? key, value);
  }
  return out;
}

/**
 * Key/value object whose keys are matched case-insensitively and checked
 * against the shape
 */
export function strictRecord<S extends z.ZodRawShape>(shape: S) {
  const known = Object.keys(shape);
  return z.preprocess(
    (value) => (isRecord(value) ? canonicalizeKeys(value, known) : value),
    z.object(shape).strict(),
  );
}

/**
 * Render a zod issue path as `a.b[0].c`
 */
export function formatPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    return acc === '' ? segment : `${acc}.${segment}`;
  }, '');
}

/**
 * Convert a zod error into field errors prefixed with the field path
 */
export function issuesToErrors(error: z.ZodError, prefix: ReadonlyArray<string | number>): Error[] {
  return error.issues.map((issue) => {
    const path = formatPath([...prefix, ...issue.path]);
    return new Error(`${path}: ${issue.message}`);
  });
}

export type FieldSchemas = Record<string, z.ZodTypeAny>;

export type DecodedFields<S extends FieldSchemas> = {
  [K in keyof S]?: z.output<S[K]>;
};

export interface DecodeOptions {
  /** Path prefix for messages, e.g. ['disk_attachment', 0] */
  prefix?: ReadonlyArray<string | number>;
  /** Report keys missing from the schemas */
  rejectUnknown?: boolean;
}

/**
 * Decode every known field independently, appending errors to `errors`.
 *
 * Fields that fail to decode are left out of the result. Keys are matched
 * case-insensitively; unknown keys produce one error each.
 */
export function decodeFields<S extends FieldSchemas>(
  schemas: S,
  raw: Record<string, unknown>,
  errors: MultiError,
  options: DecodeOptions = {},
): DecodedFields<S> {
  const { prefix = [], rejectUnknown = true } = options;
  const input = canonicalizeKeys(raw, Object.keys(schemas));
  const scope = prefix.length > 0 ? formatPath(prefix) : undefined;

  if (rejectUnknown) {
    for (const key of Object.keys(input)) {
      if (!Object.prototype.hasOwnProperty.call(schemas, key)) {
        errors.append(ERROR_MESSAGES.UNKNOWN_KEY(key, scope));
      }
    }
  }

  const decoded: DecodedFields<S> = {};
  for (const key in schemas) {
    const value = input[key];
    if (value === undefined || value === null) continue;

    const schema = schemas[key];
    if (schema === undefined) continue;

    const parsed = schema.safeParse(value);
    if (parsed.success) {
      decoded[key] = parsed.data;
    } else {
      errors.append(...issuesToErrors(parsed.error, [...prefix, key]));
    }
  }
  return decoded;
}
