/**
 * Value types
 *
 * A ValueType is the per-type conversion strategy behind a typed option:
 * how many tokens it takes after a keyword identifier, the value held before
 * the option is set, and how the taken tokens become a value. Supporting a
 * new type means writing one of these; matching and dispatch never change.
 */

import { z } from 'zod';
import { ConversionError } from '../types/parse-errors';
import { formatIssues } from '../schemas/validators';

/** Arity sentinel: the option consumes every remaining token */
export const VARIADIC = -1;

export interface ValueType<T> {
  /** Name reported in conversion errors, e.g. "integer" */
  readonly name: string;
  /** Tokens taken after a keyword identifier: 0, N > 0, or VARIADIC */
  readonly arity: number;
  /** Value an option of this type holds until it is set */
  readonly initial: T;
  /**
   * Convert the value tokens. `identifier` names the option for error
   * reporting. Throws ConversionError when the tokens are not a valid T.
   */
  convert(params: readonly string[], identifier: string): T;
}

/**
 * Build a single-token value type from a token conversion
 */
export function scalarValue<T>(
  name: string,
  initial: T,
  parseToken: (token: string, identifier: string) => T
): ValueType<T> {
  return {
    name,
    arity: 1,
    initial,
    convert: (params, identifier) => parseToken(params[0] ?? '', identifier),
  };
}

/**
 * Build a single-token value type from a zod schema over the raw token.
 * The schema decides what a fully consumed, representable token is.
 */
export function schemaValue<S extends z.ZodTypeAny>(
  schema: S,
  name: string,
  initial: z.output<S>
): ValueType<z.output<S>> {
  return scalarValue<z.output<S>>(name, initial, (token, identifier) => {
    const result = schema.safeParse(token);
    if (!result.success) {
      throw new ConversionError(identifier, token, name, formatIssues(result.error));
    }
    return result.data;
  });
}

// =============================================================================
// Built-in types
// =============================================================================

/**
 * Verbatim string: the token is taken as-is
 */
export function stringValue(initial = ''): ValueType<string> {
  return scalarValue('string', initial, (token) => token);
}

/**
 * Presence-only flag: takes no tokens and is always true once matched
 */
export function flagValue(): ValueType<boolean> {
  return {
    name: 'flag',
    arity: 0,
    initial: false,
    convert: () => true,
  };
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

// Number('-0') is -0
const toNumber = (text: string): number => Number(text) + 0;

const integerSchema = z
  .string()
  .regex(INTEGER_PATTERN, 'not an integer')
  .transform(toNumber)
  .pipe(z.number().refine(Number.isSafeInteger, 'outside the safe integer range'));

const numberSchema = z
  .string()
  .regex(DECIMAL_PATTERN, 'not a number')
  .transform(toNumber)
  .pipe(z.number().refine(Number.isFinite, 'outside the representable range'));

/**
 * Signed integer within the safe integer range
 */
export function integerValue(initial = 0): ValueType<number> {
  return schemaValue(integerSchema, 'integer', initial);
}

/**
 * Finite decimal number, optionally with an exponent
 */
export function numberValue(initial = 0): ValueType<number> {
  return schemaValue(numberSchema, 'number', initial);
}

/**
 * One of a fixed set of strings. Holds the first value until set.
 */
export function choiceValue<T extends string>(
  values: readonly [T, ...T[]],
  initial: T = values[0]
): ValueType<T> {
  const expected = `one of: ${values.join(', ')}`;
  return scalarValue<T>(expected, initial, (token, identifier) => {
    const match = values.find((value) => value === token);
    if (match === undefined) {
      throw new ConversionError(identifier, token, expected);
    }
    return match;
  });
}

/**
 * Separated list in a single token, e.g. "a,b,c". Each part is trimmed,
 * empty parts are dropped, and the rest are converted by `item`.
 */
export function listValue<T>(
  item: ValueType<T>,
  separator = ','
): ValueType<T[]> {
  return {
    name: `list of ${item.name}`,
    arity: 1,
    initial: [],
    convert: (params, identifier) =>
      (params[0] ?? '')
        .split(separator)
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .map((part) => item.convert([part], identifier)),
  };
}

/**
 * Variadic: every remaining token, each converted by `item`
 */
export function restValue<T>(item: ValueType<T>): ValueType<T[]> {
  return {
    name: `${item.name}...`,
    arity: VARIADIC,
    initial: [],
    convert: (params, identifier) => params.map((param) => item.convert([param], identifier)),
  };
}
