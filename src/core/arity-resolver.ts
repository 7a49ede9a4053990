/**
 * Arity Resolver
 *
 * Computes the slice of the argument vector that belongs to a matched
 * descriptor: the matched token followed by its parameters.
 */

import { VARIADIC } from '../options/converters';
import type { OptionDescriptor } from '../options/option-descriptor';
import { ArgumentCountError, IllegalArityError } from '../types/parse-errors';

export interface ResolvedSlice {
  /** `[matchedToken, p1, ..., pN]` */
  tokens: string[];
  /** Cursor position after the slice */
  next: number;
}

/**
 * Resolve the tokens owned by `option`, matched at `argv[cursor]`.
 * A variadic option takes everything to the end of the vector.
 */
export function resolveSlice(
  argv: readonly string[],
  cursor: number,
  option: OptionDescriptor
): ResolvedSlice {
  const count = option.paramCount();
  // a positional's matched token is its first value, never an identifier
  const identifier =
    option.kind === 'keyword' ? (argv[cursor] ?? option.identifiers[0]) : option.name;

  if (count === VARIADIC) {
    return { tokens: argv.slice(cursor), next: argv.length };
  }
  if (count < 0 || !Number.isInteger(count)) {
    throw new IllegalArityError(identifier, count);
  }

  const available = argv.length - cursor - 1;
  if (available < count) {
    // positional counts include the matched token
    const offset = option.kind === 'positional' ? 1 : 0;
    throw new ArgumentCountError(identifier, count + offset, available + offset);
  }

  const next = cursor + 1 + count;
  return { tokens: argv.slice(cursor, next), next };
}
