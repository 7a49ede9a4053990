/**
 * Positional Option
 *
 * Content-blind: claims whatever token reaches it while unset, so several
 * positional options fill in declaration order. The matched token is the
 * first value token.
 */

import { ConfigurationError } from '../types/parse-errors';
import { validatePositionalName } from '../schemas/validators';
import type { ValueType } from './converters';
import { TypedOption, type HelpEntry, type PositionalDescriptor } from './option-descriptor';

export interface PositionalOptionConfig<T> {
  /** Name shown in usage and help */
  name: string;
  description?: string;
  type: ValueType<T>;
  /** Optional positionals render bracketed; defaults to true */
  required?: boolean;
  /** Falls back to the value type's initial value */
  defaultValue?: T;
}

export class PositionalOption<T> extends TypedOption<T> implements PositionalDescriptor {
  readonly kind = 'positional';
  readonly name: string;
  readonly description: string;
  readonly required: boolean;

  constructor(config: PositionalOptionConfig<T>) {
    super(config.type, config.defaultValue);
    const validation = validatePositionalName(config.name);
    if (!validation.success || validation.data === undefined) {
      throw new ConfigurationError('positional option name', validation.errors ?? []);
    }
    this.name = validation.data;
    this.description = config.description ?? '';
    this.required = config.required ?? true;
  }

  matches(_token: string): boolean {
    return !this.isSet();
  }

  paramCount(): number {
    const arity = this.type.arity;
    // VARIADIC passes through; other negatives are left for the resolver to reject
    if (arity < 0) {
      return arity;
    }
    // The matched token already supplies the first value
    return Math.max(arity - 1, 0);
  }

  help(): HelpEntry {
    return {
      label: this.required ? this.name : `[${this.name}]`,
      description: this.description,
    };
  }

  protected splitTokens(tokens: readonly string[]): {
    identifier: string;
    params: readonly string[];
  } {
    return { identifier: this.name, params: tokens };
  }
}
