/**
 * Keyword Option
 *
 * Matched when a token equals one of its identifiers exactly. The tokens
 * after the identifier are handed to the value type.
 */

import { ConfigurationError } from '../types/parse-errors';
import { validateKeywordIdentifiers } from '../schemas/validators';
import type { ValueType } from './converters';
import { TypedOption, type HelpEntry, type KeywordDescriptor } from './option-descriptor';

export interface KeywordOptionConfig<T> {
  /** Identifiers in display order, e.g. ['-o', '--output'] */
  identifiers: readonly string[];
  description?: string;
  type: ValueType<T>;
  /** Falls back to the value type's initial value */
  defaultValue?: T;
}

export class KeywordOption<T> extends TypedOption<T> implements KeywordDescriptor {
  readonly kind = 'keyword';
  readonly identifiers: readonly string[];
  readonly description: string;

  constructor(config: KeywordOptionConfig<T>) {
    super(config.type, config.defaultValue);
    const validation = validateKeywordIdentifiers(config.identifiers);
    if (!validation.success || !validation.data) {
      throw new ConfigurationError('keyword option identifiers', validation.errors ?? []);
    }
    this.identifiers = validation.data;
    this.description = config.description ?? '';
  }

  matches(token: string): boolean {
    return this.identifiers.includes(token);
  }

  paramCount(): number {
    return this.type.arity;
  }

  help(): HelpEntry {
    return { label: this.identifiers.join(', '), description: this.description };
  }

  protected splitTokens(tokens: readonly string[]): {
    identifier: string;
    params: readonly string[];
  } {
    return { identifier: tokens[0] ?? this.identifiers[0], params: tokens.slice(1) };
  }
}
