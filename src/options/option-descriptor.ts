/**
 * Option Descriptors
 *
 * The capability every option implements. Descriptors are owned by the
 * caller; the parser only holds references to them and mutates them through
 * `parse`.
 */

import type { ValueType } from './converters';

export type OptionKind = 'keyword' | 'positional';

/** Label and description of one help entry */
export interface HelpEntry {
  label: string;
  description: string;
}

/**
 * Capability shared by all descriptors
 */
export interface OptionBase {
  readonly kind: OptionKind;

  /**
   * Whether this option claims the token. Pure: never mutates.
   */
  matches(token: string): boolean;

  /**
   * Tokens that follow the matched one: >= 0, or VARIADIC for all remaining
   */
  paramCount(): number;

  /**
   * Convert and store the value from `[matchedToken, ...params]`, then mark
   * the option set. Throws ConversionError when conversion is impossible.
   */
  parse(tokens: readonly string[]): void;

  /** True once a value has been parsed; never reverts */
  isSet(): boolean;

  help(): HelpEntry;
}

/**
 * Matched by exact identifier equality, e.g. `-v` or `--verbose`
 */
export interface KeywordDescriptor extends OptionBase {
  readonly kind: 'keyword';
  readonly identifiers: readonly string[];
}

/**
 * Matched by slot: claims any token while it is still unset
 */
export interface PositionalDescriptor extends OptionBase {
  readonly kind: 'positional';
  readonly name: string;
  readonly required: boolean;
}

export type OptionDescriptor = KeywordDescriptor | PositionalDescriptor;

/**
 * State and conversion shared by the typed option classes
 */
export abstract class TypedOption<T> {
  readonly defaultValue: T;
  protected readonly type: ValueType<T>;
  private value: T;
  private set = false;

  protected constructor(type: ValueType<T>, defaultValue: T | undefined) {
    this.type = type;
    this.defaultValue = defaultValue !== undefined ? defaultValue : type.initial;
    this.value = this.defaultValue;
  }

  isSet(): boolean {
    return this.set;
  }

  /** The parsed value, or the default while unset */
  getValue(): T {
    return this.value;
  }

  /** Name of the declared value type */
  get typeName(): string {
    return this.type.name;
  }

  parse(tokens: readonly string[]): void {
    const { identifier, params } = this.splitTokens(tokens);
    this.value = this.type.convert(params, identifier);
    // Marked even when the parsed value equals the default
    this.set = true;
  }

  /**
   * Split the matched slice into the name used for error reporting and the
   * tokens handed to the value type
   */
  protected abstract splitTokens(tokens: readonly string[]): {
    identifier: string;
    params: readonly string[];
  };
}
