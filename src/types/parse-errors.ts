/**
 * Parse errors
 *
 * Every failure the library raises is an ArgParseError carrying a code.
 * Unrecognized tokens are not errors; they are collected by the parser.
 */

export type ArgParseErrorCode =
  | 'CONVERSION'
  | 'ARGUMENT_COUNT'
  | 'ILLEGAL_ARITY'
  | 'INVALID_CONFIG';

/**
 * Base class for all library errors
 */
export class ArgParseError extends Error {
  readonly code: ArgParseErrorCode;

  constructor(code: ArgParseErrorCode, message: string) {
    super(message);
    this.name = 'ArgParseError';
    this.code = code;
  }
}

/**
 * A token could not be converted to the option's declared type
 */
export class ConversionError extends ArgParseError {
  /** The identifier token that triggered the conversion */
  readonly identifier: string;
  /** The offending value (joined with spaces for multi-token values) */
  readonly value: string;
  /** Name of the expected value type */
  readonly expected: string;
  /** Validation issue messages, when the converter is schema-based */
  readonly issues: string[];

  constructor(identifier: string, value: string, expected: string, issues: string[] = []) {
    super('CONVERSION', `Invalid value "${value}" for ${identifier}: expected ${expected}`);
    this.name = 'ConversionError';
    this.identifier = identifier;
    this.value = value;
    this.expected = expected;
    this.issues = issues;
  }
}

/**
 * Fewer tokens remain than the matched option requires
 */
export class ArgumentCountError extends ArgParseError {
  readonly identifier: string;
  readonly expected: number;
  readonly available: number;

  constructor(identifier: string, expected: number, available: number) {
    const noun = expected === 1 ? 'argument' : 'arguments';
    super(
      'ARGUMENT_COUNT',
      `${identifier} requires ${expected} ${noun}, but ${available} remain`
    );
    this.name = 'ArgumentCountError';
    this.identifier = identifier;
    this.expected = expected;
    this.available = available;
  }
}

/**
 * A descriptor reported a negative arity other than the variadic sentinel
 */
export class IllegalArityError extends ArgParseError {
  readonly identifier: string;
  readonly arity: number;

  constructor(identifier: string, arity: number) {
    super('ILLEGAL_ARITY', `Option ${identifier} reported illegal arity ${arity}`);
    this.name = 'IllegalArityError';
    this.identifier = identifier;
    this.arity = arity;
  }
}

/**
 * Invalid parser or help settings, or a malformed descriptor
 */
export class ConfigurationError extends ArgParseError {
  readonly issues: string[];

  constructor(subject: string, issues: string[]) {
    super('INVALID_CONFIG', `Invalid ${subject}: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function isArgParseError(error: unknown): error is ArgParseError {
  return error instanceof ArgParseError;
}
