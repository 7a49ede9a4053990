/**
 * Dispatcher
 *
 * Drives the left-to-right scan of an argument vector: match each token,
 * resolve the slice its option owns, convert, advance. Tokens no option
 * claims are collected rather than rejected.
 */

import type { OptionDescriptor, PositionalDescriptor } from '../options/option-descriptor';
import type { Logger, LogMetadata } from '../types/logger';
import type { ParserConfig } from '../schemas/validators';
import {
  ArgParseError,
  ArgumentCountError,
  ConversionError,
  IllegalArityError,
} from '../types/parse-errors';
import { ok, err, type Result } from '../types/result';
import { resolveParserConfig, resolveSkipFirst, DEFAULT_SKIP_FIRST } from '../config/resolve-config';
import { splitOptions, matchOption, findDuplicateIdentifiers } from './matcher';
import { resolveSlice } from './arity-resolver';

export interface ArgParserSettings extends Partial<ParserConfig> {
  /** Receives scan events; nothing is logged without one */
  logger?: Logger;
}

/**
 * Parsing engine over a caller-owned descriptor set.
 *
 * The parser keeps a reference to `options` and mutates the descriptors in
 * place; it must not outlive them and must not be used from two scans at
 * once. The unrecognized list accumulates across `parse` calls.
 */
export class ArgParser {
  private readonly options: readonly OptionDescriptor[];
  private readonly config: ParserConfig;
  private readonly logger: Logger | undefined;
  private readonly unrecognized: string[] = [];

  constructor(options: readonly OptionDescriptor[], settings: ArgParserSettings = {}) {
    const { logger, ...overrides } = settings;
    this.options = options;
    this.config = resolveParserConfig(overrides).config;
    this.logger = logger;

    for (const identifier of findDuplicateIdentifiers(splitOptions(options).keyword)) {
      this.logger?.event(
        'duplicate_identifier',
        `${identifier} is declared by more than one option; the first declared wins`,
        { option: identifier }
      );
    }
  }

  /**
   * Scan `argv` from `skipFirst` (default from settings, normally 1).
   * Conversion and argument-count errors propagate immediately; options
   * parsed before the failure keep their values.
   *
   * @returns true when no token has gone unrecognized on this parser
   */
  parse(argv: readonly string[], skipFirst?: number): boolean {
    const start = skipFirst === undefined ? this.config.skipFirst : resolveSkipFirst(skipFirst);
    const split = splitOptions(this.options);
    let cursor = start;

    this.logger?.event('parse_started', `Scanning ${Math.max(argv.length - start, 0)} argument(s)`, {
      cursor,
    });

    try {
      while (cursor < argv.length) {
        const token = argv[cursor];
        const option = matchOption(token, split);

        if (option === null) {
          this.unrecognized.push(token);
          this.logger?.event('token_unrecognized', `Unrecognized argument "${token}"`, { cursor });
          cursor += 1;
          continue;
        }

        const slice = resolveSlice(argv, cursor, option);
        option.parse(slice.tokens);
        const label = option.help().label;
        // a positional's token is its value
        this.logger?.event('option_matched', `Matched ${option.kind === 'keyword' ? token : label}`, {
          cursor,
          option: label,
          consumed: slice.tokens.length - 1,
        });
        cursor = slice.next;
      }
    } catch (error) {
      const failure = describeFailure(error);
      this.logger?.event('parse_failed', failure.message, { cursor, ...failure.metadata });
      throw error;
    }

    this.logger?.event(
      'parse_completed',
      `Scan complete with ${this.unrecognized.length} unrecognized argument(s)`
    );
    return this.unrecognized.length === 0;
  }

  /**
   * Like `parse`, but library errors come back as an Err instead of being thrown
   */
  safeParse(argv: readonly string[], skipFirst?: number): Result<boolean, ArgParseError> {
    try {
      return ok(this.parse(argv, skipFirst));
    } catch (error) {
      if (error instanceof ArgParseError) {
        return err(error);
      }
      throw error;
    }
  }

  /** Every unrecognized token so far, in scan order */
  getUnrecognized(): string[] {
    return [...this.unrecognized];
  }
}

/**
 * Failure summary for logging. Error messages can quote the rejected value,
 * so only the code and the option identifier are logged.
 */
function describeFailure(error: unknown): { message: string; metadata: LogMetadata } {
  if (
    error instanceof ConversionError ||
    error instanceof ArgumentCountError ||
    error instanceof IllegalArityError
  ) {
    return {
      message: `Parse failed with ${error.code} at ${error.identifier}`,
      metadata: { option: error.identifier, code: error.code },
    };
  }
  if (error instanceof ArgParseError) {
    return { message: `Parse failed with ${error.code}`, metadata: { code: error.code } };
  }
  const name = error instanceof Error ? error.name : typeof error;
  return { message: `Parse failed with ${name}`, metadata: {} };
}

/**
 * One scan on a fresh parser.
 *
 * @returns the tokens no option claimed
 */
export function parseArgv(
  argv: readonly string[],
  options: readonly OptionDescriptor[],
  skipFirst: number = DEFAULT_SKIP_FIRST
): string[] {
  const parser = new ArgParser(options, { skipFirst });
  parser.parse(argv);
  return parser.getUnrecognized();
}

/**
 * Required positional options still unset, in declaration order
 */
export function findMissingRequired(options: readonly OptionDescriptor[]): PositionalDescriptor[] {
  return splitOptions(options).positional.filter((option) => option.required && !option.isSet());
}
