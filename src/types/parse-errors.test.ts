/**
 * Tests for parse errors and exit codes
 */

import { describe, it, expect } from 'vitest';
import {
  ArgParseError,
  ArgumentCountError,
  ConfigurationError,
  ConversionError,
  IllegalArityError,
  isArgParseError,
} from './parse-errors';
import { ExitCode, exitCodeForError, getExitCodeDescription } from './exit-codes';
import { ok, err, isOk, isErr, unwrap } from './result';

describe('parse errors', () => {
  it('should carry codes and names', () => {
    const conversion = new ConversionError('--n', 'x', 'integer');
    expect(conversion).toBeInstanceOf(ArgParseError);
    expect(conversion).toBeInstanceOf(Error);
    expect(conversion.name).toBe('ConversionError');
    expect(conversion.code).toBe('CONVERSION');
    expect(conversion.issues).toEqual([]);

    expect(new ArgumentCountError('--x', 1, 0).code).toBe('ARGUMENT_COUNT');
    expect(new IllegalArityError('--x', -3).code).toBe('ILLEGAL_ARITY');
    expect(new ConfigurationError('parser config', ['a', 'b']).message).toBe(
      'Invalid parser config: a; b'
    );
  });

  it('should pluralize argument counts', () => {
    expect(new ArgumentCountError('-D', 2, 1).message).toBe('-D requires 2 arguments, but 1 remain');
  });

  it('should recognize library errors', () => {
    expect(isArgParseError(new IllegalArityError('--x', -2))).toBe(true);
    expect(isArgParseError(new Error('other'))).toBe(false);
    expect(isArgParseError('text')).toBe(false);
  });
});

describe('exitCodeForError', () => {
  it('should treat user mistakes as usage errors', () => {
    expect(exitCodeForError(new ConversionError('--n', 'x', 'integer'))).toBe(ExitCode.USAGE_ERROR);
    expect(exitCodeForError(new ArgumentCountError('--x', 1, 0))).toBe(ExitCode.USAGE_ERROR);
  });

  it('should treat declaration problems and foreign errors as unexpected', () => {
    expect(exitCodeForError(new IllegalArityError('--x', -2))).toBe(ExitCode.UNEXPECTED_ERROR);
    expect(exitCodeForError(new ConfigurationError('parser config', []))).toBe(
      ExitCode.UNEXPECTED_ERROR
    );
    expect(exitCodeForError(new TypeError('nope'))).toBe(ExitCode.UNEXPECTED_ERROR);
  });

  it('should describe exit codes', () => {
    expect(getExitCodeDescription(ExitCode.USAGE_ERROR)).toBe('Invalid command line usage');
  });
});

describe('Result', () => {
  it('should narrow Ok and Err', () => {
    const good = ok(1);
    const bad = err(new ConversionError('--n', 'x', 'integer'));
    expect(isOk(good)).toBe(true);
    expect(isErr(bad)).toBe(true);
    expect(unwrap(good)).toBe(1);
    expect(() => unwrap(bad)).toThrow(ConversionError);
  });
});
