/**
 * Integration Tests
 *
 * Declares a realistic option set, parses argument vectors end to end and
 * renders help through the public entry point.
 */

import { describe, it, expect } from 'vitest';
import {
  ArgParser,
  ExitCode,
  KeywordOption,
  PositionalOption,
  VARIADIC,
  choiceValue,
  exitCodeForError,
  findMissingRequired,
  flagValue,
  integerValue,
  isErr,
  listValue,
  printHelp,
  restValue,
  stringValue,
  type OptionDescriptor,
} from '../../src';
import { BufferLogger } from '../../src/logging';
import { createStringSink } from '../utils/string-sink';

function buildCopyOptions() {
  const verbose = new KeywordOption({
    identifiers: ['-v', '--verbose'],
    description: 'Print each file as it is copied',
    type: flagValue(),
  });
  const jobs = new KeywordOption({
    identifiers: ['-j', '--jobs'],
    description: 'Parallel copies',
    type: integerValue(),
    defaultValue: 4,
  });
  const mode = new KeywordOption({
    identifiers: ['--mode'],
    description: 'Conflict handling\nskip keeps the existing file',
    type: choiceValue(['overwrite', 'skip']),
  });
  const exclude = new KeywordOption({
    identifiers: ['--exclude'],
    description: 'Comma-separated patterns',
    type: listValue(stringValue()),
  });
  const exec = new KeywordOption({
    identifiers: ['--exec'],
    description: 'Command run after copying; takes the rest of the line',
    type: restValue(stringValue()),
  });
  const source = new PositionalOption({ name: 'source', description: 'Directory to copy', type: stringValue() });
  const dest = new PositionalOption({
    name: 'dest',
    description: 'Target directory',
    type: stringValue('.'),
    required: false,
  });

  const options: OptionDescriptor[] = [verbose, jobs, mode, exclude, exec, source, dest];
  return { options, verbose, jobs, mode, exclude, exec, source, dest };
}

describe('parse and help', () => {
  it('should parse a mixed argument vector', () => {
    const { options, verbose, jobs, mode, exclude, exec, source, dest } = buildCopyOptions();
    const parser = new ArgParser(options);

    const recognized = parser.parse([
      'cp-tree',
      'src',
      '-j',
      '8',
      '--mode',
      'skip',
      'out',
      '--exclude',
      'node_modules, dist',
      '-v',
      '--exec',
      'echo',
      'done',
      '-v',
    ]);

    expect(recognized).toBe(true);
    expect(source.getValue()).toBe('src');
    expect(dest.getValue()).toBe('out');
    expect(jobs.getValue()).toBe(8);
    expect(mode.getValue()).toBe('skip');
    expect(exclude.getValue()).toEqual(['node_modules', 'dist']);
    expect(verbose.getValue()).toBe(true);
    expect(exec.paramCount()).toBe(VARIADIC);
    expect(exec.getValue()).toEqual(['echo', 'done', '-v']);
    expect(findMissingRequired(options)).toEqual([]);
  });

  it('should keep defaults for options that were not given', () => {
    const { options, jobs, mode, dest } = buildCopyOptions();
    new ArgParser(options).parse(['cp-tree', 'src']);

    expect(jobs.isSet()).toBe(false);
    expect(jobs.getValue()).toBe(4);
    expect(mode.getValue()).toBe('overwrite');
    expect(dest.getValue()).toBe('.');
  });

  it('should report a missing required positional option', () => {
    const { options, source } = buildCopyOptions();
    new ArgParser(options).parse(['cp-tree', '-v']);
    expect(findMissingRequired(options)).toEqual([source]);
  });

  it('should collect extra positional tokens as unrecognized', () => {
    const { options } = buildCopyOptions();
    const parser = new ArgParser(options);

    expect(parser.parse(['cp-tree', 'a', 'b', 'c'])).toBe(false);
    expect(parser.getUnrecognized()).toEqual(['c']);
  });

  it('should map a bad value to a usage exit code', () => {
    const { options } = buildCopyOptions();
    const result = new ArgParser(options).safeParse(['cp-tree', 'src', '--mode', 'merge']);

    expect(isErr(result)).toBe(true);
    if (isErr(result)) {
      expect(result.error.message).toBe(
        'Invalid value "merge" for --mode: expected one of: overwrite, skip'
      );
      expect(exitCodeForError(result.error)).toBe(ExitCode.USAGE_ERROR);
    }
  });

  it('should log a full scan', () => {
    const { options } = buildCopyOptions();
    const logger = new BufferLogger();

    new ArgParser(options, { logger }).parse(['cp-tree', 'src', '-v']);

    expect(logger.getEventsByType('option_matched').map((e) => e.metadata.option)).toEqual([
      'source',
      '-v, --verbose',
    ]);
  });

  it('should render help for the option set', () => {
    const { options } = buildCopyOptions();
    const sink = createStringSink();

    printHelp(sink, 'cp-tree', options);

    const pad = (label: string) => '  ' + label.padEnd(25) + ' ';
    const continuation = ' '.repeat(28);
    expect(sink.text()).toBe(
      [
        'Usage: cp-tree <options> source [dest]',
        '',
        pad('-v, --verbose') + 'Print each file as it is copied',
        pad('-j, --jobs') + 'Parallel copies',
        pad('--mode') + 'Conflict handling',
        continuation + 'skip keeps the existing file',
        pad('--exclude') + 'Comma-separated patterns',
        pad('--exec') + 'Command run after copying; takes the rest of the line',
        pad('source') + 'Directory to copy',
        pad('[dest]') + 'Target directory',
      ].join('\n') + '\n'
    );
  });
});
