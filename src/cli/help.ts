/**
 * CLI Help Text
 *
 * Renders a usage line and one aligned entry per option. Rendering only
 * reads descriptor state and never fails.
 */

import type { HelpEntry, OptionDescriptor } from '../options/option-descriptor';
import { resolveMinWidth } from '../config/resolve-config';

/** Anything text can be written to, e.g. `process.stdout` */
export interface HelpSink {
  write(chunk: string): unknown;
}

const INDENT = '  ';

/**
 * `Usage: <command> [<options>] <positional labels...>`
 */
export function formatUsage(command: string, options: readonly OptionDescriptor[]): string {
  const parts = ['Usage:', command];
  if (options.some((option) => option.kind === 'keyword')) {
    parts.push('<options>');
  }
  for (const option of options) {
    if (option.kind === 'positional') {
      parts.push(option.help().label);
    }
  }
  return parts.join(' ');
}

/**
 * Lay out one entry. The label is padded to `minWidth`; a longer label puts
 * the description on the next line. Every description line after the first
 * is indented to the description column.
 */
export function formatEntry(entry: HelpEntry, minWidth: number): string[] {
  const width = resolveMinWidth(minWidth, true);
  const indent = ' '.repeat(INDENT.length + width + 1);
  const [first = '', ...rest] = entry.description.split(/\r?\n/);

  if (entry.description === '') {
    return [INDENT + entry.label];
  }

  const lines: string[] = [];
  if (entry.label.length > width) {
    lines.push(INDENT + entry.label);
    lines.push(first === '' ? '' : indent + first);
  } else {
    lines.push(`${INDENT}${entry.label.padEnd(width)} ${first}`.trimEnd());
  }

  for (const line of rest) {
    lines.push(line === '' ? '' : indent + line);
  }
  return lines;
}

/**
 * Full help text: usage line, blank line, entries in declaration order.
 * Without `minWidth` the label column is 25 wide, or 15 for keyword-only sets.
 */
export function formatHelp(
  command: string,
  options: readonly OptionDescriptor[],
  minWidth?: number
): string {
  const hasPositional = options.some((option) => option.kind === 'positional');
  const width = resolveMinWidth(minWidth, hasPositional);
  const lines = [formatUsage(command, options)];

  if (options.length > 0) {
    lines.push('');
    for (const option of options) {
      lines.push(...formatEntry(option.help(), width));
    }
  }
  return lines.join('\n') + '\n';
}

/**
 * Write the help text to `sink`
 */
export function printHelp(
  sink: HelpSink,
  command: string,
  options: readonly OptionDescriptor[],
  minWidth?: number
): void {
  sink.write(formatHelp(command, options, minWidth));
}
