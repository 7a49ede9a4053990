/**
 * Matcher
 *
 * Decides which descriptor claims a token. Keyword descriptors are tried
 * first, in declaration order, so a positional slot never absorbs a token
 * that names a keyword option. Only then is the first unfilled positional
 * descriptor returned.
 */

import type {
  OptionDescriptor,
  KeywordDescriptor,
  PositionalDescriptor,
} from '../options/option-descriptor';

/**
 * Descriptor set partitioned by kind, each part in declaration order
 */
export interface SplitOptions {
  keyword: KeywordDescriptor[];
  positional: PositionalDescriptor[];
}

export function splitOptions(options: readonly OptionDescriptor[]): SplitOptions {
  const split: SplitOptions = { keyword: [], positional: [] };
  for (const option of options) {
    if (option.kind === 'keyword') {
      split.keyword.push(option);
    } else {
      split.positional.push(option);
    }
  }
  return split;
}

/**
 * Find the descriptor that claims `token`, or null when none does.
 * On duplicate keyword identifiers the first declared descriptor wins.
 */
export function matchOption(token: string, options: SplitOptions): OptionDescriptor | null {
  for (const option of options.keyword) {
    if (option.matches(token)) {
      return option;
    }
  }
  for (const option of options.positional) {
    if (option.matches(token)) {
      return option;
    }
  }
  return null;
}

/**
 * Identifiers declared by more than one keyword descriptor, in first-seen order
 */
export function findDuplicateIdentifiers(options: readonly KeywordDescriptor[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const option of options) {
    for (const identifier of new Set(option.identifiers)) {
      if (seen.has(identifier)) {
        duplicates.add(identifier);
      }
      seen.add(identifier);
    }
  }
  return [...duplicates];
}
