/**
 * Configuration Resolution
 * Merges caller-supplied settings over defaults
 */

import { ConfigurationError } from '../types/parse-errors';
import { validateParserConfig, type ParserConfig } from '../schemas/validators';

/** Default number of leading tokens to skip (the invoked program) */
export const DEFAULT_SKIP_FIRST = 1;

/** Default label column width when positional options are present */
export const DEFAULT_MIN_WIDTH = 25;

/** Default label column width for keyword-only option sets */
export const KEYWORD_ONLY_MIN_WIDTH = 15;

export const DEFAULT_PARSER_CONFIG: ParserConfig = {
  skipFirst: DEFAULT_SKIP_FIRST,
};

/**
 * Where a resolved setting came from
 */
export type ConfigSource = 'explicit' | 'default';

export interface ResolvedParserConfig {
  config: ParserConfig;
  sources: Record<keyof ParserConfig, ConfigSource>;
}

/**
 * Resolve parser configuration: explicit settings > defaults.
 * Throws ConfigurationError listing every invalid setting.
 */
export function resolveParserConfig(overrides: Partial<ParserConfig> = {}): ResolvedParserConfig {
  const sources: Record<keyof ParserConfig, ConfigSource> = {
    skipFirst: overrides.skipFirst !== undefined ? 'explicit' : 'default',
  };

  const result = validateParserConfig({
    ...overrides,
    skipFirst: overrides.skipFirst ?? DEFAULT_PARSER_CONFIG.skipFirst,
  });
  if (!result.success || !result.data) {
    throw new ConfigurationError('parser config', result.errors ?? []);
  }
  return { config: result.data, sources };
}

/**
 * Validate a per-call skip count
 */
export function resolveSkipFirst(skipFirst: number): number {
  return resolveParserConfig({ skipFirst }).config.skipFirst;
}

/**
 * Resolve the help label column width. Without an explicit width the default
 * depends on whether the option set has positional options. Help rendering
 * never fails, so unusable widths are normalized instead of rejected.
 */
export function resolveMinWidth(minWidth: number | undefined, hasPositional: boolean): number {
  if (minWidth === undefined) {
    return hasPositional ? DEFAULT_MIN_WIDTH : KEYWORD_ONLY_MIN_WIDTH;
  }
  return Number.isFinite(minWidth) ? Math.max(0, Math.floor(minWidth)) : 0;
}
