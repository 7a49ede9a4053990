/**
 * Config module - configuration resolution
 */

export type { ConfigSource, ResolvedParserConfig } from './resolve-config';
export {
  DEFAULT_SKIP_FIRST,
  DEFAULT_MIN_WIDTH,
  KEYWORD_ONLY_MIN_WIDTH,
  DEFAULT_PARSER_CONFIG,
  resolveParserConfig,
  resolveSkipFirst,
  resolveMinWidth,
} from './resolve-config';
