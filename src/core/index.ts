/**
 * Core module - matching, arity resolution and the parse loop
 */

export type { SplitOptions } from './matcher';
export { splitOptions, matchOption, findDuplicateIdentifiers } from './matcher';

export type { ResolvedSlice } from './arity-resolver';
export { resolveSlice } from './arity-resolver';

export type { ArgParserSettings } from './dispatcher';
export { ArgParser, parseArgv, findMissingRequired } from './dispatcher';
