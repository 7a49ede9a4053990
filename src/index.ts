/**
 * argspan
 *
 * Typed command line option parsing with aligned help output.
 */

export * from './options';
export * from './core';
export * from './cli';
export * from './config';
export * from './types';
export * from './logging';

export type { ParserConfig, ValidationResult } from './schemas';
export { parserConfigSchema, validateParserConfig } from './schemas';
