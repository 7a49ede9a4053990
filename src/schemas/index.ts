/**
 * Export validators
 */
export type { ValidationResult, ParserConfig } from './validators';
export {
  formatIssues,
  validateParserConfig,
  validateKeywordIdentifiers,
  validatePositionalName,
  // Zod schemas
  skipFirstSchema,
  parserConfigSchema,
  keywordIdentifiersSchema,
  positionalNameSchema,
} from './validators';
