/**
 * Schema Validation with Zod
 * Runtime validation for parser settings and descriptor construction
 */

import { z } from 'zod';

/**
 * Validation result type
 */
export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: string[];
}

/**
 * Format zod issues as `path: message` strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((e) =>
    e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message
  );
}

// =============================================================================
// Parser Config Schema
// =============================================================================

export const skipFirstSchema = z
  .number()
  .int('must be an integer')
  .nonnegative('must not be negative');

export const parserConfigSchema = z
  .object({
    skipFirst: skipFirstSchema,
  })
  .strict();

export type ParserConfig = z.infer<typeof parserConfigSchema>;

/**
 * Validate a complete parser config
 */
export function validateParserConfig(data: unknown): ValidationResult<ParserConfig> {
  const result = parserConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

// =============================================================================
// Descriptor Schemas
// =============================================================================

export const keywordIdentifiersSchema = z
  .array(z.string().min(1, 'identifiers must not be empty strings'))
  .min(1, 'at least one identifier is required');

export const positionalNameSchema = z.string().min(1, 'name must not be empty');

/**
 * Validate the identifiers of a keyword option
 */
export function validateKeywordIdentifiers(data: unknown): ValidationResult<string[]> {
  const result = keywordIdentifiersSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Validate the name of a positional option
 */
export function validatePositionalName(data: unknown): ValidationResult<string> {
  const result = positionalNameSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}
