/**
 * Validator Utilities
 *
 * Zod-backed validation that reports every invalid field instead of throwing.
 */

import { z } from 'zod';
import { ValidationResult, ValidationError } from './types';

/**
 * Outcome of validating unknown data against a schema
 */
export type SchemaValidation<T> =
  | { success: true; data: T }
  | { success: false; result: ValidationResult };

/**
 * Convert Zod errors to ValidationResult format
 */
export function zodErrorToValidationResult(error: z.ZodError): ValidationResult {
  const errors: ValidationError[] = error.errors.map(err => ({
    field: err.path.join('.') || '(root)',
    message: err.message
  }));

  return {
    isValid: false,
    errors
  };
}

/**
 * Validate data against a schema, returning the parsed value or the field errors
 */
export function validateWithSchema<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): SchemaValidation<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, result: zodErrorToValidationResult(result.error) };
}

/**
 * Render validation errors as a single line, e.g. "0.company: Required; 1.priority: Invalid enum value"
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map(err => `${err.field}: ${err.message}`).join('; ');
}
