/**
 * Validation Types
 *
 * Field-level validation results, used when loading documents from disk.
 */

/**
 * Validation error for a specific field, addressed by its dotted path
 */
export interface ValidationError {
  field: string;
  message: string;
}

/**
 * Result of validation
 */
export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}
