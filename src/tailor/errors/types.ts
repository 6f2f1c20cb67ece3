/**
 * Tailor Error Types
 *
 * Error codes for the content pipeline. Extends the shared AppError.
 * Input and rendering errors halt a stage; service and response-shape
 * failures never surface as TailorErrors (components fall back instead).
 */

import { AppError, ErrorCategory, ErrorSeverity } from '../../shared/errors/types';
import type { ValidationError } from '../../shared/validation/types';
import { formatValidationErrors } from '../../shared/validation/validator';

/**
 * Tailor-specific error codes
 */
export enum TailorErrorCode {
  // Input errors
  JOB_DESCRIPTION_NOT_FOUND = 'JOB_DESCRIPTION_NOT_FOUND',
  CORPUS_FILE_NOT_FOUND = 'CORPUS_FILE_NOT_FOUND',
  CORPUS_INVALID = 'CORPUS_INVALID',
  ARTIFACT_NOT_FOUND = 'ARTIFACT_NOT_FOUND',
  ARTIFACT_INVALID = 'ARTIFACT_INVALID',
  TEMPLATE_NOT_FOUND = 'TEMPLATE_NOT_FOUND',

  // Rendering errors
  RENDER_FAILED = 'RENDER_FAILED',

  // Setup errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INVALID_STAGE_RANGE = 'INVALID_STAGE_RANGE',
  MISSING_API_KEY = 'MISSING_API_KEY'
}

/**
 * Tailor-specific error class
 */
export class TailorError extends AppError {
  public readonly code: TailorErrorCode;
  public readonly validationErrors?: ValidationError[];

  constructor(
    code: TailorErrorCode,
    userMessage: string,
    technicalDetails: string,
    options?: {
      category?: ErrorCategory;
      severity?: ErrorSeverity;
      context?: Record<string, unknown>;
      validationErrors?: ValidationError[];
      suggestedAction?: string;
    }
  ) {
    super({
      category: options?.category ?? ErrorCategory.UNEXPECTED,
      severity: options?.severity ?? ErrorSeverity.HIGH,
      userMessage,
      technicalDetails,
      timestamp: new Date(),
      context: options?.context,
      recoverable: false,
      suggestedAction: options?.suggestedAction
    });

    this.name = 'TailorError';
    this.code = code;
    this.validationErrors = options?.validationErrors;
  }
}

/**
 * Factory functions for each error code
 */
export class TailorErrorFactory {
  static jobDescriptionNotFound(path: string): TailorError {
    return new TailorError(
      TailorErrorCode.JOB_DESCRIPTION_NOT_FOUND,
      `Job description file not found: ${path}`,
      `ENOENT: ${path}`,
      {
        category: ErrorCategory.FILE_HANDLING,
        context: { path },
        suggestedAction: 'Pass the path to a plain-text job description'
      }
    );
  }

  static corpusFileNotFound(path: string): TailorError {
    return new TailorError(
      TailorErrorCode.CORPUS_FILE_NOT_FOUND,
      `Source file not found: ${path}`,
      `ENOENT: ${path}`,
      {
        category: ErrorCategory.FILE_HANDLING,
        context: { path },
        suggestedAction: 'Check --source-dir; it must contain personal_info, education, experience, projects and skills JSON files'
      }
    );
  }

  /**
   * Corpus file that is not JSON, or does not match its schema
   */
  static corpusInvalid(path: string, details: string, validationErrors?: ValidationError[]): TailorError {
    return new TailorError(
      TailorErrorCode.CORPUS_INVALID,
      `Source file is invalid: ${path}`,
      validationErrors ? formatValidationErrors(validationErrors) : details,
      {
        category: validationErrors ? ErrorCategory.VALIDATION : ErrorCategory.PARSING,
        context: { path },
        validationErrors,
        suggestedAction: 'Fix the listed fields and run the stage again'
      }
    );
  }

  static artifactNotFound(label: string, directory: string, jobName: string): TailorError {
    return new TailorError(
      TailorErrorCode.ARTIFACT_NOT_FOUND,
      `No ${label} artifact found for ${jobName}`,
      `No file matching ${jobName}_${label}_*.json in ${directory}`,
      {
        category: ErrorCategory.FILE_HANDLING,
        context: { label, directory, jobName },
        suggestedAction: 'Run the earlier stage first, or include it in --step'
      }
    );
  }

  static artifactInvalid(path: string, details: string, validationErrors?: ValidationError[]): TailorError {
    return new TailorError(
      TailorErrorCode.ARTIFACT_INVALID,
      `Artifact is invalid: ${path}`,
      validationErrors ? formatValidationErrors(validationErrors) : details,
      {
        category: validationErrors ? ErrorCategory.VALIDATION : ErrorCategory.PARSING,
        context: { path },
        validationErrors,
        suggestedAction: 'Re-run the stage that produced it'
      }
    );
  }

  static templateNotFound(path: string): TailorError {
    return new TailorError(
      TailorErrorCode.TEMPLATE_NOT_FOUND,
      `Template not found: ${path}`,
      `ENOENT: ${path}`,
      {
        category: ErrorCategory.FILE_HANDLING,
        context: { path },
        suggestedAction: 'Check the latex-template directory'
      }
    );
  }

  /**
   * Document compilation failed; output carries the compiler's log
   */
  static renderFailed(document: string, output: string): TailorError {
    return new TailorError(
      TailorErrorCode.RENDER_FAILED,
      `Failed to compile ${document}`,
      output,
      {
        category: ErrorCategory.RENDERING,
        context: { document },
        suggestedAction: 'Check that latexmk or pdflatex is installed and read the compiler output above'
      }
    );
  }

  static configurationError(field: string, reason: string): TailorError {
    return new TailorError(
      TailorErrorCode.CONFIGURATION_ERROR,
      'Configuration error',
      `Invalid configuration for ${field}: ${reason}`,
      {
        category: ErrorCategory.CONFIGURATION,
        severity: ErrorSeverity.CRITICAL,
        context: { field },
        suggestedAction: 'Check command-line options and environment variables'
      }
    );
  }

  static invalidStageRange(value: string, reason: string): TailorError {
    return new TailorError(
      TailorErrorCode.INVALID_STAGE_RANGE,
      `Invalid stage selection: ${value}`,
      reason,
      {
        category: ErrorCategory.VALIDATION,
        context: { value },
        suggestedAction: 'Use 1, 2, 3, 4, a range such as 2-3, or all'
      }
    );
  }

  static missingApiKey(provider: string, envVar: string): TailorError {
    return new TailorError(
      TailorErrorCode.MISSING_API_KEY,
      `No API key for ${provider}`,
      `${envVar} is not set and --api-key was not given`,
      {
        category: ErrorCategory.CONFIGURATION,
        severity: ErrorSeverity.CRITICAL,
        context: { provider },
        suggestedAction: `Set ${envVar}, pass --api-key, or use --dry-run`
      }
    );
  }
}
