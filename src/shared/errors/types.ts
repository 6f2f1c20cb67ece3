/**
 * Error Types
 *
 * Categories, severities and the AppError base class used by the pipeline.
 */

/**
 * What kind of failure occurred
 */
export enum ErrorCategory {
  /** A required input file is missing or unreadable */
  FILE_HANDLING = 'FILE_HANDLING',
  /** A file or reply is not valid JSON */
  PARSING = 'PARSING',
  /** Data parsed but does not match its schema */
  VALIDATION = 'VALIDATION',
  /** The text-generation service failed (network, timeout, non-2xx) */
  SERVICE = 'SERVICE',
  /** The service replied, but not in the expected shape */
  RESPONSE_SHAPE = 'RESPONSE_SHAPE',
  RENDERING = 'RENDERING',
  CONFIGURATION = 'CONFIGURATION',
  UNEXPECTED = 'UNEXPECTED'
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Structured description of an error, as recorded by ErrorLogger
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  userMessage: string;
  technicalDetails: string;
  timestamp: Date;
  context?: Record<string, unknown>;
  /** Whether a component can continue with a fallback */
  recoverable: boolean;
  suggestedAction?: string;
}

/**
 * Error carrying a category and a user-facing message alongside the details
 */
export class AppError extends Error {
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly userMessage: string;
  public readonly technicalDetails: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  public readonly recoverable: boolean;
  public readonly suggestedAction?: string;

  constructor(info: ErrorInfo) {
    super(info.userMessage);
    this.name = 'AppError';
    this.category = info.category;
    this.severity = info.severity;
    this.userMessage = info.userMessage;
    this.technicalDetails = info.technicalDetails;
    this.timestamp = info.timestamp;
    this.context = info.context;
    this.recoverable = info.recoverable;
    this.suggestedAction = info.suggestedAction;
  }

  toInfo(): ErrorInfo {
    return {
      category: this.category,
      severity: this.severity,
      userMessage: this.userMessage,
      technicalDetails: this.technicalDetails,
      timestamp: this.timestamp,
      context: this.context,
      recoverable: this.recoverable,
      suggestedAction: this.suggestedAction
    };
  }
}
