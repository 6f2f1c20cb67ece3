/**
 * Error Handler
 *
 * Builds the recoverable errors raised around text-generation calls and
 * formats any error for the terminal.
 */

import type { Logger } from 'pino';
import { AppError, ErrorCategory, ErrorSeverity } from './types';
import { ErrorLogger } from './logger';

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class ErrorHandler {
  /**
   * The service call itself failed; cause is whatever the SDK threw
   */
  static createServiceError(
    message: string,
    cause: unknown,
    context?: Record<string, unknown>
  ): AppError {
    return new AppError({
      category: ErrorCategory.SERVICE,
      severity: ErrorSeverity.MEDIUM,
      userMessage: message,
      technicalDetails: describeCause(cause),
      timestamp: new Date(),
      context,
      recoverable: true,
      suggestedAction: 'Check the network connection, the API key and the provider status.'
    });
  }

  /**
   * The service replied, but the reply cannot be used as-is
   */
  static createResponseShapeError(
    message: string,
    technicalDetails: string,
    context?: Record<string, unknown>
  ): AppError {
    return new AppError({
      category: ErrorCategory.RESPONSE_SHAPE,
      severity: ErrorSeverity.LOW,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: true
    });
  }

  /**
   * Normalize anything thrown into an AppError
   */
  static toAppError(error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }
    return new AppError({
      category: ErrorCategory.UNEXPECTED,
      severity: ErrorSeverity.CRITICAL,
      userMessage: 'An unexpected error occurred.',
      technicalDetails: describeCause(error),
      timestamp: new Date(),
      recoverable: false
    });
  }

  static logError(error: unknown, context?: Record<string, unknown>, target?: Logger): void {
    ErrorLogger.record(this.toAppError(error), context, target);
  }

  /**
   * Message, details (when they add anything) and suggestion, one per paragraph
   */
  static formatUserMessage(error: unknown): string {
    if (!(error instanceof AppError)) {
      return describeCause(error);
    }

    let message = error.userMessage;
    if (error.technicalDetails && error.technicalDetails !== error.userMessage) {
      message += `\n${error.technicalDetails}`;
    }
    if (error.suggestedAction) {
      message += `\n\n${error.suggestedAction}`;
    }
    return message;
  }
}
