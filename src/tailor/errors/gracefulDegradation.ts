/**
 * Graceful Degradation Utilities
 *
 * Every call to the text-generation service goes through withFallback.
 * Operations report an unusable reply (not JSON, wrong count, missing field)
 * as a failed ParseResult; only the service call itself may throw. Both
 * cases resolve to the component's deterministic fallback and are recorded
 * in the error history.
 */

import type { Logger } from 'pino';
import { AppError } from '../../shared/errors/types';
import { ErrorHandler } from '../../shared/errors/handler';
import type { ParseResult } from '../../shared/llm/types';

/**
 * Graceful degradation handler
 */
export class GracefulDegradation {
  /**
   * Wrap a service-backed operation with its fallback
   */
  static async withFallback<T>(
    operation: () => Promise<ParseResult<T>>,
    fallback: () => T,
    operationName: string,
    log: Logger
  ): Promise<T> {
    let result: ParseResult<T>;
    try {
      result = await operation();
    } catch (error) {
      const appError = error instanceof AppError
        ? error
        : ErrorHandler.createServiceError(
            `Text-generation call failed for ${operationName}`,
            error,
            { operation: operationName }
          );
      return this.degrade(appError, fallback, operationName, log);
    }

    if (!result.ok) {
      const appError = ErrorHandler.createResponseShapeError(
        `Unusable reply for ${operationName}`,
        result.reason,
        { operation: operationName }
      );
      return this.degrade(appError, fallback, operationName, log);
    }

    return result.value;
  }

  private static degrade<T>(error: AppError, fallback: () => T, operationName: string, log: Logger): T {
    ErrorHandler.logError(error, { operation: operationName, fallback: 'used' }, log);
    return fallback();
  }
}
