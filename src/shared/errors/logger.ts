/**
 * Error Logger
 *
 * Forwards errors to pino and keeps the most recent ones in memory, so a
 * caller embedding the pipeline can inspect fallbacks and stage failures
 * after a run.
 */

import type { Level, Logger } from 'pino';
import { logger } from '../logging/logger';
import { AppError, ErrorCategory, ErrorInfo, ErrorSeverity } from './types';

const HISTORY_LIMIT = 200;

const LEVEL_BY_SEVERITY: Record<ErrorSeverity, Level> = {
  [ErrorSeverity.LOW]: 'warn',
  [ErrorSeverity.MEDIUM]: 'warn',
  [ErrorSeverity.HIGH]: 'error',
  [ErrorSeverity.CRITICAL]: 'fatal'
};

export class ErrorLogger {
  private static history: ErrorInfo[] = [];

  /**
   * Remember the error and log it, on `target` when a component logger is given
   */
  static record(error: AppError, context?: Record<string, unknown>, target: Logger = logger): ErrorInfo {
    const base = error.toInfo();
    const info: ErrorInfo = context ? { ...base, context: { ...base.context, ...context } } : base;

    this.history.push(info);
    if (this.history.length > HISTORY_LIMIT) {
      this.history.shift();
    }

    target[LEVEL_BY_SEVERITY[info.severity]](
      {
        category: info.category,
        details: info.technicalDetails,
        context: info.context
      },
      info.userMessage
    );
    return info;
  }

  static getLogs(): ErrorInfo[] {
    return [...this.history];
  }

  static getLogsByCategory(category: ErrorCategory): ErrorInfo[] {
    return this.history.filter(info => info.category === category);
  }

  static clearLogs(): void {
    this.history = [];
  }
}
