/**
 * Tests for shared error handling utilities
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ErrorHandler,
  ErrorLogger,
  ErrorCategory,
  ErrorSeverity,
  AppError
} from '../../shared/errors';
import { GracefulDegradation } from '../../tailor/errors/gracefulDegradation';
import { TailorError, TailorErrorFactory } from '../../tailor/errors/types';
import { loggers } from '../../shared/logging/logger';

describe('Shared Error Handler', () => {
  beforeEach(() => {
    ErrorLogger.clearLogs();
  });

  describe('Error Creation', () => {
    it('should create recoverable service errors from SDK failures', () => {
      const error = ErrorHandler.createServiceError(
        'Text-generation call failed',
        new Error('Connection timeout'),
        { operation: 'rank_experiences' }
      );

      expect(error).toBeInstanceOf(AppError);
      expect(error.category).toBe(ErrorCategory.SERVICE);
      expect(error.severity).toBe(ErrorSeverity.MEDIUM);
      expect(error.recoverable).toBe(true);
      expect(error.technicalDetails).toBe('Connection timeout');
      expect(error.context).toEqual({ operation: 'rank_experiences' });
    });

    it('should create recoverable response-shape errors', () => {
      const error = ErrorHandler.createResponseShapeError('Bullet count changed', 'Expected 3 bullets, got 2');

      expect(error.category).toBe(ErrorCategory.RESPONSE_SHAPE);
      expect(error.severity).toBe(ErrorSeverity.LOW);
      expect(error.recoverable).toBe(true);
    });

    it('should pass app errors through unchanged', () => {
      const error = ErrorHandler.createResponseShapeError('Bad reply', 'Not a list');

      expect(ErrorHandler.toAppError(error)).toBe(error);
    });

    it('should wrap anything else as unexpected', () => {
      const error = ErrorHandler.toAppError('plain string failure');

      expect(error.category).toBe(ErrorCategory.UNEXPECTED);
      expect(error.severity).toBe(ErrorSeverity.CRITICAL);
      expect(error.technicalDetails).toBe('plain string failure');
    });
  });

  describe('Message Formatting', () => {
    it('should combine message, details and suggestion', () => {
      const error = TailorErrorFactory.missingApiKey('openai', 'OPENAI_API_KEY');

      expect(ErrorHandler.formatUserMessage(error)).toBe(
        'No API key for openai\n' +
        'OPENAI_API_KEY is not set and --api-key was not given\n\n' +
        'Set OPENAI_API_KEY, pass --api-key, or use --dry-run'
      );
    });

    it('should fall back to the message of plain errors', () => {
      expect(ErrorHandler.formatUserMessage(new Error('boom'))).toBe('boom');
    });
  });

  describe('Error Logging', () => {
    it('should record app errors with merged context', () => {
      const error = TailorErrorFactory.templateNotFound('latex-template/resume.tex');

      ErrorHandler.logError(error, { stage: 3 });

      const logs = ErrorLogger.getLogsByCategory(ErrorCategory.FILE_HANDLING);
      expect(logs).toHaveLength(1);
      expect(logs[0].context).toEqual({ path: 'latex-template/resume.tex', stage: 3 });
    });

    it('should record plain errors as unexpected', () => {
      ErrorHandler.logError(new Error('spawn pdflatex ENOENT'));

      expect(ErrorLogger.getLogs()[0]).toMatchObject({
        category: ErrorCategory.UNEXPECTED,
        technicalDetails: 'spawn pdflatex ENOENT',
        recoverable: false
      });
    });
  });
});

describe('Tailor errors', () => {
  it('should carry a code and stay non-recoverable', () => {
    const error = TailorErrorFactory.artifactNotFound('step1_filtered', 'intermediate-outputs', 'backend');

    expect(error).toBeInstanceOf(TailorError);
    expect(error.code).toBe('ARTIFACT_NOT_FOUND');
    expect(error.recoverable).toBe(false);
    expect(error.technicalDetails).toBe('No file matching backend_step1_filtered_*.json in intermediate-outputs');
  });

  it('should list validation errors in the details', () => {
    const error = TailorErrorFactory.corpusInvalid('experience.json', 'Schema validation failed', [
      { field: '0.role', message: 'Required' },
      { field: '1.priority', message: 'Invalid enum value' }
    ]);

    expect(error.category).toBe(ErrorCategory.VALIDATION);
    expect(error.technicalDetails).toBe('0.role: Required; 1.priority: Invalid enum value');
  });
});

describe('GracefulDegradation', () => {
  const log = loggers.pipeline;

  beforeEach(() => {
    ErrorLogger.clearLogs();
  });

  it('should return the operation result when it succeeds', async () => {
    const result = await GracefulDegradation.withFallback<string>(
      async () => ({ ok: true, value: 'ranked' }),
      () => 'fallback',
      'rank',
      log
    );

    expect(result).toBe('ranked');
    expect(ErrorLogger.getLogs()).toEqual([]);
  });

  it('should record a service failure and return the fallback', async () => {
    const result = await GracefulDegradation.withFallback(
      async () => {
        throw new Error('503 Service Unavailable');
      },
      () => 'fallback',
      'rank',
      log
    );

    expect(result).toBe('fallback');
    const logs = ErrorLogger.getLogsByCategory(ErrorCategory.SERVICE);
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({
      userMessage: 'Text-generation call failed for rank',
      technicalDetails: '503 Service Unavailable',
      context: { operation: 'rank', fallback: 'used' }
    });
  });

  it('should branch to the fallback on an unusable reply without throwing', async () => {
    const result = await GracefulDegradation.withFallback<string>(
      async () => ({ ok: false, reason: 'Empty response' }),
      () => 'fallback',
      'rank',
      log
    );

    expect(result).toBe('fallback');
    expect(ErrorLogger.getLogsByCategory(ErrorCategory.RESPONSE_SHAPE)).toEqual([
      expect.objectContaining({ userMessage: 'Unusable reply for rank', technicalDetails: 'Empty response' })
    ]);
  });
});
