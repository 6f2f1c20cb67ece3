/**
 * Validation Module
 *
 * Validation result types and zod helpers.
 */

export * from './types';
export * from './validator';
