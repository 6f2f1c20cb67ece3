/**
 * Errors Module
 */

export * from './types';
export * from './handler';
export * from './logger';
