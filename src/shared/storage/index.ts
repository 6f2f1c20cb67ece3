/**
 * Storage Module
 *
 * Storage abstraction for corpus files and pipeline artifacts.
 */

export * from './interface';
export * from './fileStorage';
export * from './memoryStorage';
