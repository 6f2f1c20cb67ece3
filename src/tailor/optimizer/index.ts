/**
 * Optimizer Module
 *
 * Stage 2: shape-preserving bullet rewrites.
 */

export * from './bulletOptimizer';
export * from './resumeOptimizer';
export * from './prompts';
