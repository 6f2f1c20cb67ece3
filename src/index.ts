/**
 * resume-tailor
 *
 * Public API for embedding the pipeline; the CLI lives in tailor/cli.ts.
 */

export * from './tailor/types';
export * from './tailor/validation/schemas';
export * from './tailor/errors';
export * from './tailor/config';
export * from './tailor/corpus';
export * from './tailor/selector';
export * from './tailor/optimizer';
export * from './tailor/coverLetter';
export * from './tailor/render';
export * from './tailor/pipeline';
export * from './shared/llm';
export * from './shared/storage';
