/**
 * Cover Letter Module
 *
 * Stage 4 drafting; rendering lives in ../render.
 */

export * from './synthesizer';
export * from './prompts';
