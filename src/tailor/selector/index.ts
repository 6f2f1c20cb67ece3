/**
 * Selector Module
 *
 * Stage 1: choose which experiences, projects and skills make the cut.
 */

export * from './prioritySelector';
export * from './rankingAdapter';
export * from './skillFilter';
export * from './filterResume';
export * from './prompts';
