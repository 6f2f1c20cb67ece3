/**
 * Render Module
 *
 * Stages 3 and 4 output: LaTeX documents compiled to PDF.
 */

export * from './displayFields';
export * from './compiler';
export * from './latexRenderer';
