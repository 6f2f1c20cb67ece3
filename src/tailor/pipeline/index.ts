/**
 * Pipeline Module
 */

export * from './artifacts';
export * from './stages';
export * from './orchestrator';
