/**
 * LLM Module
 * 
 * Unified LLM client and utilities for OpenAI and Anthropic.
 */

export * from './types';
export * from './client';
export * from './parse';
export * from './prompts';
