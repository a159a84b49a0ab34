/**
 * LLM Module
 *
 * Provider client, prompts and cost accounting for Anthropic and OpenAI.
 */

export * from './types';
export * from './errors';
export * from './cost';
export * from './client';
export * from './prompts';
