/**
 * CV Tailoring Orchestration Core
 *
 * Public entry point.
 */

export * from './types';
export * from './errors/types';
export { normalizeContent, fingerprint } from './hashing/contentHasher';
export * from './chunking/chunker';
export * from './resilience/circuitBreaker';
export * from './resilience/breakerRegistry';
export * from './budget/budgetLedger';
export * from './budget/budgetStore';
export { KeyedLock } from './budget/keyedLock';
export * from './cache/contentCache';
export * from './cache/cacheBackend';
export * from './selection/modelRegistry';
export * from './selection/modelSelector';
export * from './matching/skillMatcher';
export * from './matching/similarity';
export * from './pipeline/resultState';
export { ModelLease } from './pipeline/modelLease';
export { GenerationPipeline, PARSED_JOB_NAMESPACE, generationNamespace } from './pipeline/generationPipeline';
export type { GenerationPipelineDeps, GenerationPipelineOptions } from './pipeline/generationPipeline';
export * from './service';
export * from '../shared/storage';
export {
  LLMProviderClient,
  classifyProviderError,
  parseJsonResponse,
  ProviderError,
  calculateCost,
  estimateTokens
} from '../shared/llm';
export type {
  LLMClientOptions,
  ProviderErrorKind,
  ProviderClient,
  ProviderCallOptions,
  ProviderUsage,
  EmbedResult,
  GenerateResult
} from '../shared/llm';
