/**
 * LLM Types
 *
 * Model catalog entries and the provider client contract.
 * Supports both Anthropic and OpenAI providers.
 */

/**
 * Supported LLM providers
 */
export type LLMProvider = 'anthropic' | 'openai';

/**
 * Work a model can be asked to do
 */
export type TaskType = 'embedding' | 'job_parsing' | 'cv_generation';

export type LatencyClass = 'fast' | 'standard' | 'slow';

export type QualityTier = 'standard' | 'medium' | 'high' | 'premium';

/**
 * Ordinal position of each quality tier, higher is better
 */
export const QUALITY_RANK: Record<QualityTier, number> = {
  standard: 1,
  medium: 2,
  high: 3,
  premium: 4
};

/**
 * Immutable description of one model, loaded from the catalog at start-up
 */
export interface ModelProfile {
  readonly id: string;
  readonly provider: LLMProvider;
  readonly taskTypes: readonly TaskType[];
  /** USD per 1K input tokens (per 1K tokens for embeddings) */
  readonly costPerUnit: number;
  /** USD per 1K output tokens; zero for embedding models */
  readonly costPerOutputUnit: number;
  readonly latencyClass: LatencyClass;
  readonly qualityTier: QualityTier;
  readonly dimensions?: number;
  readonly maxOutputTokens?: number;
  readonly contextWindow?: number;
  readonly deprecated: boolean;
}

/**
 * Token usage reported by a provider
 */
export interface ProviderUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Per-call options
 */
export interface ProviderCallOptions {
  /** Aborts the in-flight request (timeout or caller cancellation) */
  signal?: AbortSignal;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface EmbedResult {
  vector: number[];
  costUsd: number;
  usage: ProviderUsage;
}

export interface GenerateResult {
  /** Parsed JSON body of the completion */
  content: unknown;
  /** Raw completion text */
  text: string;
  model: string;
  costUsd: number;
  usage: ProviderUsage;
  finishReason?: string;
}

/**
 * Contract between the orchestration core and a model provider.
 *
 * Implementations must reject with a ProviderError so callers can tell
 * transport failures, malformed payloads, rate limiting and timeouts apart.
 */
export interface ProviderClient {
  embed(text: string, model: ModelProfile, options?: ProviderCallOptions): Promise<EmbedResult>;
  generate(prompt: string, model: ModelProfile, options?: ProviderCallOptions): Promise<GenerateResult>;
}

/**
 * Default generation parameters
 */
export const DEFAULT_GENERATION_OPTIONS = {
  temperature: 0.3,
  maxTokens: 2500
} as const;
