/**
 * LLM Client
 *
 * Provider client for Anthropic and OpenAI models.
 * Implements the ProviderClient contract: embeddings, structured JSON
 * generation, usage-based cost, and classified provider errors.
 *
 * The SDKs' own retries are disabled; the orchestration layer decides
 * whether another model is tried.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { jsonrepair } from 'jsonrepair';
import {
  EmbedResult,
  GenerateResult,
  LLMProvider,
  ModelProfile,
  ProviderCallOptions,
  ProviderClient,
  ProviderUsage,
  DEFAULT_GENERATION_OPTIONS
} from './types';
import { ProviderError } from './errors';
import { calculateCost } from './cost';
import { loggers } from '../../backend/logger';

const log = loggers.llm;

/**
 * Credentials and transport settings for the provider SDKs
 */
export interface LLMClientOptions {
  anthropicApiKey?: string;
  openaiApiKey?: string;
  /** SDK-level request timeout; callers also pass an AbortSignal per call */
  timeoutMs?: number;
}

/**
 * Provider client backed by the official Anthropic and OpenAI SDKs
 */
export class LLMProviderClient implements ProviderClient {
  private anthropicClient?: Anthropic;
  private openaiClient?: OpenAI;

  constructor(options: LLMClientOptions) {
    const timeout = options.timeoutMs ?? 30000;

    if (options.anthropicApiKey) {
      this.anthropicClient = new Anthropic({
        apiKey: options.anthropicApiKey,
        maxRetries: 0,
        timeout
      });
    }

    if (options.openaiApiKey) {
      this.openaiClient = new OpenAI({
        apiKey: options.openaiApiKey,
        maxRetries: 0,
        timeout
      });
    }
  }

  /**
   * Whether credentials were supplied for a provider
   */
  supports(provider: LLMProvider): boolean {
    return provider === 'anthropic' ? !!this.anthropicClient : !!this.openaiClient;
  }

  /**
   * Embed a single text
   */
  async embed(
    text: string,
    model: ModelProfile,
    options: ProviderCallOptions = {}
  ): Promise<EmbedResult> {
    if (model.provider !== 'openai') {
      throw new ProviderError('transport', model.id, `${model.provider} does not serve embedding models`);
    }
    const client = this.requireOpenAI(model);

    try {
      const response = await client.embeddings.create(
        {
          model: model.id,
          input: text,
          encoding_format: 'float',
          ...(model.dimensions !== undefined && model.id.startsWith('text-embedding-3')
            ? { dimensions: model.dimensions }
            : {})
        },
        { signal: options.signal }
      );

      const first = response.data[0];
      if (!first || !Array.isArray(first.embedding) || first.embedding.length === 0) {
        throw new ProviderError('malformed_response', model.id, 'Embedding response contained no vector');
      }

      const usage: ProviderUsage = {
        inputTokens: response.usage.prompt_tokens,
        outputTokens: 0,
        totalTokens: response.usage.total_tokens
      };

      return {
        vector: first.embedding,
        costUsd: calculateCost(model, usage.inputTokens),
        usage
      };
    } catch (error) {
      throw classifyProviderError(error, model.id, options.signal);
    }
  }

  /**
   * Send a prompt expecting a JSON object back
   */
  async generate(
    prompt: string,
    model: ModelProfile,
    options: ProviderCallOptions = {}
  ): Promise<GenerateResult> {
    const temperature = options.temperature ?? DEFAULT_GENERATION_OPTIONS.temperature;
    const maxTokens = Math.min(
      options.maxTokens ?? DEFAULT_GENERATION_OPTIONS.maxTokens,
      model.maxOutputTokens ?? Number.MAX_SAFE_INTEGER
    );
    const start = Date.now();

    try {
      const raw = model.provider === 'anthropic'
        ? await this.callAnthropic(prompt, model, temperature, maxTokens, options)
        : await this.callOpenAI(prompt, model, temperature, maxTokens, options);

      let content: unknown;
      try {
        content = parseJsonResponse(raw.text);
      } catch (parseError) {
        throw new ProviderError(
          'malformed_response',
          model.id,
          parseError instanceof Error ? parseError.message : String(parseError)
        );
      }

      log.debug(
        {
          model: raw.model,
          elapsedMs: Date.now() - start,
          inputTokens: raw.usage.inputTokens,
          outputTokens: raw.usage.outputTokens,
          finishReason: raw.finishReason
        },
        'Generation complete'
      );

      return {
        ...raw,
        content,
        costUsd: calculateCost(model, raw.usage.inputTokens, raw.usage.outputTokens)
      };
    } catch (error) {
      throw classifyProviderError(error, model.id, options.signal);
    }
  }

  /**
   * Call Anthropic API
   */
  private async callAnthropic(
    prompt: string,
    model: ModelProfile,
    temperature: number,
    maxTokens: number,
    options: ProviderCallOptions
  ): Promise<Omit<GenerateResult, 'content' | 'costUsd'>> {
    if (!this.anthropicClient) {
      throw new ProviderError('transport', model.id, 'Anthropic client not configured (ANTHROPIC_API_KEY missing)');
    }

    const response = await this.anthropicClient.messages.create(
      {
        model: model.id,
        max_tokens: maxTokens,
        temperature,
        ...(options.systemPrompt ? { system: options.systemPrompt } : {}),
        messages: [{ role: 'user', content: prompt }]
      },
      { signal: options.signal }
    );

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      }
    }
    if (!text) {
      throw new ProviderError('malformed_response', model.id, 'No text content in Anthropic response');
    }

    return {
      text,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens
      },
      finishReason: response.stop_reason ?? undefined
    };
  }

  /**
   * Call OpenAI API
   */
  private async callOpenAI(
    prompt: string,
    model: ModelProfile,
    temperature: number,
    maxTokens: number,
    options: ProviderCallOptions
  ): Promise<Omit<GenerateResult, 'content' | 'costUsd'>> {
    const client = this.requireOpenAI(model);

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (options.systemPrompt) {
      messages.push({ role: 'system', content: options.systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    const response = await client.chat.completions.create(
      {
        model: model.id,
        messages,
        temperature,
        max_tokens: maxTokens,
        ...(supportsJsonMode(model.id) ? { response_format: { type: 'json_object' as const } } : {})
      },
      { signal: options.signal }
    );

    const choice = response.choices[0];
    if (!choice || !choice.message.content) {
      throw new ProviderError('malformed_response', model.id, 'No content in OpenAI response');
    }

    return {
      text: choice.message.content,
      model: response.model,
      usage: response.usage
        ? {
            inputTokens: response.usage.prompt_tokens,
            outputTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens
          }
        : { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
      finishReason: choice.finish_reason ?? undefined
    };
  }

  private requireOpenAI(model: ModelProfile): OpenAI {
    if (!this.openaiClient) {
      throw new ProviderError('transport', model.id, 'OpenAI client not configured (OPENAI_API_KEY missing)');
    }
    return this.openaiClient;
  }
}

/**
 * JSON mode is only accepted by newer OpenAI chat models
 */
function supportsJsonMode(modelId: string): boolean {
  return modelId.includes('gpt-4o') ||
    modelId.includes('gpt-4-turbo') ||
    modelId.includes('gpt-3.5-turbo-1106') ||
    modelId.includes('gpt-3.5-turbo-0125');
}

// ============================================================================
// Error Classification
// ============================================================================

function isTimeoutReason(signal?: AbortSignal): boolean {
  return !!signal?.aborted &&
    signal.reason instanceof Error &&
    signal.reason.name === 'TimeoutError';
}

/**
 * Map any error thrown while calling a provider onto a ProviderError kind
 */
export function classifyProviderError(
  error: unknown,
  modelId: string,
  signal?: AbortSignal
): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  if (
    error instanceof OpenAI.APIConnectionTimeoutError ||
    error instanceof Anthropic.APIConnectionTimeoutError ||
    (error instanceof Error && error.name === 'TimeoutError') ||
    isTimeoutReason(signal)
  ) {
    return new ProviderError('timeout', modelId, message, { cause: error });
  }

  if (error instanceof OpenAI.RateLimitError || error instanceof Anthropic.RateLimitError) {
    return new ProviderError('rate_limit', modelId, message, { status: 429, cause: error });
  }

  if (error instanceof SyntaxError) {
    return new ProviderError('malformed_response', modelId, message, { cause: error });
  }

  const status = error instanceof OpenAI.APIError || error instanceof Anthropic.APIError
    ? error.status
    : undefined;

  if (status === 429) {
    return new ProviderError('rate_limit', modelId, message, { status, cause: error });
  }

  return new ProviderError('transport', modelId, message, { status, cause: error });
}

// ============================================================================
// Response Parsing
// ============================================================================

type ParseAttempt = { ok: true; value: unknown } | { ok: false; error: Error };

function tryParse(text: string, repair = false): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(repair ? jsonrepair(text) : text) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }
}

/**
 * Parse JSON response from LLM, handling potential formatting issues
 */
export function parseJsonResponse(text: string): unknown {
  let cleanText = text.trim();
  // Strip markdown code fences
  cleanText = cleanText.replace(/^```json\s*/i, '');
  cleanText = cleanText.replace(/^```\s*/, '');
  cleanText = cleanText.replace(/\s*```$/, '');
  cleanText = cleanText.trim();

  const direct = tryParse(cleanText);
  if (direct.ok) return direct.value;

  // Fall back to the outermost object, then to jsonrepair on it
  const firstBrace = text.indexOf('{');
  const lastBrace = text.lastIndexOf('}');
  const candidate = firstBrace !== -1 && lastBrace > firstBrace
    ? text.substring(firstBrace, lastBrace + 1)
    : cleanText;

  const extracted = tryParse(candidate);
  if (extracted.ok) return extracted.value;

  const repaired = tryParse(candidate, true);
  if (repaired.ok) return repaired.value;

  const preview = text.substring(0, 500);
  throw new Error(
    `Failed to parse LLM response as JSON: ${direct.error.message}\n\nResponse preview (first 500 chars):\n${preview}`
  );
}
