/**
 * Generation Pipeline
 *
 * Orchestrates one "tailor my CV to this posting" request:
 *
 *   validate -> embed job + artifacts -> rank artifacts -> parse requirements
 *            -> generate document -> skill gap analysis -> persist
 *
 * Every provider call goes through the same guard rails: a model picked by
 * the selector, a budget reservation admitted before dispatch and settled
 * after, a circuit breaker outcome, a timeout, and the caller's AbortSignal.
 * Provider output is cached by input fingerprint so identical work is never
 * paid for twice.
 *
 * A step may try one alternate model after a failed call. Retrying a failed
 * request as a whole is left to whoever submitted it.
 */

import type { Logger } from 'pino';
import type { z } from 'zod';
import type {
  Artifact,
  BalancedWeights,
  GeneratedContent,
  GenerationRequest,
  GenerationResult,
  JobRequirements,
  SelectionStrategy,
  TaskType
} from '../types';
import type { ProviderClient } from '../../shared/llm/types';
import { DEFAULT_GENERATION_OPTIONS } from '../../shared/llm/types';
import { ProviderError } from '../../shared/llm/errors';
import { classifyProviderError } from '../../shared/llm/client';
import { estimateTokens } from '../../shared/llm/cost';
import {
  GENERATION_SYSTEM_PROMPT,
  JOB_PARSING_SYSTEM_PROMPT,
  buildGenerationPrompt,
  buildJobParsingPrompt
} from '../../shared/llm/prompts';
import {
  GeneratedContentSchema,
  JobRequirementsSchema
} from '../../shared/validation/schemas';
import { formatValidationErrors, zodErrorToValidationResult } from '../../shared/validation/validator';
import type { GenerationStore } from '../../shared/storage/interface';
import { ErrorHandler } from '../../shared/errors/handler';
import {
  TailoringError,
  TailoringErrorFactory,
  TailoringErrorKind,
  isTailoringError
} from '../errors/types';
import { normalizeContent } from '../hashing/contentHasher';
import { Chunker } from '../chunking/chunker';
import type { Clock } from '../resilience/circuitBreaker';
import { CircuitBreakerRegistry } from '../resilience/breakerRegistry';
import { BudgetKey, BudgetLedger, Reservation } from '../budget/budgetLedger';
import { CacheOutcome, ContentCache, outcomePayload } from '../cache/contentCache';
import { ModelRegistry } from '../selection/modelRegistry';
import { ModelSelector, SelectionFailure, strategyFromName } from '../selection/modelSelector';
import { SkillMatcher } from '../matching/skillMatcher';
import { meanPool, rankBySimilarity } from '../matching/similarity';
import { ModelLease } from './modelLease';
import { completeResult, failResult, isTerminal, newResult, transition } from './resultState';
import { createRequestLogger } from '../../backend/logger';

/** Namespace for parsed postings; shared across users */
export const PARSED_JOB_NAMESPACE = 'parsed-job';

/** Generated documents are derived from one user's evidence */
export function generationNamespace(userId: string): string {
  return `generation:${userId}`;
}

const JOB_PARSING_MAX_TOKENS = 1000;

const NO_CONTENT = 'No content available';

// ============================================================================
// Types
// ============================================================================

export interface GenerationPipelineDeps {
  registry: ModelRegistry;
  selector: ModelSelector;
  breakers: CircuitBreakerRegistry;
  ledger: BudgetLedger;
  provider: ProviderClient;
  store: GenerationStore;
  embeddingCache: ContentCache<number[]>;
  requirementsCache: ContentCache<JobRequirements>;
  generationCache: ContentCache<GeneratedContent>;
  chunker: Chunker;
  matcher?: SkillMatcher;
}

export interface GenerationPipelineOptions {
  /** Used when a request names no strategy */
  strategy: SelectionStrategy;
  balancedWeights: BalancedWeights;
  /** Artifacts handed to generation, best first */
  topArtifacts: number;
  /** Upper bound on a single provider call */
  timeoutMs: number;
  clock?: Clock;
  logger?: Logger;
}

interface RunContext {
  request: GenerationRequest;
  key: BudgetKey;
  strategy: SelectionStrategy;
  signal?: AbortSignal;
  modelsUsed: Set<string>;
  costUsd: number;
  log: Logger;
}

interface TokenEstimate {
  inputTokens: number;
  outputTokens: number;
}

/**
 * Money spent inside one reservation so far
 */
interface SpendTracker {
  dispatched: boolean;
  spentUsd: number;
}

interface Metered<T> {
  payload: T;
  costUsd: number;
  reservation: Reservation;
}

/**
 * Ledger refused a reservation for this model; selection moves on
 */
class BudgetDenial extends Error {
  constructor(readonly modelId: string, readonly estimatedCostUsd: number) {
    super(`Budget admission denied for ${modelId}`);
    this.name = 'BudgetDenial';
  }
}

interface RankedArtifact {
  id: string;
  artifact: Artifact;
  vector: number[];
}

// ============================================================================
// Pipeline
// ============================================================================

export class GenerationPipeline {
  private readonly running = new Map<string, Promise<GenerationResult>>();
  private readonly matcher: SkillMatcher;
  private readonly clock: Clock;

  constructor(
    private readonly deps: GenerationPipelineDeps,
    private readonly options: GenerationPipelineOptions
  ) {
    this.matcher = deps.matcher ?? new SkillMatcher();
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Run a request to a terminal result. Safe to call again with the same
   * request id: a finished result is returned from the store, and a run
   * still in progress is joined rather than repeated.
   */
  run(request: GenerationRequest): Promise<GenerationResult> {
    const existing = this.running.get(request.requestId);
    if (existing) {
      return existing;
    }
    const execution = this.execute(request).finally(() => {
      this.running.delete(request.requestId);
    });
    this.running.set(request.requestId, execution);
    return execution;
  }

  private async execute(request: GenerationRequest): Promise<GenerationResult> {
    const log = this.options.logger
      ? this.options.logger.child({ requestId: request.requestId, userId: request.userId })
      : createRequestLogger(request.requestId, request.userId);

    const processing = transition(
      newResult(request.requestId, request.userId, request.documentType ?? 'cv', this.now()),
      'processing'
    );
    const ctx: RunContext = {
      request,
      key: { principalId: request.userId, tier: request.tier },
      strategy: request.strategy
        ? strategyFromName(request.strategy, this.options.balancedWeights)
        : this.options.strategy,
      signal: request.signal,
      modelsUsed: new Set(),
      costUsd: 0,
      log
    };

    let result: GenerationResult;
    try {
      const stored = await this.deps.store.loadResult(request.requestId);
      if (stored && isTerminal(stored.status)) {
        log.info({ status: stored.status }, 'Returning stored result');
        return stored;
      }
      await this.deps.store.saveResult(request.requestId, processing);

      log.info({ tier: request.tier, strategy: ctx.strategy.kind }, 'Generation started');
      const output = await this.produce(ctx);
      result = completeResult(processing, {
        ...output,
        modelsUsed: [...ctx.modelsUsed],
        costUsd: ctx.costUsd
      }, this.now());
      log.info(
        { costUsd: ctx.costUsd, modelsUsed: result.modelsUsed, skillMatchScore: result.skillMatchScore },
        'Generation completed'
      );
    } catch (error) {
      result = this.failed(ctx, processing, error);
    }

    try {
      await this.deps.store.saveResult(request.requestId, result);
    } catch (error) {
      // A result the store cannot keep is reported as failed; the paid-for
      // outputs stay in the content cache for a retry.
      result = this.failed(ctx, processing, error);
    }
    return result;
  }

  private failed(ctx: RunContext, processing: GenerationResult, error: unknown): GenerationResult {
    const failure = toTailoringError(error);
    ErrorHandler.logError(failure);
    ctx.log.warn({ errorKind: failure.kind, costUsd: ctx.costUsd }, 'Generation failed');
    return failResult(processing, failure, { modelsUsed: [...ctx.modelsUsed], costUsd: ctx.costUsd }, this.now());
  }

  private async produce(ctx: RunContext): Promise<Pick<
    GenerationResult,
    'content' | 'requirements' | 'skillMatchScore' | 'missingSkills' | 'artifactsUsed'
  >> {
    const { request } = ctx;

    // 1. Validate
    if (normalizeContent(request.jobDescription).length === 0) {
      throw TailoringErrorFactory.invalidInput('jobDescription', NO_CONTENT);
    }
    const artifacts = (request.artifacts ?? await this.deps.store.loadArtifactSet(request.userId))
      .filter(a => normalizeContent(a.content).length > 0);
    if (artifacts.length === 0) {
      throw TailoringErrorFactory.invalidInput('artifacts', NO_CONTENT);
    }

    // 2. Embed
    this.throwIfCancelled(ctx, 'embedding');
    const [jobVector, ...artifactVectors] = await this.embedTexts(ctx, [
      request.jobDescription,
      ...artifacts.map(artifactText)
    ]);

    // 3. Rank
    const ranked = rankBySimilarity<RankedArtifact>(
      jobVector,
      artifacts.map((artifact, i) => ({ id: artifact.id, artifact, vector: artifactVectors[i] })),
      item => item.vector
    );
    const chosen = ranked.slice(0, this.options.topArtifacts).map(r => r.item.artifact);
    ctx.log.debug({ chosen: chosen.map(a => a.id), candidates: artifacts.length }, 'Artifacts ranked');

    // 4. Requirements
    this.throwIfCancelled(ctx, 'job parsing');
    const requirements = await this.resolveRequirements(ctx);

    // 5. Generate
    this.throwIfCancelled(ctx, 'generation');
    const content = await this.generateContent(ctx, requirements, chosen);

    // 6. Skill gap
    const candidateSkills = chosen.flatMap(a => a.skills);
    const required = [...requirements.mustHaveSkills, ...requirements.niceToHaveSkills];

    return {
      content,
      requirements,
      skillMatchScore: this.matcher.score(candidateSkills, required),
      missingSkills: this.matcher.missing(candidateSkills, requirements.mustHaveSkills),
      artifactsUsed: chosen.map(a => a.id)
    };
  }

  // ==========================================================================
  // Steps
  // ==========================================================================

  /**
   * Embed every text with one model so the vectors are comparable
   */
  private async embedTexts(ctx: RunContext, texts: string[]): Promise<number[][]> {
    const largest = Math.max(...texts.map(text => this.chunkedTokens(text)));

    return this.withModel(ctx, 'embedding', { inputTokens: largest, outputTokens: 0 }, async lease => {
      const vectors: number[][] = [];
      for (const text of texts) {
        const estimateUsd = this.deps.registry.estimateCost(lease.model, this.chunkedTokens(text));
        const outcome = await this.deps.embeddingCache.getOrCompute(
          text,
          lease.model.id,
          () => this.metered(ctx, lease, estimateUsd, 'embedding', async tracker => {
            const chunkVectors: number[][] = [];
            for (const chunk of this.deps.chunker.split(text)) {
              const embedded = await this.dispatch(ctx, lease, 'embedding', tracker, signal =>
                this.deps.provider.embed(chunk.text, lease.model, { signal })
              );
              tracker.spentUsd += embedded.costUsd;
              chunkVectors.push(embedded.vector);
            }
            return { payload: meanPool(chunkVectors), costUsd: tracker.spentUsd };
          }),
          { ownerId: ctx.request.userId }
        );
        await this.settle(ctx, outcome);
        vectors.push(outcomePayload(outcome));
      }
      return vectors;
    });
  }

  private async resolveRequirements(ctx: RunContext): Promise<JobRequirements> {
    const { request } = ctx;
    if (request.requirements) {
      const supplied = JobRequirementsSchema.safeParse(request.requirements);
      if (!supplied.success) {
        throw TailoringErrorFactory.invalidInput(
          'requirements',
          `Invalid requirements: ${formatValidationErrors(zodErrorToValidationResult(supplied.error))}`
        );
      }
      return supplied.data;
    }

    const prompt = buildJobParsingPrompt({
      jobDescription: request.jobDescription,
      companyName: request.companyName,
      roleTitle: request.roleTitle
    });
    const estimate = {
      inputTokens: estimateTokens(JOB_PARSING_SYSTEM_PROMPT + prompt),
      outputTokens: JOB_PARSING_MAX_TOKENS
    };

    return this.withModel(ctx, 'job_parsing', estimate, async lease => {
      const outcome = await this.deps.requirementsCache.getOrCompute(
        prompt,
        PARSED_JOB_NAMESPACE,
        () => this.generateStructured(ctx, lease, 'job parsing', estimate, {
          prompt,
          systemPrompt: JOB_PARSING_SYSTEM_PROMPT,
          maxTokens: JOB_PARSING_MAX_TOKENS,
          schema: JobRequirementsSchema
        }),
        { ownerId: ctx.request.userId }
      );
      await this.settle(ctx, outcome);
      return outcomePayload(outcome);
    });
  }

  private async generateContent(
    ctx: RunContext,
    requirements: JobRequirements,
    chosen: Artifact[]
  ): Promise<GeneratedContent> {
    const { request } = ctx;
    const prompt = buildGenerationPrompt({
      documentType: request.documentType ?? 'cv',
      roleTitle: request.roleTitle ?? requirements.roleTitle,
      companyName: request.companyName,
      mustHaveSkills: requirements.mustHaveSkills,
      niceToHaveSkills: requirements.niceToHaveSkills,
      keyResponsibilities: requirements.keyResponsibilities,
      artifacts: chosen,
      preferences: request.preferences ?? {}
    });
    const estimate = {
      inputTokens: estimateTokens(GENERATION_SYSTEM_PROMPT + prompt),
      outputTokens: DEFAULT_GENERATION_OPTIONS.maxTokens
    };

    return this.withModel(ctx, 'cv_generation', estimate, async lease => {
      const maxTokens = Math.min(
        DEFAULT_GENERATION_OPTIONS.maxTokens,
        lease.model.maxOutputTokens ?? DEFAULT_GENERATION_OPTIONS.maxTokens
      );
      const outcome = await this.deps.generationCache.getOrCompute(
        prompt,
        generationNamespace(request.userId),
        () => this.generateStructured(ctx, lease, 'generation', { ...estimate, outputTokens: maxTokens }, {
          prompt,
          systemPrompt: GENERATION_SYSTEM_PROMPT,
          maxTokens,
          schema: GeneratedContentSchema
        }),
        { ownerId: request.userId }
      );
      await this.settle(ctx, outcome);
      return outcomePayload(outcome);
    });
  }

  /**
   * One JSON completion validated against a schema. Output that fails the
   * schema counts as a malformed response from the model.
   */
  private generateStructured<T>(
    ctx: RunContext,
    lease: ModelLease,
    stage: string,
    estimate: TokenEstimate,
    call: { prompt: string; systemPrompt: string; maxTokens: number; schema: z.ZodType<T, z.ZodTypeDef, unknown> }
  ): Promise<Metered<T>> {
    const estimateUsd = this.deps.registry.estimateCost(lease.model, estimate.inputTokens, estimate.outputTokens);

    return this.metered(ctx, lease, estimateUsd, stage, async tracker => {
      const generated = await this.dispatch(ctx, lease, stage, tracker, async signal => {
        const response = await this.deps.provider.generate(call.prompt, lease.model, {
          signal,
          systemPrompt: call.systemPrompt,
          temperature: DEFAULT_GENERATION_OPTIONS.temperature,
          maxTokens: call.maxTokens
        });
        const parsed = call.schema.safeParse(response.content);
        if (!parsed.success) {
          throw new ProviderError(
            'malformed_response',
            lease.model.id,
            `Output failed validation: ${formatValidationErrors(zodErrorToValidationResult(parsed.error))}`
          );
        }
        return { payload: parsed.data, costUsd: response.costUsd };
      });
      tracker.spentUsd += generated.costUsd;
      return generated;
    });
  }

  // ==========================================================================
  // Guard Rails
  // ==========================================================================

  /**
   * Run a step on the best available model. Budget denials and circuits
   * that opened mid-step move on to the next candidate; a failed call gets
   * one alternate model.
   */
  private async withModel<T>(
    ctx: RunContext,
    taskType: TaskType,
    estimate: TokenEstimate,
    step: (lease: ModelLease) => Promise<T>
  ): Promise<T> {
    const exclude = new Set<string>();
    let budgetDenied = false;
    let lastFailure: TailoringError | null = null;

    for (;;) {
      this.throwIfCancelled(ctx, taskType);
      const remainingUsd = await this.deps.ledger.remaining(ctx.key);
      const selection = this.deps.selector.selectWithReason(
        taskType,
        ctx.strategy,
        { remainingUsd, ...estimate },
        { exclude }
      );
      if (!selection.model) {
        throw lastFailure ?? this.selectionFailure(ctx, taskType, estimate, selection.reason, budgetDenied, remainingUsd);
      }

      const lease = new ModelLease(selection.model, taskType, this.deps.breakers.get(selection.model.id));
      try {
        return await step(lease);
      } catch (error) {
        if (error instanceof BudgetDenial) {
          budgetDenied = true;
          exclude.add(error.modelId);
          continue;
        }
        if (isTailoringError(error, TailoringErrorKind.PROVIDER_UNAVAILABLE)) {
          exclude.add(lease.model.id);
          continue;
        }
        if (isTailoringError(error, TailoringErrorKind.PROVIDER_CALL_FAILED) && lastFailure === null) {
          lastFailure = error;
          exclude.add(lease.model.id);
          ctx.log.warn({ taskType, modelId: lease.model.id }, 'Provider call failed, trying an alternate model');
          continue;
        }
        throw error;
      } finally {
        lease.release();
      }
    }
  }

  private selectionFailure(
    ctx: RunContext,
    taskType: TaskType,
    estimate: TokenEstimate,
    reason: SelectionFailure,
    budgetDenied: boolean,
    remainingUsd: number
  ): TailoringError {
    if (reason === 'over_budget' || (reason === 'no_candidates' && budgetDenied)) {
      const costs = this.deps.registry
        .forTask(taskType)
        .map(p => this.deps.registry.estimateCost(p, estimate.inputTokens, estimate.outputTokens));
      return TailoringErrorFactory.budgetExceeded(
        ctx.key.principalId,
        ctx.key.tier,
        costs.length > 0 ? Math.min(...costs) : 0,
        remainingUsd
      );
    }
    return TailoringErrorFactory.providerUnavailable(
      taskType,
      reason === 'circuit_open'
        ? 'Every candidate model has an open circuit'
        : 'No model in the catalog supports this task'
    );
  }

  /**
   * Reserve budget around work that may make several provider calls.
   * Failures settle the reservation here; success hands it to settle()
   * once the cache has decided whether this result is kept.
   */
  private async metered<T>(
    ctx: RunContext,
    lease: ModelLease,
    estimateUsd: number,
    stage: string,
    work: (tracker: SpendTracker) => Promise<{ payload: T; costUsd: number }>
  ): Promise<Metered<T>> {
    const reservation = await this.deps.ledger.admit(ctx.key, estimateUsd);
    if (!reservation) {
      throw new BudgetDenial(lease.model.id, estimateUsd);
    }

    const tracker: SpendTracker = { dispatched: false, spentUsd: 0 };
    try {
      const done = await work(tracker);
      return { ...done, reservation };
    } catch (error) {
      // A call cut off by cancellation may still be billed
      const charged = isTailoringError(error, TailoringErrorKind.CANCELLED) && tracker.dispatched
        ? Math.max(estimateUsd, tracker.spentUsd)
        : tracker.spentUsd;
      await this.deps.ledger.reconcile(reservation, charged);
      ctx.costUsd += charged;
      ctx.log.debug({ stage, charged }, 'Reservation settled after failure');
      throw error;
    }
  }

  /**
   * Commit the cost of a computed value, stored or not. A computation that
   * lost the race to store its result is not charged.
   */
  private async settle<T>(ctx: RunContext, outcome: CacheOutcome<T, Metered<T>>): Promise<void> {
    if (outcome.source === 'computed' || outcome.source === 'uncached') {
      await this.deps.ledger.reconcile(outcome.computed.reservation, outcome.computed.costUsd);
      ctx.costUsd += outcome.computed.costUsd;
    } else if (outcome.source === 'raced') {
      await this.deps.ledger.reconcile(outcome.computed.reservation, 0);
    }
  }

  /**
   * One breaker-guarded provider call with timeout and cancellation
   */
  private async dispatch<R>(
    ctx: RunContext,
    lease: ModelLease,
    stage: string,
    tracker: SpendTracker,
    call: (signal: AbortSignal) => Promise<R>
  ): Promise<R> {
    this.throwIfCancelled(ctx, stage);
    if (!lease.acquire()) {
      throw TailoringErrorFactory.providerUnavailable(
        lease.taskType,
        `Circuit for ${lease.model.id} opened during ${stage}`
      );
    }

    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    const signal = ctx.signal ? AbortSignal.any([ctx.signal, timeout]) : timeout;

    tracker.dispatched = true;
    try {
      const response = await raceAbort(call(signal), signal);
      lease.succeeded();
      ctx.modelsUsed.add(lease.model.id);
      return response;
    } catch (error) {
      if (ctx.signal?.aborted) {
        lease.abandon();
        throw TailoringErrorFactory.cancelled(stage);
      }
      const providerError = classifyProviderError(error, lease.model.id, signal);
      lease.failed();
      ctx.modelsUsed.add(lease.model.id);
      ctx.log.warn(
        { stage, modelId: lease.model.id, providerErrorKind: providerError.kind, details: providerError.technicalDetails },
        'Provider call failed'
      );
      throw TailoringErrorFactory.providerCallFailed(providerError);
    }
  }

  private throwIfCancelled(ctx: RunContext, stage: string): void {
    if (ctx.signal?.aborted) {
      throw TailoringErrorFactory.cancelled(stage);
    }
  }

  private chunkedTokens(text: string): number {
    return this.deps.chunker.split(text).reduce((sum, chunk) => sum + estimateTokens(chunk.text), 0);
  }

  private now(): Date {
    return new Date(this.clock());
  }
}

// ============================================================================
// Helpers
// ============================================================================

function artifactText(artifact: Artifact): string {
  return artifact.title ? `${artifact.title}\n${artifact.content}` : artifact.content;
}

/**
 * Settle with the signal's reason if it aborts first; providers that ignore
 * the signal still cannot hold a step past its timeout
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

function toTailoringError(error: unknown): TailoringError {
  if (error instanceof TailoringError) {
    return error;
  }
  if (error instanceof ProviderError) {
    return TailoringErrorFactory.providerCallFailed(error);
  }
  return TailoringErrorFactory.internal(error);
}
