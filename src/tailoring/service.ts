/**
 * Tailoring Service
 *
 * Builds the orchestration core from configuration: model catalog, circuit
 * breakers, budget ledger, content caches, provider client and persistence,
 * all sharing one SQLite database.
 */

import Database from 'better-sqlite3';
import type { Config } from '../backend/config';
import type { GeneratedContent, GenerationRequest, GenerationResult, JobRequirements } from './types';
import type { ProviderClient } from '../shared/llm/types';
import { LLMProviderClient } from '../shared/llm/client';
import {
  EmbeddingVectorSchema,
  GeneratedContentSchema,
  JobRequirementsSchema
} from '../shared/validation/schemas';
import { openDatabase, SqliteGenerationStore } from '../shared/storage/databaseStorage';
import { ModelRegistry } from './selection/modelRegistry';
import { ModelSelector, strategyFromName } from './selection/modelSelector';
import { CircuitBreakerRegistry } from './resilience/breakerRegistry';
import type { Clock } from './resilience/circuitBreaker';
import { BudgetLedger } from './budget/budgetLedger';
import { SqliteBudgetStore } from './budget/budgetStore';
import { ContentCache } from './cache/contentCache';
import { SqliteCacheBackend } from './cache/cacheBackend';
import { Chunker } from './chunking/chunker';
import { GenerationPipeline } from './pipeline/generationPipeline';
import { loggers } from '../backend/logger';

export interface TailoringServiceOverrides {
  /** Replaces the SDK-backed client (tests, custom gateways) */
  provider?: ProviderClient;
  /** Shared connection; opened from config.database.path otherwise */
  db?: Database.Database;
  registry?: ModelRegistry;
  clock?: Clock;
}

export interface TailoringService {
  run(request: GenerationRequest): Promise<GenerationResult>;
  readonly pipeline: GenerationPipeline;
  readonly registry: ModelRegistry;
  readonly selector: ModelSelector;
  readonly breakers: CircuitBreakerRegistry;
  readonly ledger: BudgetLedger;
  readonly store: SqliteGenerationStore;
  readonly caches: {
    embeddings: ContentCache<number[]>;
    requirements: ContentCache<JobRequirements>;
    generations: ContentCache<GeneratedContent>;
  };
  close(): void;
}

export function createTailoringService(
  config: Config,
  overrides: TailoringServiceOverrides = {}
): TailoringService {
  const clock = overrides.clock ?? Date.now;
  const db = overrides.db ?? openDatabase(config.database.path);

  const registry = overrides.registry ?? ModelRegistry.fromFile(config.llm.catalogPath);
  const breakers = new CircuitBreakerRegistry(config.circuitBreaker, clock);
  const selector = new ModelSelector(registry, breakers);
  const budgetStore = new SqliteBudgetStore(db);
  const orphaned = budgetStore.releaseOrphanedReservations();
  if (orphaned > 0) {
    loggers.budget.warn({ entries: orphaned }, 'Released budget reservations left by a previous process');
  }
  const ledger = new BudgetLedger(budgetStore, config.budget.dailyLimits, { clock });
  const store = new SqliteGenerationStore(db);

  const cacheBackend = new SqliteCacheBackend(db);
  const cacheOptions = { nearDuplicate: config.cache.nearDuplicate, clock };
  const caches = {
    embeddings: new ContentCache<number[]>(cacheBackend, { ...cacheOptions, schema: EmbeddingVectorSchema }),
    requirements: new ContentCache<JobRequirements>(cacheBackend, { ...cacheOptions, schema: JobRequirementsSchema }),
    generations: new ContentCache<GeneratedContent>(cacheBackend, { ...cacheOptions, schema: GeneratedContentSchema })
  };

  const provider = overrides.provider ?? new LLMProviderClient({
    anthropicApiKey: config.llm.anthropicApiKey || undefined,
    openaiApiKey: config.llm.openaiApiKey || undefined,
    timeoutMs: config.llm.timeoutMs
  });

  const pipeline = new GenerationPipeline(
    {
      registry,
      selector,
      breakers,
      ledger,
      provider,
      store,
      embeddingCache: caches.embeddings,
      requirementsCache: caches.requirements,
      generationCache: caches.generations,
      chunker: new Chunker({
        chunkSize: config.chunking.chunkSize,
        overlap: config.chunking.overlap,
        maxChunks: config.chunking.maxChunksPerDocument
      })
    },
    {
      strategy: strategyFromName(config.selection.strategy, config.selection.balancedWeights),
      balancedWeights: config.selection.balancedWeights,
      topArtifacts: config.pipeline.topArtifacts,
      timeoutMs: config.llm.timeoutMs,
      clock
    }
  );

  loggers.pipeline.info(
    {
      models: registry.all().length,
      strategy: config.selection.strategy,
      database: config.database.path,
      nearDuplicateCache: config.cache.nearDuplicate.enabled
    },
    'Tailoring service ready'
  );

  return {
    run: request => pipeline.run(request),
    pipeline,
    registry,
    selector,
    breakers,
    ledger,
    store,
    caches,
    close: () => {
      if (!overrides.db) {
        db.close();
      }
    }
  };
}
