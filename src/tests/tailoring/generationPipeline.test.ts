/**
 * End-to-end tests for the generation pipeline
 *
 * Runs the real selector, breakers, ledger, caches and chunker against the
 * in-process FakeProvider.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Artifact, GenerationRequest } from '../../tailoring/types';
import { ModelRegistry } from '../../tailoring/selection/modelRegistry';
import { ModelSelector } from '../../tailoring/selection/modelSelector';
import { CircuitBreakerRegistry } from '../../tailoring/resilience/breakerRegistry';
import { BudgetLedger } from '../../tailoring/budget/budgetLedger';
import { MemoryBudgetStore } from '../../tailoring/budget/budgetStore';
import { ContentCache } from '../../tailoring/cache/contentCache';
import { MemoryCacheBackend } from '../../tailoring/cache/cacheBackend';
import { Chunker } from '../../tailoring/chunking/chunker';
import { GenerationPipeline, PARSED_JOB_NAMESPACE } from '../../tailoring/pipeline/generationPipeline';
import { MemoryGenerationStore } from '../../shared/storage/memoryStorage';
import {
  EmbeddingVectorSchema,
  GeneratedContentSchema,
  JobRequirementsSchema
} from '../../shared/validation/schemas';
import { FakeProvider } from '../fixtures/fakeProvider';
import { FailingWriteBackend } from '../fixtures/failingWriteBackend';
import { FailingGenerationStore } from '../fixtures/failingStore';
import { TEST_MODELS } from '../fixtures/models';

const NOW = Date.UTC(2025, 2, 14, 12, 0, 0);

const ARTIFACTS: Artifact[] = [
  { id: 'a3', title: 'Office party', content: 'Organised the office party', skills: ['Event planning'] },
  { id: 'a1', title: 'Payments API', content: 'Built Django REST APIs in Python', skills: ['Python', 'Django'] },
  { id: 'a2', title: 'Analytics dashboard', content: 'Designed React dashboards in TypeScript', skills: ['React', 'TypeScript'] }
];

const JOB_DESCRIPTION = 'Senior Python engineer with Django and React experience';

interface HarnessParts {
  backend?: MemoryCacheBackend;
  store?: MemoryGenerationStore;
}

function createHarness(dailyLimits: Record<string, number> = { free: 5, pro: 0.01 }, parts: HarnessParts = {}) {
  const provider = new FakeProvider();
  const registry = new ModelRegistry(TEST_MODELS);
  const clock = () => NOW;
  const breakers = new CircuitBreakerRegistry({ failureThreshold: 2, cooldownMs: 60_000, windowMs: 60_000 }, clock);
  const ledger = new BudgetLedger(new MemoryBudgetStore(), dailyLimits, { clock });
  const store = parts.store ?? new MemoryGenerationStore();
  const backend = parts.backend ?? new MemoryCacheBackend();

  const pipeline = new GenerationPipeline(
    {
      registry,
      selector: new ModelSelector(registry, breakers),
      breakers,
      ledger,
      provider,
      store,
      embeddingCache: new ContentCache<number[]>(backend, { schema: EmbeddingVectorSchema, clock }),
      requirementsCache: new ContentCache(backend, { schema: JobRequirementsSchema, clock }),
      generationCache: new ContentCache(backend, { schema: GeneratedContentSchema, clock }),
      chunker: new Chunker({ chunkSize: 1000, overlap: 200 })
    },
    {
      strategy: { kind: 'cost_optimized' },
      balancedWeights: { cost: 0.5, quality: 0.5 },
      topArtifacts: 2,
      timeoutMs: 5_000,
      clock
    }
  );

  return { provider, registry, breakers, ledger, store, backend, pipeline };
}

function request(overrides: Partial<GenerationRequest> = {}): GenerationRequest {
  return {
    requestId: 'req-1',
    userId: 'user-1',
    tier: 'free',
    jobDescription: JOB_DESCRIPTION,
    artifacts: ARTIFACTS,
    ...overrides
  };
}

describe('GenerationPipeline', () => {
  let harness: ReturnType<typeof createHarness>;

  beforeEach(() => {
    harness = createHarness();
  });

  describe('successful generation', () => {
    it('should produce a completed result', async () => {
      const result = await harness.pipeline.run(request());

      expect(result.status).toBe('completed');
      expect(result.documentType).toBe('cv');
      expect(result.content?.professionalSummary).toBe('Backend engineer focused on Python services.');
      expect(result.requirements?.mustHaveSkills).toEqual(['Python', 'Django', 'Kubernetes']);
      expect(result.errorKind).toBeNull();
      expect(result.errorMessage).toBeNull();
      expect(result.createdAt.getTime()).toBe(NOW);
      expect(result.completedAt?.getTime()).toBe(NOW);
    });

    it('should use the artifacts most similar to the posting', async () => {
      const result = await harness.pipeline.run(request());

      expect(result.artifactsUsed).toEqual(['a1', 'a2']);
    });

    it('should score skills against all requirements and report missing must-haves', async () => {
      const result = await harness.pipeline.run(request());

      // Python, Django and React of Python, Django, Kubernetes, React
      expect(result.skillMatchScore).toBe(8);
      expect(result.missingSkills).toEqual(['Kubernetes']);
    });

    it('should make one call per input and record the models used', async () => {
      const result = await harness.pipeline.run(request());

      expect(harness.provider.callsOf('embed')).toHaveLength(4);
      expect(harness.provider.callsOf('generate')).toHaveLength(2);
      expect(new Set(harness.provider.callsOf('embed').map(c => c.modelId))).toEqual(new Set(['embed-small']));
      expect(result.modelsUsed).toEqual(['embed-small', 'chat-cheap']);
    });

    it('should commit exactly the reported cost to the ledger', async () => {
      const result = await harness.pipeline.run(request());
      const usage = await harness.ledger.usage({ principalId: 'user-1', tier: 'free' });

      expect(result.costUsd).toBeGreaterThan(0);
      expect(usage.committedCostUsd).toBeCloseTo(result.costUsd, 12);
      expect(usage.reservedCostUsd).toBeCloseTo(0, 12);
    });

    it('should persist the terminal result', async () => {
      const result = await harness.pipeline.run(request());

      expect(await harness.store.loadResult('req-1')).toEqual(result);
    });

    it('should load artifacts from the store when the request has none', async () => {
      harness.store.setArtifacts('user-1', ARTIFACTS);

      const result = await harness.pipeline.run(request({ artifacts: undefined }));

      expect(result.status).toBe('completed');
      expect(result.artifactsUsed).toEqual(['a1', 'a2']);
    });

    it('should skip job parsing when requirements are supplied', async () => {
      const result = await harness.pipeline.run(request({ requirements: { mustHaveSkills: ['Python'] } }));

      expect(harness.provider.callsOf('generate')).toHaveLength(1);
      expect(result.skillMatchScore).toBe(10);
      expect(result.missingSkills).toEqual([]);
    });

    it('should honour a per-request strategy', async () => {
      const result = await harness.pipeline.run(request({ strategy: 'quality_first' }));

      expect(result.modelsUsed).toEqual(['embed-small', 'chat-best']);
    });
  });

  describe('idempotence and caching', () => {
    it('should return the stored result for a repeated request id', async () => {
      const first = await harness.pipeline.run(request());
      const callCount = harness.provider.calls.length;

      const second = await harness.pipeline.run(request());

      expect(second).toEqual(first);
      expect(harness.provider.calls).toHaveLength(callCount);
    });

    it('should join a run that is still in progress', () => {
      const first = harness.pipeline.run(request());
      const second = harness.pipeline.run(request());

      expect(second).toBe(first);
      return first;
    });

    it('should serve identical work from the cache at no cost', async () => {
      await harness.pipeline.run(request());
      const callCount = harness.provider.calls.length;

      const repeat = await harness.pipeline.run(request({ requestId: 'req-2' }));

      expect(repeat.status).toBe('completed');
      expect(harness.provider.calls).toHaveLength(callCount);
      expect(repeat.costUsd).toBe(0);
      expect(repeat.content?.professionalSummary).toBe('Backend engineer focused on Python services.');
    });

    it('should share parsed postings but not generated documents across users', async () => {
      await harness.pipeline.run(request());
      const embedCalls = harness.provider.callsOf('embed').length;
      const generateCalls = harness.provider.callsOf('generate').length;

      await harness.pipeline.run(request({ requestId: 'req-2', userId: 'user-2' }));

      expect(harness.provider.callsOf('embed')).toHaveLength(embedCalls);
      expect(harness.provider.callsOf('generate')).toHaveLength(generateCalls + 1);
      expect(harness.backend.stats().namespaces[PARSED_JOB_NAMESPACE]).toBe(1);
      expect(harness.backend.stats().namespaces['generation:user-2']).toBe(1);
    });
  });

  describe('invalid input', () => {
    it('should reject an empty job description', async () => {
      const result = await harness.pipeline.run(request({ jobDescription: ' \n\t ' }));

      expect(result.status).toBe('failed');
      expect(result.errorKind).toBe('InvalidInput');
      expect(result.errorMessage).toBe('No content available');
      expect(harness.provider.calls).toHaveLength(0);
    });

    it('should reject a request without usable artifacts', async () => {
      const result = await harness.pipeline.run(request({
        artifacts: [{ id: 'blank', title: 'Empty', content: '   ', skills: [] }]
      }));

      expect(result.errorKind).toBe('InvalidInput');
      expect(result.errorMessage).toBe('No content available');
    });
  });

  describe('budget', () => {
    it('should pick a cheaper model that fits the remaining budget', async () => {
      const result = await harness.pipeline.run(request({ tier: 'pro', strategy: 'quality_first' }));

      expect(result.status).toBe('completed');
      expect(result.modelsUsed).toEqual(['embed-small', 'chat-cheap']);
    });

    it('should fail with BudgetExceeded when nothing fits', async () => {
      harness = createHarness({ free: 0 });

      const result = await harness.pipeline.run(request());

      expect(result.status).toBe('failed');
      expect(result.errorKind).toBe('BudgetExceeded');
      expect(result.costUsd).toBe(0);
      expect(harness.provider.calls).toHaveLength(0);
    });
  });

  describe('provider failures', () => {
    it('should fail with ProviderUnavailable when every circuit is open', async () => {
      for (const model of TEST_MODELS) {
        harness.breakers.get(model.id).recordFailure();
        harness.breakers.get(model.id).recordFailure();
      }

      const result = await harness.pipeline.run(request());

      expect(result.status).toBe('failed');
      expect(result.errorKind).toBe('ProviderUnavailable');
      expect(harness.provider.calls).toHaveLength(0);
    });

    it('should try an alternate model after a failed call', async () => {
      harness.provider.failing.add('chat-cheap');

      const result = await harness.pipeline.run(request());

      expect(result.status).toBe('completed');
      expect(result.modelsUsed).toEqual(['embed-small', 'chat-cheap', 'chat-best']);
      expect(harness.provider.callsOf('generate').map(c => c.modelId))
        .toEqual(['chat-cheap', 'chat-best', 'chat-cheap', 'chat-best']);
      expect(harness.breakers.get('chat-cheap').currentState).toBe('open');
    });

    it('should fail with ProviderCallFailed when the alternate fails too', async () => {
      harness.provider.failing.add('chat-cheap');
      harness.provider.failing.add('chat-best');

      const result = await harness.pipeline.run(request());

      expect(result.status).toBe('failed');
      expect(result.errorKind).toBe('ProviderCallFailed');
      expect(result.modelsUsed).toEqual(['embed-small', 'chat-cheap', 'chat-best']);
      expect(harness.provider.callsOf('generate')).toHaveLength(2);
    });

    it('should treat output that fails validation as a failed call', async () => {
      harness.provider.content = { keySkills: ['Python'] };

      const result = await harness.pipeline.run(request());

      expect(result.errorKind).toBe('ProviderCallFailed');
      expect(result.content).toBeNull();
    });

    it('should not charge for failed calls', async () => {
      harness.provider.failing.add('chat-cheap');
      harness.provider.failing.add('chat-best');

      const result = await harness.pipeline.run(request());
      const usage = await harness.ledger.usage({ principalId: 'user-1', tier: 'free' });

      expect(usage.committedCostUsd).toBeCloseTo(result.costUsd, 12);
      expect(usage.reservedCostUsd).toBeCloseTo(0, 12);
    });
  });

  describe('storage failures', () => {
    it('should keep and charge a generation whose cache write fails', async () => {
      const baseline = await harness.pipeline.run(request());
      const backend = new FailingWriteBackend(namespace => namespace.startsWith('generation:'));
      harness = createHarness(undefined, { backend });

      const result = await harness.pipeline.run(request());
      const usage = await harness.ledger.usage({ principalId: 'user-1', tier: 'free' });

      expect(result.status).toBe('completed');
      expect(result.content?.professionalSummary).toBe('Backend engineer focused on Python services.');
      expect(result.costUsd).toBeCloseTo(baseline.costUsd, 12);
      expect(usage.reservedCostUsd).toBeCloseTo(0, 12);
      expect(usage.committedCostUsd).toBeCloseTo(result.costUsd, 12);
      expect(backend.attempts).toBe(1);
      expect(backend.stats().namespaces['generation:user-1']).toBeUndefined();
    });

    it('should fail without provider calls when the stored result cannot be read', async () => {
      const store = new FailingGenerationStore();
      store.failLoads = true;
      harness = createHarness(undefined, { store });

      const result = await harness.pipeline.run(request());

      expect(result.status).toBe('failed');
      expect(result.errorKind).toBe('InternalError');
      expect(result.errorMessage).toBe('An internal error occurred');
      expect(harness.provider.calls).toHaveLength(0);
    });

    it('should report a completed run the store cannot keep as failed', async () => {
      const store = new FailingGenerationStore();
      store.failSavesOf.add('completed');
      harness = createHarness(undefined, { store });

      const result = await harness.pipeline.run(request());
      const usage = await harness.ledger.usage({ principalId: 'user-1', tier: 'free' });

      expect(result.status).toBe('failed');
      expect(result.errorKind).toBe('InternalError');
      expect(result.content).toBeNull();
      expect(result.costUsd).toBeGreaterThan(0);
      expect(result.modelsUsed).toEqual(['embed-small', 'chat-cheap']);
      expect(usage.committedCostUsd).toBeCloseTo(result.costUsd, 12);
      expect((await store.loadResult('req-1'))?.status).toBe('processing');
    });
  });

  describe('cancellation', () => {
    it('should fail with Cancelled when aborted before starting', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await harness.pipeline.run(request({ signal: controller.signal }));

      expect(result.errorKind).toBe('Cancelled');
      expect(harness.provider.calls).toHaveLength(0);
    });

    it('should stop an in-flight call and settle its reservation', async () => {
      const controller = new AbortController();
      harness.provider.hangGenerate = true;
      harness.provider.onCall = call => {
        if (call.kind === 'generate') controller.abort();
      };

      const result = await harness.pipeline.run(request({ signal: controller.signal }));
      const usage = await harness.ledger.usage({ principalId: 'user-1', tier: 'free' });

      expect(result.status).toBe('failed');
      expect(result.errorKind).toBe('Cancelled');
      expect(harness.provider.callsOf('generate')).toHaveLength(1);
      expect(usage.reservedCostUsd).toBeCloseTo(0, 12);
      expect(usage.committedCostUsd).toBeCloseTo(result.costUsd, 12);
      expect(harness.breakers.get('chat-cheap').currentState).toBe('closed');
    });
  });
});
