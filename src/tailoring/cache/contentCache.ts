/**
 * Content Cache
 *
 * Stores expensive provider output (embeddings, parsed postings, generated
 * documents) under the fingerprint of the normalized input, partitioned by
 * namespace. Reads are lock-free; writes for one fingerprint are
 * first-writer-wins, and getOrCompute shares a single in-flight computation
 * between concurrent callers.
 *
 * Near-duplicate lookup is optional and off by default. When enabled it only
 * matches entries owned by the same principal unless allowCrossOwner is set.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { CacheBackend, CacheRecord, CacheStats } from './cacheBackend';
import { fingerprint } from '../hashing/contentHasher';
import { signatureSimilarity, termSignature } from '../matching/similarity';
import { TailoringErrorFactory } from '../errors/types';
import { ErrorHandler } from '../../shared/errors/handler';
import type { Clock } from '../resilience/circuitBreaker';
import { loggers, serializeError } from '../../backend/logger';

export const DEFAULT_NAMESPACE = 'default';

export interface NearDuplicateOptions {
  enabled: boolean;
  /** Minimum signature cosine for a match */
  threshold: number;
  /** How many recent entries of the namespace are compared */
  candidateLimit: number;
  /** Let one principal's entries answer another principal's lookups */
  allowCrossOwner: boolean;
}

export const DEFAULT_NEAR_DUPLICATE_OPTIONS: NearDuplicateOptions = {
  enabled: false,
  threshold: 0.98,
  candidateLimit: 200,
  allowCrossOwner: false
};

export interface ContentCacheOptions<T> {
  /** Decoder for stored payloads; entries that fail it are evicted */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  nearDuplicate?: Partial<NearDuplicateOptions>;
  clock?: Clock;
  logger?: Logger;
}

export interface CacheEntry<T> {
  contentHash: string;
  namespace: string;
  payload: T;
  costUsd: number;
  accessCount: number;
  createdAt: Date;
  lastAccessedAt: Date;
  ownerId: string | null;
}

export type MatchKind = 'exact' | 'near';

export interface CacheHit<T> {
  entry: CacheEntry<T>;
  match: MatchKind;
  similarity: number;
}

export interface LookupOptions {
  /** Principal performing the lookup; gates near-duplicate matches */
  ownerId?: string;
}

export interface StoreOptions {
  namespace?: string;
  ownerId?: string;
}

export interface StoreResult<T> {
  entry: CacheEntry<T>;
  /** False when another writer stored this fingerprint first */
  created: boolean;
}

/**
 * Value produced by a getOrCompute callback; callers may attach more fields
 * (a budget reservation, the model used) and get them back on the outcome
 */
export interface ComputedValue<T> {
  payload: T;
  costUsd: number;
}

export type CacheOutcome<T, R extends ComputedValue<T>> =
  | { source: 'hit'; entry: CacheEntry<T>; match: MatchKind }
  | { source: 'shared'; entry: CacheEntry<T> }
  | { source: 'computed'; entry: CacheEntry<T>; computed: R }
  | { source: 'raced'; entry: CacheEntry<T>; computed: R }
  | { source: 'uncached'; payload: T; computed: R };

/**
 * Payload carried by any getOrCompute outcome
 */
export function outcomePayload<T>(outcome: CacheOutcome<T, ComputedValue<T>>): T {
  return outcome.source === 'uncached' ? outcome.payload : outcome.entry.payload;
}

export class ContentCache<T> {
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private readonly nearDuplicate: NearDuplicateOptions;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly inflight = new Map<string, Promise<CacheEntry<T> | null>>();

  constructor(private readonly backend: CacheBackend, options: ContentCacheOptions<T>) {
    this.schema = options.schema;
    this.nearDuplicate = { ...DEFAULT_NEAR_DUPLICATE_OPTIONS, ...options.nearDuplicate };
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? loggers.cache;
  }

  /**
   * Exact lookup by fingerprint, then near-duplicate lookup when enabled.
   * A hit bumps the entry's access count.
   */
  lookup(
    content: string,
    namespace: string = DEFAULT_NAMESPACE,
    options: LookupOptions = {}
  ): CacheHit<T> | null {
    const contentHash = fingerprint(content);

    const exact = this.read(this.backend.get(namespace, contentHash));
    if (exact) {
      this.backend.touch(namespace, contentHash, this.clock());
      return { entry: this.bumped(exact), match: 'exact', similarity: 1 };
    }

    if (!this.nearDuplicate.enabled) {
      return null;
    }
    return this.lookupNearDuplicate(content, namespace, options.ownerId);
  }

  /**
   * Idempotent insert. If the fingerprint is already stored the existing
   * entry is returned with created=false and the new payload is discarded.
   */
  store(content: string, payload: T, costUsd: number, options: StoreOptions = {}): StoreResult<T> {
    const namespace = options.namespace ?? DEFAULT_NAMESPACE;
    const now = this.clock();
    const record: CacheRecord = {
      namespace,
      contentHash: fingerprint(content),
      payload,
      costUsd,
      accessCount: 0,
      createdAt: now,
      lastAccessedAt: now,
      ownerId: options.ownerId ?? null,
      signature: this.nearDuplicate.enabled ? termSignature(content) : null
    };

    const outcome = this.backend.insertIfAbsent(record);
    if (outcome.created) {
      return { entry: toEntry(outcome.record, payload), created: true };
    }

    const existing = this.read(outcome.record);
    if (existing) {
      this.logger.debug({ namespace, contentHash: record.contentHash }, 'Concurrent store lost, keeping existing entry');
      return { entry: existing, created: false };
    }

    // The stored entry is unreadable; replace it with the fresh payload
    this.backend.delete(namespace, record.contentHash);
    const retry = this.backend.insertIfAbsent(record);
    return { entry: toEntry(retry.record, payload), created: retry.created };
  }

  /**
   * Return the cached payload or run compute exactly once per fingerprint.
   * Concurrent callers for the same fingerprint await the first caller's
   * computation; if it fails they compute for themselves. A computed value
   * whose write fails is still returned, as an 'uncached' outcome.
   */
  async getOrCompute<R extends ComputedValue<T>>(
    content: string,
    namespace: string,
    compute: () => Promise<R>,
    options: LookupOptions = {}
  ): Promise<CacheOutcome<T, R>> {
    const hit = this.lookup(content, namespace, options);
    if (hit) {
      return { source: 'hit', entry: hit.entry, match: hit.match };
    }

    const flightKey = `${namespace}\u0000${fingerprint(content)}`;
    const pending = this.inflight.get(flightKey);
    if (pending) {
      const shared = await pending.then(
        entry => entry,
        (error: unknown) => {
          this.logger.debug({ namespace, err: String(error) }, 'Shared computation failed, computing locally');
          return null;
        }
      );
      if (shared) {
        return { source: 'shared', entry: shared };
      }
    }

    const flight = (async (): Promise<CacheOutcome<T, R>> => {
      const computed = await compute();
      let result: StoreResult<T>;
      try {
        result = this.store(content, computed.payload, computed.costUsd, {
          namespace,
          ownerId: options.ownerId
        });
      } catch (error) {
        this.logger.error({ namespace, err: serializeError(error) }, 'Cache write failed, returning value uncached');
        return { source: 'uncached', payload: computed.payload, computed };
      }
      return result.created
        ? { source: 'computed', entry: result.entry, computed }
        : { source: 'raced', entry: result.entry, computed };
    })();

    const entryFlight = flight.then(outcome => (outcome.source === 'uncached' ? null : outcome.entry));
    this.inflight.set(flightKey, entryFlight);
    // Rejections are observed by whoever awaits the flight
    entryFlight.catch(() => undefined);

    try {
      return await flight;
    } finally {
      if (this.inflight.get(flightKey) === entryFlight) {
        this.inflight.delete(flightKey);
      }
    }
  }

  stats(): CacheStats {
    return this.backend.stats();
  }

  /**
   * Evict entries older than maxAgeMs accessed at most maxAccessCount times
   */
  prune(maxAgeMs: number, maxAccessCount: number = 0): number {
    const removed = this.backend.prune(this.clock() - maxAgeMs, maxAccessCount);
    if (removed > 0) {
      this.logger.info({ removed, maxAgeMs, maxAccessCount }, 'Pruned cache entries');
    }
    return removed;
  }

  private lookupNearDuplicate(content: string, namespace: string, ownerId?: string): CacheHit<T> | null {
    const probe = termSignature(content);
    let best: { record: CacheRecord; similarity: number } | null = null;

    for (const candidate of this.backend.recent(namespace, this.nearDuplicate.candidateLimit)) {
      if (!candidate.signature) continue;
      if (!this.nearDuplicate.allowCrossOwner && (ownerId === undefined || candidate.ownerId !== ownerId)) {
        continue;
      }
      const similarity = signatureSimilarity(probe, candidate.signature);
      if (similarity >= this.nearDuplicate.threshold && (!best || similarity > best.similarity)) {
        best = { record: candidate, similarity };
      }
    }

    if (!best) {
      return null;
    }
    const entry = this.read(best.record);
    if (!entry) {
      return null;
    }

    this.backend.touch(namespace, entry.contentHash, this.clock());
    this.logger.debug({ namespace, similarity: best.similarity }, 'Near-duplicate cache hit');
    return { entry: this.bumped(entry), match: 'near', similarity: best.similarity };
  }

  /**
   * Decode a stored record; undecodable records are evicted and logged
   */
  private read(record: CacheRecord | null): CacheEntry<T> | null {
    if (!record) {
      return null;
    }
    const decoded = this.schema.safeParse(record.payload);
    if (decoded.success) {
      return toEntry(record, decoded.data);
    }

    ErrorHandler.logError(TailoringErrorFactory.cacheInconsistency(
      record.namespace,
      record.contentHash,
      decoded.error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ')
    ));
    this.backend.delete(record.namespace, record.contentHash);
    return null;
  }

  private bumped(entry: CacheEntry<T>): CacheEntry<T> {
    const now = new Date(this.clock());
    return { ...entry, accessCount: entry.accessCount + 1, lastAccessedAt: now };
  }
}

function toEntry<T>(record: CacheRecord, payload: T): CacheEntry<T> {
  return {
    contentHash: record.contentHash,
    namespace: record.namespace,
    payload,
    costUsd: record.costUsd,
    accessCount: record.accessCount,
    createdAt: new Date(record.createdAt),
    lastAccessedAt: new Date(record.lastAccessedAt),
    ownerId: record.ownerId
  };
}
