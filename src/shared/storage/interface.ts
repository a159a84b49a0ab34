/**
 * Generation Store Interface
 *
 * Persistence contract for the generation pipeline. Swappable backends:
 * - MemoryGenerationStore: in-memory (testing)
 * - SqliteGenerationStore: better-sqlite3 (single-node deployments)
 *
 * The pipeline treats the store as the source of truth for idempotence:
 * a request whose saved result is terminal is never executed again.
 */

import type { Artifact, GenerationResult } from '../../tailoring/types';

export interface GenerationStore {
  /**
   * Insert or replace the result for a request
   * @param requestId - Caller-supplied idempotency key
   */
  saveResult(requestId: string, result: GenerationResult): Promise<void>;

  /**
   * Latest saved result for a request, or null if none
   */
  loadResult(requestId: string): Promise<GenerationResult | null>;

  /**
   * Every artifact a user has on file, in insertion order
   */
  loadArtifactSet(userId: string): Promise<Artifact[]>;
}
