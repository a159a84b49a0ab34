/**
 * In-Memory Generation Store
 *
 * Map-backed implementation for tests and development. Data lives only
 * as long as the instance.
 */

import type { Artifact, GenerationResult } from '../../tailoring/types';
import { GenerationStore } from './interface';

export class MemoryGenerationStore implements GenerationStore {
  private readonly results = new Map<string, GenerationResult>();
  private readonly artifacts = new Map<string, Artifact[]>();

  async saveResult(requestId: string, result: GenerationResult): Promise<void> {
    this.results.set(requestId, structuredClone(result));
  }

  async loadResult(requestId: string): Promise<GenerationResult | null> {
    const result = this.results.get(requestId);
    return result ? structuredClone(result) : null;
  }

  async loadArtifactSet(userId: string): Promise<Artifact[]> {
    return (this.artifacts.get(userId) ?? []).map(a => structuredClone(a));
  }

  /**
   * Replace a user's artifact set
   */
  setArtifacts(userId: string, artifacts: Artifact[]): void {
    this.artifacts.set(userId, artifacts.map(a => structuredClone(a)));
  }

  /**
   * Number of stored results
   */
  get size(): number {
    return this.results.size;
  }

  clear(): void {
    this.results.clear();
    this.artifacts.clear();
  }
}
