/**
 * Memory generation store with switchable failures
 */

import type { GenerationResult, GenerationStatus } from '../../tailoring/types';
import { MemoryGenerationStore } from '../../shared/storage/memoryStorage';

export class FailingGenerationStore extends MemoryGenerationStore {
  failLoads = false;
  /** Saves of results in these statuses throw */
  readonly failSavesOf = new Set<GenerationStatus>();

  async saveResult(requestId: string, result: GenerationResult): Promise<void> {
    if (this.failSavesOf.has(result.status)) {
      throw new Error('SQLITE_BUSY: database is locked');
    }
    return super.saveResult(requestId, result);
  }

  async loadResult(requestId: string): Promise<GenerationResult | null> {
    if (this.failLoads) {
      throw new Error('SQLITE_BUSY: database is locked');
    }
    return super.loadResult(requestId);
  }
}
