/**
 * Chunker
 *
 * Splits long text into fixed-size, overlapping windows for embedding.
 * For normalized length L, window W and overlap O the split yields
 * ceil((L - O) / (W - O)) chunks when L > W, one chunk when 0 < L <= W,
 * and none for empty input. Consecutive chunks share exactly O characters.
 */

import { normalizeContent } from '../hashing/contentHasher';
import { TailoringErrorFactory } from '../errors/types';
import { loggers } from '../../backend/logger';

export interface Chunk {
  /** Position in the sequence, from 0 */
  index: number;
  text: string;
  /** Offset into the normalized text, inclusive */
  start: number;
  /** Offset into the normalized text, exclusive */
  end: number;
}

export interface ChunkerOptions {
  chunkSize: number;
  overlap: number;
  /** Chunks beyond this count are dropped */
  maxChunks?: number;
}

export const DEFAULT_CHUNKER_OPTIONS: Required<ChunkerOptions> = {
  chunkSize: 1000,
  overlap: 200,
  maxChunks: 50
};

/**
 * Deterministic sliding-window split of normalized text
 */
export function split(text: string, maxWindow: number, overlap: number): Chunk[] {
  if (!Number.isInteger(maxWindow) || maxWindow <= 0) {
    throw TailoringErrorFactory.invalidInput('maxWindow', `Chunk window must be a positive integer, got ${maxWindow}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxWindow) {
    throw TailoringErrorFactory.invalidInput('overlap', `Chunk overlap must be an integer in [0, ${maxWindow}), got ${overlap}`);
  }

  const normalized = normalizeContent(text);
  const chunks: Chunk[] = [];
  if (normalized.length === 0) {
    return chunks;
  }

  const step = maxWindow - overlap;
  for (let start = 0; ; start += step) {
    const end = Math.min(start + maxWindow, normalized.length);
    chunks.push({ index: chunks.length, text: normalized.slice(start, end), start, end });
    if (end === normalized.length) {
      break;
    }
  }

  return chunks;
}

/**
 * Expected chunk count for a normalized length
 */
export function chunkCount(length: number, maxWindow: number, overlap: number): number {
  if (length <= 0) return 0;
  if (length <= maxWindow) return 1;
  return Math.ceil((length - overlap) / (maxWindow - overlap));
}

/**
 * Chunker bound to configured window settings and a per-document cap
 */
export class Chunker {
  private readonly options: Required<ChunkerOptions>;

  constructor(options: Partial<ChunkerOptions> = {}) {
    this.options = { ...DEFAULT_CHUNKER_OPTIONS, ...options };
    // Validates the window settings
    split('', this.options.chunkSize, this.options.overlap);
  }

  split(text: string): Chunk[] {
    const chunks = split(text, this.options.chunkSize, this.options.overlap);
    if (chunks.length > this.options.maxChunks) {
      loggers.pipeline.warn(
        { chunks: chunks.length, maxChunks: this.options.maxChunks },
        'Document exceeds chunk limit, trailing chunks dropped'
      );
      return chunks.slice(0, this.options.maxChunks);
    }
    return chunks;
  }

  /**
   * Chunk count after the cap, without materializing chunks
   */
  count(text: string): number {
    const length = normalizeContent(text).length;
    return Math.min(
      chunkCount(length, this.options.chunkSize, this.options.overlap),
      this.options.maxChunks
    );
  }
}
