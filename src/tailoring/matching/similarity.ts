/**
 * Similarity
 *
 * Vector math for ranking artifacts against a job embedding, plus the
 * term-frequency signatures used for near-duplicate cache lookups.
 */

import { normalizeContent } from '../hashing/contentHasher';

/**
 * Cosine similarity of two equal-length vectors; 0 when either is all zeros
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector dimensions differ: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Element-wise mean of chunk embeddings
 */
export function meanPool(vectors: readonly (readonly number[])[]): number[] {
  if (vectors.length === 0) {
    throw new RangeError('Cannot pool an empty set of vectors');
  }
  const dimensions = vectors[0].length;
  const pooled = new Array<number>(dimensions).fill(0);
  for (const vector of vectors) {
    if (vector.length !== dimensions) {
      throw new RangeError(`Vector dimensions differ: ${vector.length} vs ${dimensions}`);
    }
    for (let i = 0; i < dimensions; i++) {
      pooled[i] += vector[i];
    }
  }
  return pooled.map(v => v / vectors.length);
}

export interface RankedItem<T> {
  item: T;
  score: number;
}

/**
 * Order items by similarity to the target, highest first; equal scores
 * fall back to id ascending
 */
export function rankBySimilarity<T extends { id: string }>(
  target: readonly number[],
  items: readonly T[],
  vectorOf: (item: T) => readonly number[]
): RankedItem<T>[] {
  return items
    .map(item => ({ item, score: cosineSimilarity(target, vectorOf(item)) }))
    .sort((a, b) => {
      if (b.score !== a.score) return b.score - a.score;
      return a.item.id < b.item.id ? -1 : a.item.id > b.item.id ? 1 : 0;
    });
}

// ============================================================================
// Term Signatures
// ============================================================================

export type TermSignature = Record<string, number>;

/**
 * Lower-cased term frequencies of normalized text
 */
export function termSignature(text: string): TermSignature {
  const signature: TermSignature = {};
  const terms = normalizeContent(text).toLowerCase().match(/[\p{L}\p{N}+#.]+/gu) ?? [];
  for (const raw of terms) {
    const term = raw.replace(/^\.+|\.+$/g, '');
    if (term) {
      signature[term] = (signature[term] ?? 0) + 1;
    }
  }
  return signature;
}

/**
 * Cosine similarity of two term signatures
 */
export function signatureSimilarity(a: TermSignature, b: TermSignature): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (const [term, weight] of Object.entries(a)) {
    normA += weight * weight;
    const other = b[term];
    if (other !== undefined) {
      dot += weight * other;
    }
  }
  for (const weight of Object.values(b)) {
    normB += weight * weight;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
