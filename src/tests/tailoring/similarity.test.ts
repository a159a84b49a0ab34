/**
 * Tests for vector similarity and term signatures
 */

import { describe, it, expect } from 'vitest';
import {
  cosineSimilarity,
  meanPool,
  rankBySimilarity,
  signatureSimilarity,
  termSignature
} from '../../tailoring/matching/similarity';

describe('cosineSimilarity', () => {
  it('should be 1 for parallel vectors', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1);
  });

  it('should be 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('should be 0 when a vector is all zeros', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('should reject vectors of different dimensions', () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow(RangeError);
  });
});

describe('meanPool', () => {
  it('should average element-wise', () => {
    expect(meanPool([[1, 2], [3, 6]])).toEqual([2, 4]);
  });

  it('should reject an empty set', () => {
    expect(() => meanPool([])).toThrow(RangeError);
  });
});

describe('rankBySimilarity', () => {
  it('should order by score, then id', () => {
    const items = [
      { id: 'c', v: [1, 0] },
      { id: 'b', v: [0, 1] },
      { id: 'a', v: [2, 0] }
    ];

    const ranked = rankBySimilarity([1, 0], items, item => item.v);
    expect(ranked.map(r => r.item.id)).toEqual(['a', 'c', 'b']);
    expect(ranked.map(r => r.score)).toEqual([1, 1, 0]);
  });
});

describe('termSignature', () => {
  it('should count normalized lower-case terms', () => {
    expect(termSignature('C++ and C# and Node.js. And more')).toEqual({
      'c++': 1,
      and: 3,
      'c#': 1,
      'node.js': 1,
      more: 1
    });
  });

  it('should score identical signatures as 1', () => {
    const signature = termSignature('python django react');
    expect(signatureSimilarity(signature, termSignature('React  Django python'))).toBeCloseTo(1);
  });

  it('should score disjoint signatures as 0', () => {
    expect(signatureSimilarity(termSignature('python'), termSignature('java'))).toBe(0);
    expect(signatureSimilarity({}, termSignature('java'))).toBe(0);
  });
});
