/**
 * Tests for sliding-window chunking
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Chunker, chunkCount, split } from '../../tailoring/chunking/chunker';
import { TailoringErrorKind, isTailoringError } from '../../tailoring/errors/types';

describe('split', () => {
  it('should return no chunks for empty or blank input', () => {
    expect(split('', 10, 2)).toEqual([]);
    expect(split(' \n\t ', 10, 2)).toEqual([]);
  });

  it('should return one chunk when the text fits the window', () => {
    expect(split('hello world', 20, 5)).toEqual([
      { index: 0, text: 'hello world', start: 0, end: 11 }
    ]);
  });

  it('should slide by window minus overlap', () => {
    const chunks = split('abcdefghij', 4, 1);

    expect(chunks.map(c => c.text)).toEqual(['abcd', 'defg', 'ghij']);
    expect(chunks.map(c => c.start)).toEqual([0, 3, 6]);
  });

  it('should split normalized text', () => {
    expect(split('ab\r\n\r\ncd   ef', 5, 0).map(c => c.text)).toEqual(['ab cd', ' ef']);
  });

  it('should reject invalid window settings', () => {
    const invalid = (fn: () => unknown): boolean => {
      try {
        fn();
        return false;
      } catch (error) {
        return isTailoringError(error, TailoringErrorKind.INVALID_INPUT);
      }
    };

    expect(invalid(() => split('text', 0, 0))).toBe(true);
    expect(invalid(() => split('text', -5, 0))).toBe(true);
    expect(invalid(() => split('text', 10, 10))).toBe(true);
    expect(invalid(() => split('text', 10, -1))).toBe(true);
    expect(invalid(() => split('text', 10, 9))).toBe(false);
  });

  it('should match the chunk count formula with bounded, overlapping chunks', () => {
    const settings = fc.integer({ min: 1, max: 50 }).chain(window =>
      fc.record({
        window: fc.constant(window),
        overlap: fc.integer({ min: 0, max: window - 1 }),
        text: fc.stringMatching(/^[a-z]{0,400}$/)
      })
    );

    fc.assert(
      fc.property(settings, ({ window, overlap, text }) => {
        const chunks = split(text, window, overlap);

        expect(chunks.length).toBe(chunkCount(text.length, window, overlap));
        chunks.forEach((chunk, i) => {
          expect(chunk.index).toBe(i);
          expect(chunk.text.length).toBeLessThanOrEqual(window);
          expect(chunk.text).toBe(text.slice(chunk.start, chunk.end));
          if (i > 0) {
            expect(chunks[i - 1].end - chunk.start).toBe(overlap);
          }
        });
        if (chunks.length > 0) {
          expect(chunks[chunks.length - 1].end).toBe(text.length);
        }
      }),
      { numRuns: 200 }
    );
  });
});

describe('chunkCount', () => {
  it('should follow ceil((L - O) / (W - O)) for long text', () => {
    expect(chunkCount(2500, 1000, 200)).toBe(3);
    expect(chunkCount(1800, 1000, 200)).toBe(2);
    expect(chunkCount(1000, 1000, 200)).toBe(1);
    expect(chunkCount(0, 1000, 200)).toBe(0);
  });
});

describe('Chunker', () => {
  it('should cap chunks per document', () => {
    const chunker = new Chunker({ chunkSize: 10, overlap: 0, maxChunks: 3 });
    const text = 'x'.repeat(100);

    expect(chunker.split(text)).toHaveLength(3);
    expect(chunker.count(text)).toBe(3);
  });

  it('should validate its settings on construction', () => {
    expect(() => new Chunker({ chunkSize: 10, overlap: 10 })).toThrow();
  });

  it('should use 1000 character windows with 200 overlap by default', () => {
    const chunks = new Chunker().split('y'.repeat(2500));
    expect(chunks.map(c => [c.start, c.end])).toEqual([[0, 1000], [800, 1800], [1600, 2500]]);
  });
});
