/**
 * Vector Index Tests
 */

import { describe, it, expect } from 'vitest';

import { VectorIndex, cosineSimilarity } from '../store.js';
import type { EmbeddingRecord } from '../../indexer/types.js';

function record(chunkIndex: number, vector: number[]): EmbeddingRecord {
  return {
    chunk: {
      text: `chunk ${chunkIndex}`,
      section: 'MD&A',
      page: 1,
      chunkIndex,
      sourceId: 'acme-10k',
      wordStart: 0,
      wordEnd: 1,
    },
    vector: new Float32Array(vector),
  };
}

// Deliberately out of chunkIndex order
const RECORDS = [record(2, [1, 0]), record(3, [0.6, 0.8]), record(0, [1, 0]), record(1, [0, 1])];

describe('cosineSimilarity', () => {
  it('should compute the cosine of the angle between vectors', () => {
    expect(cosineSimilarity(new Float32Array([1, 0]), new Float32Array([0, 2]))).toBe(0);
    expect(cosineSimilarity(new Float32Array([2, 0]), new Float32Array([3, 0]))).toBe(1);
    expect(cosineSimilarity(new Float32Array([1, 0]), new Float32Array([-1, 0]))).toBe(-1);
  });

  it('should return 0 for a zero vector', () => {
    expect(cosineSimilarity(new Float32Array([0, 0]), new Float32Array([1, 0]))).toBe(0);
  });

  it('should reject vectors of different lengths', () => {
    expect(() => cosineSimilarity(new Float32Array(2), new Float32Array(3))).toThrow('Vector length mismatch: 2 vs 3');
  });
});

describe('VectorIndex', () => {
  const index = new VectorIndex('acme-10k', 'fake/2', RECORDS);

  it('should order by descending score and break ties by chunk index', () => {
    const results = index.search(new Float32Array([1, 0]), { topK: 10 });

    expect(results.map((r) => r.chunk.chunkIndex)).toEqual([0, 2, 3, 1]);
    expect(results.map((r) => r.rank)).toEqual([1, 2, 3, 4]);
    expect(results[2]?.score).toBeCloseTo(0.6, 5);
  });

  it('should return at most topK results', () => {
    const results = index.search(new Float32Array([1, 0]), { topK: 2 });
    expect(results.map((r) => r.chunk.chunkIndex)).toEqual([0, 2]);
  });

  it('should drop results below the floor', () => {
    expect(index.search(new Float32Array([1, 0]), { topK: 10, minScore: 0.5 }).map((r) => r.chunk.chunkIndex)).toEqual([
      0, 2, 3,
    ]);
    expect(index.search(new Float32Array([1, 0]), { topK: 10, minScore: 1.1 })).toEqual([]);
  });

  it('should fall back to chunk order when every score is equal', () => {
    const results = index.search(new Float32Array([0, 0]), { topK: 10 });
    expect(results.map((r) => r.chunk.chunkIndex)).toEqual([0, 1, 2, 3]);
  });

  it('should list chunks in chunk order', () => {
    expect(index.size).toBe(4);
    expect(index.chunks().map((c) => c.chunkIndex)).toEqual([0, 1, 2, 3]);
  });

  it('should return nothing when empty', () => {
    expect(new VectorIndex('empty', 'fake/2', []).search(new Float32Array([1, 0]), { topK: 3 })).toEqual([]);
  });
});
