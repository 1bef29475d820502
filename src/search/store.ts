/**
 * Vector Index
 *
 * An immutable in-memory snapshot of one source's embedding records.
 * The indexer builds a new snapshot on every (re)build or load and swaps
 * it in with a single assignment, so a query sees either the old records
 * or the new ones, never a mix.
 */

import type { EmbeddingRecord } from '../indexer/types.js';
import type { RetrievalResult, SearchOptions } from './types.js';

/**
 * Cosine similarity; 0 when either vector has zero length.
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Brute-force cosine search over a fixed set of records.
 *
 * A 10-K yields a few hundred chunks; a linear scan is a few hundred
 * dot products per query.
 *
 * @example
 * ```typescript
 * const index = new VectorIndex('acme-10k', 'hashing/feature-hash-v1:384', records);
 * const results = index.search(queryVector, { topK: 5, minScore: 0.05 });
 * ```
 */
export class VectorIndex {
  private readonly records: readonly EmbeddingRecord[];

  constructor(
    readonly sourceId: string,
    readonly embeddingModel: string,
    records: EmbeddingRecord[]
  ) {
    this.records = [...records].sort((a, b) => a.chunk.chunkIndex - b.chunk.chunkIndex);
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Chunks in chunkIndex order.
   */
  chunks(): EmbeddingRecord['chunk'][] {
    return this.records.map((record) => record.chunk);
  }

  /**
   * Rank records by similarity to `vector`.
   *
   * Descending score; equal scores keep ascending chunkIndex.
   */
  search(vector: Float32Array, options: SearchOptions): RetrievalResult[] {
    const { topK, minScore } = options;

    const scored = this.records
      .map((record) => ({ chunk: record.chunk, score: cosineSimilarity(vector, record.vector) }))
      .filter((entry) => minScore === undefined || entry.score >= minScore);

    scored.sort((a, b) => b.score - a.score || a.chunk.chunkIndex - b.chunk.chunkIndex);

    return scored.slice(0, topK).map((entry, i) => ({ ...entry, rank: i + 1 }));
  }
}
