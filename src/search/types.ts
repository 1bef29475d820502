/**
 * Search Types
 */

import type { Chunk } from '../indexer/types.js';

/**
 * One retrieved chunk. Transient: built per query, never stored.
 */
export interface RetrievalResult {
  chunk: Chunk;
  /** Cosine similarity in [-1, 1] */
  score: number;
  /** 1-based position in the result list */
  rank: number;
}

/**
 * Options for a single search over a snapshot.
 */
export interface SearchOptions {
  topK: number;
  /** Results scoring below this are dropped */
  minScore?: number;
}

/**
 * JSON shape used by `fra search --json`.
 */
export interface RetrievalResultJSON {
  rank: number;
  score: number;
  chunkIndex: number;
  section: string;
  page: number;
  content: string;
}
