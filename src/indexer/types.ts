/**
 * Indexer Types
 *
 * Shapes passed between the HTML parser, the chunker, the embedder and
 * the persisted index.
 */

import type { PageStrategy } from '../database/index.js';

/**
 * A run of text between two block boundaries in the source markup.
 */
export interface TextBlock {
  /** Whitespace-normalized text */
  text: string;
  /** Section label in effect where the block starts */
  section: string;
  /** Page number (>= 1) where the block starts */
  page: number;
  /** Character offset of the block in the extracted text */
  offset: number;
  /** True for table rows (cells joined with " | ") */
  inTable: boolean;
}

/**
 * Result of turning a filing's HTML into labeled text.
 */
export interface ParsedDocument {
  blocks: TextBlock[];
  /** Section labels in order of first appearance */
  sections: string[];
  pageCount: number;
  /** "markers" when page breaks came from the markup, "estimated" otherwise */
  pageStrategy: PageStrategy;
  wordCount: number;
}

/**
 * A bounded span of the filing's words: the unit of indexing and retrieval.
 */
export interface Chunk {
  text: string;
  section: string;
  page: number;
  chunkIndex: number;
  sourceId: string;
  /** Index of the first word in the document's word sequence */
  wordStart: number;
  /** One past the last word */
  wordEnd: number;
}

/**
 * A chunk with its vector. Created once at build time and never mutated.
 */
export interface EmbeddingRecord {
  chunk: Chunk;
  vector: Float32Array;
}

/**
 * What a build or load produced.
 */
export interface IndexSummary {
  sourceId: string;
  chunkCount: number;
  pageCount: number;
  pageStrategy: PageStrategy;
  sections: string[];
  embeddingModel: string;
  /** True when the persisted index was reused without parsing or embedding */
  cached: boolean;
  durationMs: number;
}

/**
 * Progress phases reported during a build.
 */
export type IndexPhase = 'parsing' | 'chunking' | 'embedding' | 'storing';

export interface IndexProgress {
  phase: IndexPhase;
  processed: number;
  total: number;
}
