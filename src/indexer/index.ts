/**
 * Indexer Module
 *
 * Turns a 10-K filing's HTML into a persisted, searchable set of chunks.
 *
 * @example
 * ```ts
 * import { DocumentIndexer, createEmbeddingProvider } from './indexer/index.js';
 *
 * const indexer = new DocumentIndexer({
 *   provider: createEmbeddingProvider(config.embedding),
 *   db: getDatabase(),
 * });
 * const summary = await indexer.ensureIndex(config.document.path, config.document.source_id);
 * console.log(`${summary.chunkCount} chunks across ${summary.pageCount} pages`);
 * ```
 */

export {
  DocumentIndexer,
  hashContent,
  DEFAULT_MIN_WORDS,
  type DocumentIndexerOptions,
  type BuildMetadata,
  type EnsureIndexOptions,
} from './document-indexer.js';

// Parsing
export { parseFilingHtml, DEFAULT_CHARS_PER_PAGE, type ParseOptions } from './parser/html-parser.js';
export { sectionForHeading, COVER_SECTION, ITEM_SECTIONS } from './parser/sections.js';

// Chunking
export { chunkDocument, CHUNK_CONFIG, validateChunkConfig, type ChunkConfig } from './chunker/index.js';

// Embedding
export {
  createEmbeddingProvider,
  embedChunks,
  embedTexts,
  HashingEmbeddingProvider,
  OpenAIEmbeddingProvider,
  EmbeddingError,
  EmbeddingTimeoutError,
  type EmbeddingProvider,
  type EmbedderOptions,
} from './embedder/index.js';

export type {
  TextBlock,
  ParsedDocument,
  Chunk,
  EmbeddingRecord,
  IndexSummary,
  IndexPhase,
  IndexProgress,
} from './types.js';
