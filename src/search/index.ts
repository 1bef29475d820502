/**
 * Search Module
 *
 * Cosine retrieval over the in-memory snapshot of an indexed filing.
 */

export { VectorIndex, cosineSimilarity } from './store.js';
export { Retriever, type RetrieverOptions, type IndexSource } from './retriever.js';
export { EmbeddingMismatchError } from './errors.js';
export {
  formatScore,
  truncateSnippet,
  formatResult,
  formatResults,
  formatResultJSON,
  formatResultsJSON,
  type FormatOptions,
} from './formatter.js';
export type { RetrievalResult, RetrievalResultJSON, SearchOptions } from './types.js';
