/**
 * Embedder Module
 *
 * Turns chunk text into vectors for the filing index.
 *
 * Usage:
 * ```typescript
 * import { createEmbeddingProvider, embedChunks } from './embedder/index.js';
 *
 * const provider = createEmbeddingProvider(config.embedding);
 * const records = await embedChunks(chunks, provider, {
 *   onProgress: (done, total) => console.log(`${done}/${total}`),
 * });
 * ```
 */

// Provider factory
export { createEmbeddingProvider, OpenAIEmbeddingProvider } from './provider.js';

// Local provider
export {
  HashingEmbeddingProvider,
  hashEmbed,
  tokenize,
  fnv1a,
  DEFAULT_HASHING_DIMENSIONS,
  HASHING_MODEL,
} from './hashing.js';

// Embedder orchestration
export { embedChunks, embedTexts, EmbeddingError, EmbeddingTimeoutError } from './embedder.js';

// Types
export type { EmbeddingProvider, EmbedderOptions } from './types.js';
