/**
 * Retriever
 *
 * Embeds a question with the indexer's provider and ranks the chunks of
 * one source by cosine similarity. No section filtering: every chunk of
 * the source is a candidate.
 */

import { ValidationError } from '../errors/index.js';
import type { EmbeddingProvider } from '../indexer/embedder/types.js';
import { withTimeout } from '../utils/retry.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import type { VectorIndex } from './store.js';
import type { RetrievalResult } from './types.js';

/**
 * Where the Retriever gets its snapshot and query embedder.
 * DocumentIndexer implements this.
 */
export interface IndexSource {
  readonly embeddingProvider: EmbeddingProvider;
  getOrLoadSnapshot(sourceId: string): Promise<VectorIndex>;
}

export interface RetrieverOptions {
  sourceId: string;
  /** Used when query() is called without topK */
  defaultTopK?: number;
  /** Similarity floor; omit to keep every result */
  minScore?: number;
  /** Bound on embedding the question */
  timeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_TOP_K = 5;
const DEFAULT_TIMEOUT_MS = 30000;

/**
 * @example
 * ```typescript
 * const retriever = new Retriever(indexer, { sourceId: 'acme-10k', minScore: 0.05 });
 * const results = await retriever.query('supply chain risks', 5);
 * results[0]?.chunk.section; // "Risk Factors"
 * ```
 */
export class Retriever {
  private readonly sourceId: string;
  private readonly defaultTopK: number;
  private readonly minScore?: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly indexer: IndexSource,
    options: RetrieverOptions
  ) {
    this.sourceId = options.sourceId;
    this.defaultTopK = options.defaultTopK ?? DEFAULT_TOP_K;
    this.minScore = options.minScore;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Top chunks for `text`, best first.
   *
   * Loads the persisted index on first use. An empty index, or one where
   * nothing clears the floor, yields [].
   *
   * @throws ValidationError if topK is not a positive integer
   * @throws IndexNotBuiltError if nothing has been indexed for the source
   */
  async query(text: string, topK: number = this.defaultTopK): Promise<RetrievalResult[]> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError('Invalid topK', [`topK must be a positive integer (got ${topK})`]);
    }

    const snapshot = await this.indexer.getOrLoadSnapshot(this.sourceId);
    if (snapshot.size === 0) {
      this.logger.debug?.(`Index for "${this.sourceId}" is empty`);
      return [];
    }

    const provider = this.indexer.embeddingProvider;
    const [vector] = await withTimeout(() => provider.embedBatch([text]), this.timeoutMs, 'Query embedding');
    if (!vector) {
      return [];
    }

    const results = snapshot.search(vector, { topK, minScore: this.minScore });
    this.logger.debug?.(
      `Retrieved ${results.length}/${snapshot.size} chunks for "${this.sourceId}"` +
        (results[0] ? ` (best ${results[0].score.toFixed(3)})` : '')
    );
    return results;
  }
}
