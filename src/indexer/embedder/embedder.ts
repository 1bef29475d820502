/**
 * Embedder Orchestration
 *
 * Turns chunks into EmbeddingRecords. Texts go to the provider in batches;
 * each batch gets a timeout and a few attempts with backoff. A batch that
 * still fails aborts the whole run: an index with holes in it would
 * silently hide parts of the filing from retrieval.
 */

import { CLIError } from '../../errors/index.js';
import { retryWithBackoff, withTimeout, RetryExhaustedError, TimeoutError } from '../../utils/retry.js';
import type { Chunk, EmbeddingRecord } from '../types.js';
import type { EmbedderOptions, EmbeddingProvider } from './types.js';

/** Default batch size - 32 is a good balance of speed vs memory */
const DEFAULT_BATCH_SIZE = 32;
const DEFAULT_TIMEOUT_MS = 120000;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 500;

/**
 * Raised when a batch could not be embedded.
 */
export class EmbeddingError extends CLIError {
  /** The provider's last error */
  public readonly cause?: Error;

  constructor(message: string, cause?: Error, hint?: string) {
    super(message, hint ?? 'Check the embedding provider settings: fra config get embedding.provider');
    this.name = 'EmbeddingError';
    this.cause = cause;
  }
}

/**
 * Raised when every attempt on a batch ran out of time.
 */
export class EmbeddingTimeoutError extends EmbeddingError {
  constructor(public readonly timeoutMs: number) {
    super(
      `Embedding timed out after ${timeoutMs}ms`,
      undefined,
      'The provider may be slow or unreachable. Raise embedding.timeout_ms in ~/.fra/config.toml'
    );
    this.name = 'EmbeddingTimeoutError';
  }
}

/**
 * Embed arbitrary texts, preserving order.
 *
 * @throws EmbeddingError if any batch fails after its retries, or the
 *   provider returns the wrong number of vectors
 */
export async function embedTexts(
  texts: string[],
  provider: EmbeddingProvider,
  options: EmbedderOptions = {}
): Promise<Float32Array[]> {
  const {
    batchSize = DEFAULT_BATCH_SIZE,
    timeout = DEFAULT_TIMEOUT_MS,
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    baseDelayMs = DEFAULT_BASE_DELAY_MS,
    onProgress,
  } = options;

  const vectors: Float32Array[] = [];

  for (let i = 0; i < texts.length; i += batchSize) {
    const batch = texts.slice(i, i + batchSize);

    let embeddings: Float32Array[];
    try {
      embeddings = await retryWithBackoff(
        () => withTimeout(() => provider.embedBatch(batch), timeout, 'Embedding batch'),
        { maxAttempts, baseDelayMs }
      );
    } catch (error) {
      const last = error instanceof RetryExhaustedError ? error.lastError : undefined;
      if (last instanceof TimeoutError) {
        throw new EmbeddingTimeoutError(timeout);
      }
      const message = last?.message ?? (error instanceof Error ? error.message : String(error));
      throw new EmbeddingError(`Embedding failed for texts ${i + 1}-${i + batch.length}: ${message}`, last);
    }

    if (embeddings.length !== batch.length) {
      throw new EmbeddingError(
        `Provider ${provider.id} returned ${embeddings.length} vectors for ${batch.length} texts`
      );
    }
    for (const embedding of embeddings) {
      if (embedding.length === 0) {
        throw new EmbeddingError(`Provider ${provider.id} returned an empty vector`);
      }
      vectors.push(embedding);
    }

    onProgress?.(vectors.length, texts.length);
  }

  return vectors;
}

/**
 * Compute embeddings for chunks.
 *
 * @example
 * ```typescript
 * const provider = createEmbeddingProvider(config.embedding);
 * const records = await embedChunks(chunks, provider, {
 *   batchSize: 32,
 *   onProgress: (done, total) => spinner.text = `Embedding ${done}/${total}`,
 * });
 * ```
 */
export async function embedChunks(
  chunks: Chunk[],
  provider: EmbeddingProvider,
  options: EmbedderOptions = {}
): Promise<EmbeddingRecord[]> {
  const vectors = await embedTexts(
    chunks.map((chunk) => chunk.text),
    provider,
    options
  );

  return chunks.map((chunk, index) => {
    const vector = vectors[index];
    if (!vector) {
      throw new EmbeddingError(`Missing vector for chunk ${chunk.chunkIndex}`);
    }
    return { chunk, vector };
  });
}
