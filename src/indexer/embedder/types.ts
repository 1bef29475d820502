/**
 * Embedder Types
 *
 * Providers return Float32Array because vectors are stored as SQLite BLOBs
 * (4 bytes per dimension) and compared with plain dot products.
 */

/**
 * Maps texts to fixed-length vectors. The same text must always map to the
 * same vector for a given `id`, or a persisted index can't be reused.
 */
export interface EmbeddingProvider {
  /** Provider family, e.g. "hashing" or "openai" */
  readonly name: string;
  /** Stable identifier stored with the index; a change forces a rebuild */
  readonly id: string;
  embedBatch(texts: string[]): Promise<Float32Array[]>;
}

/**
 * Options for the embedTexts orchestration function.
 */
export interface EmbedderOptions {
  /**
   * Texts per provider call.
   * @default 32
   */
  batchSize?: number;

  /**
   * Timeout in milliseconds for one batch.
   * @default 120000
   */
  timeout?: number;

  /**
   * Attempts per batch before the build fails.
   * @default 3
   */
  maxAttempts?: number;

  /** First backoff delay in milliseconds */
  baseDelayMs?: number;

  /** Fired after each batch completes */
  onProgress?: (processed: number, total: number) => void;
}
