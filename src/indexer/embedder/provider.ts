/**
 * Embedding Provider Factory
 *
 * Creates the embedding provider named in config.toml:
 * - hashing: local feature hashing, no network, no model download
 * - openai: the OpenAI embeddings endpoint
 * - ollama: a local Ollama server through its OpenAI-compatible API
 *
 * The provider's `id` is stored with the index. Loading an index built
 * with a different id is refused, since the vectors would not be comparable.
 */

import OpenAI from 'openai';
import type { Config } from '../../config/schema.js';
import { getOllamaHost } from '../../config/env.js';
import { getServiceKey } from '../../providers/validation.js';
import { createOllamaClient } from '../../providers/ollama.js';
import { HashingEmbeddingProvider } from './hashing.js';
import type { EmbeddingProvider } from './types.js';

type EmbeddingConfig = Config['embedding'];

/**
 * Embeddings through any OpenAI-compatible `/embeddings` endpoint.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly id: string;

  constructor(
    private readonly client: OpenAI,
    readonly model: string,
    readonly name: string = 'openai'
  ) {
    this.id = `${name}/${model}`;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    if (texts.length === 0) return [];

    const response = await this.client.embeddings.create({
      model: this.model,
      input: texts,
    });

    // The API may return items out of order; `index` is authoritative
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => new Float32Array(item.embedding));
  }
}

/**
 * Create an embedding provider from configuration.
 *
 * @throws APIKeyError for the openai provider when OPENAI_API_KEY is missing
 *
 * @example
 * ```typescript
 * const provider = createEmbeddingProvider(config.embedding);
 * const [vector] = await provider.embedBatch(['revenue by segment']);
 * ```
 */
export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider {
  switch (config.provider) {
    case 'hashing':
      return new HashingEmbeddingProvider(config.dimensions, config.model);

    case 'openai':
      return new OpenAIEmbeddingProvider(
        new OpenAI({
          apiKey: getServiceKey('openai'),
          timeout: config.timeout_ms,
          maxRetries: 0,
        }),
        config.model
      );

    case 'ollama':
      return new OpenAIEmbeddingProvider(
        createOllamaClient(getOllamaHost(), config.timeout_ms),
        config.model,
        'ollama'
      );
  }
}
