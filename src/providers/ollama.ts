/**
 * Ollama Local LLM Provider
 *
 * Ollama serves an OpenAI-compatible API under /v1, so the OpenAI client is
 * reused with a local base URL. No API key is required.
 */

import OpenAI from 'openai';
import { validateOllamaHostUrl } from './validation.js';
import { getOllamaHost } from '../config/env.js';
import { OpenAICompletionProvider } from './openai.js';
import type { CompletionProvider } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface OllamaProviderOptions {
  /**
   * Model to use. Run `ollama list` to see available models.
   * @default 'llama3.2'
   */
  model?: string;

  /**
   * Ollama server host URL.
   * Reads from OLLAMA_HOST env var if not specified.
   */
  host?: string;

  /**
   * Request timeout in milliseconds. Local models can be slow on first load.
   * @default 120000
   */
  timeout?: number;
}

export interface OllamaProviderResult {
  provider: CompletionProvider;
  name: 'ollama';
  model: string;
  host: string;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_OLLAMA_MODEL = 'llama3.2';

export const DEFAULT_OLLAMA_TIMEOUT = 120000;

/** Ollama ignores the key, but the OpenAI client requires one */
const OLLAMA_PLACEHOLDER_KEY = 'ollama';

/**
 * Build an OpenAI client pointed at an Ollama server.
 *
 * @throws Error if the host URL is invalid
 */
export function createOllamaClient(host: string, timeout: number): OpenAI {
  const validation = validateOllamaHostUrl(host);
  if (!validation.valid) {
    throw new Error(`${validation.error}\n\n${validation.setupInstructions}`);
  }

  return new OpenAI({
    apiKey: OLLAMA_PLACEHOLDER_KEY,
    baseURL: `${host.replace(/\/+$/, '')}/v1`,
    timeout,
    maxRetries: 0,
  });
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Create a configured Ollama provider.
 *
 * @example
 * ```typescript
 * const { provider } = createOllamaProvider({ model: 'llama3.1' });
 * ```
 */
export function createOllamaProvider(options: OllamaProviderOptions = {}): OllamaProviderResult {
  const host = options.host ?? getOllamaHost();
  const model = options.model ?? DEFAULT_OLLAMA_MODEL;
  const client = createOllamaClient(host, options.timeout ?? DEFAULT_OLLAMA_TIMEOUT);

  return {
    provider: new OpenAICompletionProvider(client, model, 'ollama'),
    name: 'ollama',
    model,
    host,
  };
}
