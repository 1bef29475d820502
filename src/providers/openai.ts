/**
 * OpenAI GPT LLM Provider
 *
 * Chat Completions behind CompletionProvider. The same class serves
 * Ollama through its OpenAI-compatible endpoint.
 *
 * SECURITY: API key is retrieved only after validation passes.
 */

import OpenAI from 'openai';
import { getServiceKey } from './validation.js';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type CompletionProvider,
  type CompletionRequest,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface OpenAIProviderOptions {
  /**
   * Model to use for chat completions.
   * @default 'gpt-4o'
   */
  model?: string;

  /**
   * Explicit API key to use.
   * If provided, skips environment variable lookup (OPENAI_API_KEY).
   */
  apiKey?: string;

  /** Custom base URL for OpenAI-compatible servers */
  baseURL?: string;

  /**
   * Request timeout in milliseconds.
   * @default 60000
   */
  timeout?: number;

  /** Pre-built client (tests) */
  client?: OpenAI;
}

export interface OpenAIProviderResult {
  provider: CompletionProvider;
  name: 'openai';
  model: string;
}

// ============================================================================
// CONSTANTS
// ============================================================================

/** Default model for OpenAI */
export const DEFAULT_OPENAI_MODEL = 'gpt-4o';

// ============================================================================
// PROVIDER
// ============================================================================

export class OpenAICompletionProvider implements CompletionProvider {
  constructor(
    private readonly client: OpenAI,
    readonly model: string,
    readonly name: string = 'openai'
  ) {}

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: request.temperature ?? DEFAULT_TEMPERATURE,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.prompt },
      ],
    });

    return (response.choices[0]?.message.content ?? '').trim();
  }
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Create a configured OpenAI provider.
 *
 * @throws APIKeyError if no apiKey is given and OPENAI_API_KEY is missing or malformed
 */
export function createOpenAIProvider(options: OpenAIProviderOptions = {}): OpenAIProviderResult {
  const model = options.model ?? DEFAULT_OPENAI_MODEL;
  const client =
    options.client ??
    new OpenAI({
      apiKey: options.apiKey ?? getServiceKey('openai'),
      baseURL: options.baseURL,
      timeout: options.timeout ?? 60000,
      maxRetries: 0,
    });

  return {
    provider: new OpenAICompletionProvider(client, model),
    name: 'openai',
    model,
  };
}
