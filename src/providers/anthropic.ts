/**
 * Anthropic Claude LLM Provider
 *
 * Wraps the official Anthropic SDK behind CompletionProvider.
 *
 * SECURITY: API key is retrieved only after validation passes.
 * Never logs or exposes the key in error messages.
 */

import Anthropic from '@anthropic-ai/sdk';
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

export interface AnthropicProviderOptions {
  /**
   * Model to use for completions.
   * @default 'claude-sonnet-4-20250514'
   */
  model?: string;

  /**
   * Request timeout in milliseconds.
   * @default 60000
   */
  timeout?: number;

  /** Pre-built client (tests) */
  client?: Anthropic;
}

export interface AnthropicProviderResult {
  provider: CompletionProvider;
  name: 'anthropic';
  model: string;
}

// ============================================================================
// CONSTANTS
// ============================================================================

/** Default model for Anthropic - Claude Sonnet 4 */
export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';

// ============================================================================
// PROVIDER
// ============================================================================

/**
 * Claude via the Messages API. Retries are left to the caller, so the
 * SDK's own retry loop is switched off.
 */
export class AnthropicCompletionProvider implements CompletionProvider {
  readonly name = 'anthropic';

  constructor(
    private readonly client: Anthropic,
    readonly model: string
  ) {}

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: request.temperature ?? DEFAULT_TEMPERATURE,
      system: request.system,
      messages: [{ role: 'user', content: request.prompt }],
    });

    return response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();
  }
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Create a configured Anthropic provider.
 *
 * @throws APIKeyError if ANTHROPIC_API_KEY is missing or malformed
 *
 * @example
 * ```typescript
 * const { provider } = createAnthropicProvider({ model: 'claude-3-5-haiku-latest' });
 * const text = await provider.complete({ system: '...', prompt: '...' });
 * ```
 */
export function createAnthropicProvider(options: AnthropicProviderOptions = {}): AnthropicProviderResult {
  const model = options.model ?? DEFAULT_ANTHROPIC_MODEL;
  const client =
    options.client ??
    new Anthropic({
      apiKey: getServiceKey('anthropic'),
      timeout: options.timeout ?? 60000,
      maxRetries: 0,
    });

  return {
    provider: new AnthropicCompletionProvider(client, model),
    name: 'anthropic',
    model,
  };
}
