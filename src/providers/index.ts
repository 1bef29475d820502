/**
 * Providers Module
 *
 * Handles LLM provider configuration, validation, and access.
 *
 * MAIN ENTRY POINT:
 * ```typescript
 * import { createLLMProvider } from './providers/index.js';
 * const { provider, name, model } = createLLMProvider(config);
 * ```
 */

export {
  validateServiceKey,
  validateProviderKey,
  validateOllamaHostUrl,
  getServiceKey,
  AnthropicKeySchema,
  OpenAIKeySchema,
  TavilyKeySchema,
  OllamaHostSchema,
  type ValidationResult,
} from './validation.js';

export type { CompletionProvider, CompletionRequest, ProviderType } from './types.js';

export {
  createLLMProvider,
  AllProvidersFailedError,
  type LLMProviderResult,
  type LLMProviderResultWithFallback,
  type LLMProviderOptions,
  type FallbackOptions,
} from './llm.js';

export { createAnthropicProvider, DEFAULT_ANTHROPIC_MODEL } from './anthropic.js';
export { createOpenAIProvider, DEFAULT_OPENAI_MODEL } from './openai.js';
export { createOllamaProvider, createOllamaClient, DEFAULT_OLLAMA_MODEL } from './ollama.js';
