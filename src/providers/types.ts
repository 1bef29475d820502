/**
 * Provider Types
 *
 * The narrow completion interface the synthesizer depends on. Tests supply
 * a fake; production code gets one from createLLMProvider().
 */

/**
 * One request to a language model.
 */
export interface CompletionRequest {
  /** System instructions */
  system: string;
  /** Evidence context followed by the user question */
  prompt: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * A language model that turns a prompt into text.
 */
export interface CompletionProvider {
  readonly name: string;
  readonly model: string;
  complete(request: CompletionRequest): Promise<string>;
}

/** Supported LLM provider types */
export type ProviderType = 'anthropic' | 'openai' | 'ollama';

/** Defaults applied when a request leaves them out */
export const DEFAULT_MAX_TOKENS = 2048;
export const DEFAULT_TEMPERATURE = 0.2;
