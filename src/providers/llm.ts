/**
 * LLM Provider Factory
 *
 * Central entry point for creating the completion provider used by the
 * synthesizer. Dispatches on config.default_provider and walks a fallback
 * chain when the primary can't be created (missing key, bad host URL).
 *
 * USAGE:
 * ```typescript
 * const config = loadConfig();
 * const { provider, name, model } = createLLMProvider(config);
 * const text = await provider.complete({ system, prompt });
 * ```
 */

import type { Config } from '../config/schema.js';
import { CLIError, ExitCode } from '../errors/index.js';
import { createAnthropicProvider, DEFAULT_ANTHROPIC_MODEL } from './anthropic.js';
import { createOpenAIProvider, DEFAULT_OPENAI_MODEL } from './openai.js';
import { createOllamaProvider, DEFAULT_OLLAMA_MODEL } from './ollama.js';
import type { CompletionProvider, ProviderType } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface LLMProviderResult {
  provider: CompletionProvider;
  name: ProviderType;
  model: string;
}

/**
 * Record of a failed provider creation attempt.
 */
export interface ProviderAttempt {
  provider: ProviderType;
  error: Error;
  timestamp: Date;
}

export interface LLMProviderResultWithFallback extends LLMProviderResult {
  /** True if a fallback provider was used instead of the primary */
  usedFallback: boolean;
  /** The provider that was originally requested (from config) */
  requestedProvider: ProviderType;
  /** All failed attempts before success (empty if primary succeeded) */
  failedAttempts: ProviderAttempt[];
}

/**
 * Callbacks for monitoring fallback behavior.
 */
export interface FallbackOptions {
  /** Called when falling back from one provider to another */
  onFallback?: (from: ProviderType, to: ProviderType, reason: string) => void;
  /** Called when a provider attempt fails */
  onProviderFailed?: (provider: ProviderType, error: Error) => void;
  /** If true, fail immediately without trying fallback providers */
  disableFallback?: boolean;
}

export interface LLMProviderOptions {
  /** Override the model from config */
  model?: string;
  fallback?: FallbackOptions;
}

/**
 * Error thrown when all providers in the fallback chain fail.
 *
 * Exits like a missing key, which is almost always the cause.
 */
export class AllProvidersFailedError extends CLIError {
  public readonly name = 'AllProvidersFailedError';

  constructor(
    /** All failed provider attempts in order */
    public readonly attempts: ProviderAttempt[],
    message?: string
  ) {
    const providers = attempts.map((a) => a.provider).join(' -> ');
    super(
      message ?? `All LLM providers failed. Tried: ${providers}`,
      'Set ANTHROPIC_API_KEY or OPENAI_API_KEY, or start Ollama locally',
      ExitCode.Credentials
    );
  }

  /** The most recent failure */
  get lastError(): Error | undefined {
    return this.attempts[this.attempts.length - 1]?.error;
  }
}

// ============================================================================
// FALLBACK CONSTANTS
// ============================================================================

const DEFAULT_FALLBACK_CHAINS: Record<ProviderType, ProviderType[]> = {
  anthropic: ['openai', 'ollama'],
  openai: ['anthropic', 'ollama'],
  ollama: ['anthropic', 'openai'],
};

const DEFAULT_MODELS: Record<ProviderType, string> = {
  anthropic: DEFAULT_ANTHROPIC_MODEL,
  openai: DEFAULT_OPENAI_MODEL,
  ollama: DEFAULT_OLLAMA_MODEL,
};

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function getFallbackChain(config: Config, primary: ProviderType): ProviderType[] {
  const configured = config.llm.fallback_providers;
  return (configured ?? DEFAULT_FALLBACK_CHAINS[primary]).filter((p) => p !== primary);
}

function getFallbackModel(config: Config, provider: ProviderType): string {
  return config.llm.fallback_models?.[provider] ?? DEFAULT_MODELS[provider];
}

function tryCreateProvider(providerType: ProviderType, model: string, timeout: number): LLMProviderResult {
  switch (providerType) {
    case 'anthropic':
      return createAnthropicProvider({ model, timeout });
    case 'openai':
      return createOpenAIProvider({ model, timeout });
    case 'ollama': {
      const { provider, name } = createOllamaProvider({ model, timeout });
      return { provider, name, model };
    }
    default: {
      const _exhaustiveCheck: never = providerType;
      throw new Error(`Unknown provider type: ${String(_exhaustiveCheck)}`);
    }
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Create a completion provider based on configuration with automatic fallback.
 *
 * @throws AllProvidersFailedError if every provider in the chain fails
 *
 * @example
 * ```typescript
 * const { provider, usedFallback, name } = createLLMProvider(config, {
 *   fallback: {
 *     onFallback: (from, to, reason) => ctx.debug(`${from} -> ${to}: ${reason}`),
 *   },
 * });
 * if (usedFallback) ctx.warn(`Using ${name} instead of ${config.default_provider}`);
 * ```
 */
export function createLLMProvider(
  config: Config,
  options: LLMProviderOptions = {}
): LLMProviderResultWithFallback {
  const primaryProvider = config.default_provider;
  const primaryModel = options.model ?? config.default_model;
  const timeout = config.llm.timeout_ms;
  const failedAttempts: ProviderAttempt[] = [];

  try {
    return {
      ...tryCreateProvider(primaryProvider, primaryModel, timeout),
      usedFallback: false,
      requestedProvider: primaryProvider,
      failedAttempts: [],
    };
  } catch (error) {
    const err = toError(error);
    failedAttempts.push({ provider: primaryProvider, error: err, timestamp: new Date() });
    options.fallback?.onProviderFailed?.(primaryProvider, err);
  }

  if (options.fallback?.disableFallback) {
    throw new AllProvidersFailedError(failedAttempts);
  }

  for (const fallbackProvider of getFallbackChain(config, primaryProvider)) {
    const lastError = failedAttempts[failedAttempts.length - 1]?.error;
    options.fallback?.onFallback?.(primaryProvider, fallbackProvider, lastError?.message ?? 'Unknown error');

    try {
      return {
        ...tryCreateProvider(fallbackProvider, getFallbackModel(config, fallbackProvider), timeout),
        usedFallback: true,
        requestedProvider: primaryProvider,
        failedAttempts,
      };
    } catch (error) {
      const err = toError(error);
      failedAttempts.push({ provider: fallbackProvider, error: err, timestamp: new Date() });
      options.fallback?.onProviderFailed?.(fallbackProvider, err);
    }
  }

  throw new AllProvidersFailedError(failedAttempts);
}
