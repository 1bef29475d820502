/**
 * API Key Validators
 *
 * Validates credential format without exposing key values.
 *
 * SECURITY: These functions NEVER log or return the actual key, except
 * getServiceKey(), which hands it to an API client after validation.
 */

import { z } from 'zod';
import { getApiKey, getOllamaHost, SETUP_INSTRUCTIONS, type KeyedService } from '../config/env.js';
import { APIKeyError } from '../errors/index.js';

// ============================================================================
// VALIDATION RESULT TYPE
// ============================================================================

/**
 * Result of validating a provider's credentials.
 *
 * When valid: { valid: true }
 * When invalid: { valid: false, error: string, setupInstructions: string }
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; setupInstructions: string };

// ============================================================================
// FORMAT VALIDATORS (Zod schemas)
// ============================================================================

/** Anthropic keys share the "sk-ant-" prefix across versions */
export const AnthropicKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine((key) => key.startsWith('sk-ant-'), 'Invalid Anthropic API key format (should start with "sk-ant-")');

/** OpenAI legacy, project and service-account keys all start with "sk-" */
export const OpenAIKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine((key) => key.startsWith('sk-'), 'Invalid OpenAI API key format (should start with "sk-")');

/** Tavily keys start with "tvly-" */
export const TavilyKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine((key) => key.startsWith('tvly-'), 'Invalid Tavily API key format (should start with "tvly-")');

/**
 * Ollama host URL format validation.
 */
export const OllamaHostSchema = z
  .string()
  .url('Invalid Ollama host URL')
  .refine(
    (url) => url.startsWith('http://') || url.startsWith('https://'),
    'Ollama host must be an HTTP(S) URL'
  );

const KEY_SCHEMAS: Record<KeyedService, z.ZodType<string>> = {
  anthropic: AnthropicKeySchema,
  openai: OpenAIKeySchema,
  tavily: TavilyKeySchema,
};

const ENV_VARS: Record<KeyedService, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  tavily: 'TAVILY_API_KEY',
};

// ============================================================================
// VALIDATION FUNCTIONS
// ============================================================================

/**
 * Validate that a service key exists and has the expected format.
 *
 * @example
 * ```typescript
 * const result = validateServiceKey('tavily');
 * if (!result.valid) {
 *   ctx.warn(result.error);
 * }
 * ```
 */
export function validateServiceKey(service: KeyedService): ValidationResult {
  const key = getApiKey(service);
  if (key === undefined) {
    return {
      valid: false,
      error: `${ENV_VARS[service]} environment variable is not set`,
      setupInstructions: SETUP_INSTRUCTIONS[service],
    };
  }

  const result = KEY_SCHEMAS[service].safeParse(key);
  if (!result.success) {
    return {
      valid: false,
      error: result.error.issues[0]?.message ?? 'Invalid API key format',
      setupInstructions: SETUP_INSTRUCTIONS[service],
    };
  }

  return { valid: true };
}

/**
 * Validate a specific Ollama host URL.
 */
export function validateOllamaHostUrl(host: string): ValidationResult {
  const result = OllamaHostSchema.safeParse(host);

  if (!result.success) {
    return {
      valid: false,
      error: result.error.issues[0]?.message ?? 'Invalid Ollama host URL',
      setupInstructions: SETUP_INSTRUCTIONS.ollama,
    };
  }

  return { valid: true };
}

/**
 * Validate the credentials for an LLM provider.
 */
export function validateProviderKey(provider: 'anthropic' | 'openai' | 'ollama'): ValidationResult {
  return provider === 'ollama' ? validateOllamaHostUrl(getOllamaHost()) : validateServiceKey(provider);
}

// ============================================================================
// SECURE KEY ACCESS
// ============================================================================

/**
 * Get a service key AFTER validation.
 * Use it only when passing to an API client, never for logging.
 *
 * @throws APIKeyError if the key is missing or malformed
 */
export function getServiceKey(service: KeyedService): string {
  const key = getApiKey(service);
  const validation = validateServiceKey(service);
  if (key === undefined || !validation.valid) {
    throw new APIKeyError(service.charAt(0).toUpperCase() + service.slice(1), ENV_VARS[service]);
  }
  return key;
}
