/**
 * Startup Configuration Validation
 *
 * Checks API keys before a command runs, so a missing key shows up as a
 * warning up front instead of a failure halfway through an answer.
 *
 * IMPORTANT: Missing LLM and Tavily keys are WARNINGS, not errors.
 * Without Tavily the agent answers from the filing alone; without the
 * primary LLM key the provider fallback chain may still find a model.
 * Only an embedding provider that can't be created is an error, because
 * nothing can be indexed or searched without it.
 */

import chalk from 'chalk';
import type { Config } from './schema.js';
import { loadConfig } from './loader.js';
import { validateProviderKey, validateServiceKey } from '../providers/validation.js';
import { SETUP_INSTRUCTIONS } from './env.js';

// ============================================================================
// Types
// ============================================================================

export interface StartupValidationResult {
  /** Whether the command can run */
  valid: boolean;
  /** Non-fatal issues (degraded answers) */
  warnings: string[];
  /** Issues that stop the command */
  errors: string[];
  /** Setup instructions for the issues above */
  hints: string[];
}

export interface StartupValidationOptions {
  /** Skip the LLM key check (commands that don't synthesize answers) */
  skipLLM?: boolean;
  /** Skip the Tavily key check (commands that don't search the web) */
  skipWebSearch?: boolean;
  /** Skip the embedding key check (commands that don't embed) */
  skipEmbedding?: boolean;
  /** Use this config instead of loading one */
  config?: Config;
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate keys for the configured providers.
 *
 * @example
 * const result = validateStartupConfig({ skipWebSearch: true });
 * if (!result.valid) {
 *   printStartupValidation(result);
 * }
 */
export function validateStartupConfig(options: StartupValidationOptions = {}): StartupValidationResult {
  const warnings: string[] = [];
  const errors: string[] = [];
  const hints: string[] = [];

  // An unreadable config file is reported by the command itself
  const config = options.config ?? loadConfig(false);

  if (!options.skipLLM) {
    const provider = config.default_provider;
    const validation = validateProviderKey(provider);
    if (!validation.valid) {
      const label = provider.charAt(0).toUpperCase() + provider.slice(1);
      warnings.push(`${label} is not usable (${validation.error}); fallback providers will be tried`);
      hints.push(validation.setupInstructions);
    }
  }

  if (!options.skipWebSearch) {
    const validation = validateServiceKey('tavily');
    if (!validation.valid) {
      warnings.push(`Live web search is unavailable (${validation.error}); answers will use the 10-K filing only`);
      hints.push(SETUP_INSTRUCTIONS.tavily);
    }
  }

  if (!options.skipEmbedding && config.embedding.provider === 'openai') {
    const validation = validateServiceKey('openai');
    if (!validation.valid) {
      errors.push(`OpenAI embedding provider configured but its key is not usable: ${validation.error}`);
      hints.push(validation.setupInstructions);
    }
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
    hints,
  };
}

/**
 * Print startup validation results to stderr.
 *
 * @param verbose - Also print setup instructions for warnings
 */
export function printStartupValidation(result: StartupValidationResult, verbose = false): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }

  for (const warning of result.warnings) {
    console.error(chalk.yellow(`⚠ ${warning}`));
  }

  if (result.errors.length > 0 || verbose) {
    for (const hint of result.hints) {
      console.error(chalk.dim(hint.replace(/^/gm, '  ')));
    }
  }
}

/** Commands that synthesize answers */
export const COMMANDS_REQUIRING_LLM = ['ask', 'chat'];

/** Commands that may search the web */
export const COMMANDS_REQUIRING_WEB_SEARCH = ['ask', 'chat'];

/** Commands that embed text */
export const COMMANDS_REQUIRING_EMBEDDING = ['index', 'ask', 'chat', 'search'];

/**
 * Which checks a command needs.
 */
export function getValidationOptionsForCommand(command: string): StartupValidationOptions {
  return {
    skipLLM: !COMMANDS_REQUIRING_LLM.includes(command),
    skipWebSearch: !COMMANDS_REQUIRING_WEB_SEARCH.includes(command),
    skipEmbedding: !COMMANDS_REQUIRING_EMBEDDING.includes(command),
  };
}
