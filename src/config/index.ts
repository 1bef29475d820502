/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `fra config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  EmbeddingConfigSchema,
  SearchConfigSchema,
  WebSearchConfigSchema,
  RoutingConfigSchema,
} from './schema.js';
export type { Config, PartialConfig, LLMProviderType, EmbeddingProviderType } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export { loadConfig, validateConfig, getConfigValue, setConfigValue, unsetConfigValue, listConfig, isConfigKey } from './loader.js';

// Paths
export { getAppDir, getDbPath, getConfigPath } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  hasApiKey,
  getApiKey,
  getOllamaHost,
  maskSecret,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars, KeyedService } from './env.js';

// Startup validation
export {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  COMMANDS_REQUIRING_LLM,
  COMMANDS_REQUIRING_WEB_SEARCH,
  COMMANDS_REQUIRING_EMBEDDING,
} from './startup-validation.js';
export type { StartupValidationResult, StartupValidationOptions } from './startup-validation.js';
