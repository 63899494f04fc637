/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `radv config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  ProviderTypeSchema,
  EmbeddingConfigSchema,
  RetrievalConfigSchema,
  GenerationConfigSchema,
  ConversationConfigSchema,
  IngestConfigSchema,
} from './schema.js';
export type { Config, PartialConfig, ProviderType } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  resetConfig,
  listConfig,
} from './loader.js';

// Paths
export { getRadvDir, getDbPath, getConfigPath, DB_FILENAME, CONFIG_FILENAME } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  hasApiKey,
  getOllamaHost,
  getOpenAICompatibleConfig,
  isOpenAICompatibleConfigured,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';

// Startup validation
export {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  COMMANDS_REQUIRING_LLM,
  COMMANDS_REQUIRING_EMBEDDING,
} from './startup-validation.js';
export type {
  StartupValidationResult,
  StartupValidationOptions,
} from './startup-validation.js';
