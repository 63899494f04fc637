/**
 * Providers Module
 *
 * LLM and embedding access through the OpenAI SDK.
 *
 * MAIN ENTRY POINTS:
 * ```typescript
 * import { createGenerator, createEmbeddingProvider } from './providers/index.js';
 * const { generator } = await createGenerator(config);
 * const embedder = await createEmbeddingProvider(config.embedding);
 * ```
 */

export type {
  ChatMessage,
  ChatRole,
  CompletionOptions,
  EmbedOptions,
  EmbeddingProvider,
  Generator,
  ProviderType,
} from './types.js';

// Validation utilities
export {
  validateProviderKey,
  validateOpenAIKey,
  validateOllamaHostUrl,
  validateOpenAICompatible,
  getOpenAIKey,
  ApiKeySchema,
  HttpUrlSchema,
  type ValidationResult,
} from './validation.js';

// Factories
export {
  createGenerator,
  createProviderClient,
  AllProvidersFailedError,
  type GeneratorResult,
  type GeneratorOptions,
  type FallbackOptions,
  type ProviderAttempt,
} from './llm.js';
export { createEmbeddingProvider, type EmbeddingProviderOptions } from './embedding.js';

// SDK adapters
export {
  createOpenAIClient,
  createOpenAIGenerator,
  createOpenAIEmbedder,
  DEFAULT_OPENAI_MODEL,
  DEFAULT_OPENAI_EMBEDDING_MODEL,
  type OpenAIClientOptions,
} from './openai.js';
export {
  createOllamaClient,
  assertOllamaAvailable,
  DEFAULT_OLLAMA_MODEL,
  DEFAULT_OLLAMA_EMBEDDING_MODEL,
  DEFAULT_OLLAMA_TIMEOUT,
} from './ollama.js';
