/**
 * Embedding Provider Factory
 *
 * Creates the EmbeddingProvider from the [embedding] config section.
 * No fallback chain: vectors from two different models cannot share one
 * index.
 */

import type { Config } from '../config/schema.js';
import { createProviderClient } from './llm.js';
import { createOpenAIEmbedder } from './openai.js';
import type { EmbeddingProvider } from './types.js';

export interface EmbeddingProviderOptions {
  /** Skip the Ollama reachability probe */
  skipAvailabilityCheck?: boolean;
}

/**
 * @example
 * ```typescript
 * const embedder = await createEmbeddingProvider(config.embedding);
 * const vector = await embedder.embed('quiet blender');
 * ```
 */
export async function createEmbeddingProvider(
  embedding: Config['embedding'],
  options: EmbeddingProviderOptions = {}
): Promise<EmbeddingProvider> {
  const client = await createProviderClient(embedding.provider, {
    timeout: embedding.timeout_ms,
    skipAvailabilityCheck: options.skipAvailabilityCheck,
  });
  return createOpenAIEmbedder(client, embedding.provider, embedding.model);
}
