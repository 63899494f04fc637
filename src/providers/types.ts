/**
 * Provider contracts
 *
 * The rest of the codebase talks to LLMs and embedding models only through
 * these two interfaces, so tests can swap in in-process fakes.
 */

import type { ProviderType } from '../config/schema.js';

export type { ProviderType };

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

/**
 * Hosted LLM. Implementations throw GenerationUnavailableError on any
 * failure, including an empty completion.
 */
export interface Generator {
  readonly name: string;
  readonly model: string;
  complete(prompt: string | ChatMessage[], options?: CompletionOptions): Promise<string>;
}

export interface EmbedOptions {
  signal?: AbortSignal;
}

/**
 * Text embedding model. Implementations throw EmbeddingUnavailableError on
 * any failure. embedBatch returns one vector per input, in input order.
 */
export interface EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  embed(text: string, options?: EmbedOptions): Promise<number[]>;
  embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]>;
}
