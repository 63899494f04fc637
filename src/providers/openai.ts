/**
 * OpenAI SDK adapters
 *
 * Every provider kind (OpenAI, Ollama, OpenAI-compatible servers) speaks the
 * OpenAI chat and embeddings API, so one client type backs both the
 * Generator and the EmbeddingProvider.
 *
 * SECURITY: API keys are read only after validation passes and are never
 * included in error messages.
 */

import OpenAI from 'openai';
import {
  EmbeddingUnavailableError,
  GenerationUnavailableError,
} from '../errors/index.js';
import { getOpenAIKey } from './validation.js';
import type {
  ChatMessage,
  CompletionOptions,
  EmbedOptions,
  EmbeddingProvider,
  Generator,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Options for creating an OpenAI client.
 */
export interface OpenAIClientOptions {
  /**
   * Explicit API key. If omitted, OPENAI_API_KEY is validated and used.
   */
  apiKey?: string;

  /**
   * Custom base URL (Ollama's /v1 endpoint, vLLM, OpenRouter, ...).
   */
  baseURL?: string;

  /**
   * Request timeout in milliseconds.
   * @default 60000
   */
  timeout?: number;

  /**
   * Maximum number of retries for failed requests (handled by the SDK).
   * @default 2
   */
  maxRetries?: number;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';
export const DEFAULT_OPENAI_EMBEDDING_MODEL = 'text-embedding-3-small';

// ============================================================================
// CLIENT
// ============================================================================

/**
 * Create an OpenAI SDK client.
 *
 * @throws APIKeyError if no key is given and OPENAI_API_KEY is not usable
 */
export function createOpenAIClient(options: OpenAIClientOptions = {}): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey ?? getOpenAIKey(),
    baseURL: options.baseURL,
    timeout: options.timeout ?? 60000,
    maxRetries: options.maxRetries ?? 2,
  });
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toMessageParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

// ============================================================================
// GENERATOR
// ============================================================================

/**
 * Wrap a client as a Generator. A plain string prompt is sent as a single
 * user message.
 */
export function createOpenAIGenerator(client: OpenAI, name: string, model: string): Generator {
  return {
    name,
    model,
    async complete(prompt: string | ChatMessage[], options: CompletionOptions = {}): Promise<string> {
      const messages: ChatMessage[] =
        typeof prompt === 'string' ? [{ role: 'user', content: prompt }] : prompt;

      let content: string | null | undefined;
      try {
        const completion = await client.chat.completions.create(
          {
            model,
            messages: messages.map(toMessageParam),
            max_tokens: options.maxTokens,
            temperature: options.temperature,
          },
          { signal: options.signal }
        );
        content = completion.choices[0]?.message.content;
      } catch (error) {
        throw new GenerationUnavailableError(
          `${name} completion failed: ${describeError(error)}`,
          error instanceof Error ? error : undefined
        );
      }

      const text = content?.trim();
      if (!text) {
        throw new GenerationUnavailableError(`${name} returned an empty completion`);
      }
      return text;
    },
  };
}

// ============================================================================
// EMBEDDINGS
// ============================================================================

/**
 * Wrap a client as an EmbeddingProvider.
 */
export function createOpenAIEmbedder(
  client: OpenAI,
  name: string,
  model: string
): EmbeddingProvider {
  async function request(texts: string[], options: EmbedOptions) {
    try {
      const response = await client.embeddings.create(
        { model, input: texts },
        { signal: options.signal }
      );
      return response.data;
    } catch (error) {
      throw new EmbeddingUnavailableError(
        `${name} embedding request failed: ${describeError(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  async function embedBatch(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const data = await request(texts, options);
    if (data.length !== texts.length) {
      throw new EmbeddingUnavailableError(
        `${name} returned ${data.length} embeddings for ${texts.length} inputs`
      );
    }

    // The API reports each vector's input position; don't rely on array order
    return [...data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }

  return {
    name,
    model,
    embedBatch,
    async embed(text: string, options?: EmbedOptions): Promise<number[]> {
      const [vector] = await embedBatch([text], options);
      if (!vector) {
        throw new EmbeddingUnavailableError(`${name} returned no embedding`);
      }
      return vector;
    },
  };
}
