/**
 * Ollama (local models)
 *
 * Ollama serves an OpenAI-compatible API under /v1, so it is reached with
 * the same SDK client as OpenAI.
 *
 * KEY DIFFERENCES FROM CLOUD PROVIDERS:
 * - No API key required (the SDK needs a placeholder)
 * - The server may simply not be running; availability is checked up front
 */

import type OpenAI from 'openai';
import { getOllamaHost } from '../config/env.js';
import { ConfigError, GenerationUnavailableError } from '../errors/index.js';
import { createOpenAIClient } from './openai.js';
import { validateOllamaHostUrl } from './validation.js';

export const DEFAULT_OLLAMA_MODEL = 'llama3.1';
export const DEFAULT_OLLAMA_EMBEDDING_MODEL = 'nomic-embed-text';

/** Local models can be slow on first load */
export const DEFAULT_OLLAMA_TIMEOUT = 120000;

export interface OllamaClientOptions {
  /**
   * Ollama server host URL.
   * @default OLLAMA_HOST, or http://localhost:11434
   */
  host?: string;
  timeout?: number;
  maxRetries?: number;
}

/**
 * Resolve the host and build a client for its /v1 endpoint.
 *
 * @throws ConfigError if the host is not an HTTP(S) URL
 */
export function createOllamaClient(options: OllamaClientOptions = {}): {
  client: OpenAI;
  host: string;
} {
  const host = (options.host ?? getOllamaHost()).replace(/\/+$/, '');
  const validation = validateOllamaHostUrl(host);
  if (!validation.valid) {
    throw new ConfigError(validation.error, validation.setupInstructions);
  }

  const client = createOpenAIClient({
    apiKey: 'ollama',
    baseURL: `${host}/v1`,
    timeout: options.timeout ?? DEFAULT_OLLAMA_TIMEOUT,
    maxRetries: options.maxRetries,
  });
  return { client, host };
}

/**
 * Check that the Ollama server answers.
 *
 * @throws GenerationUnavailableError if the server is unreachable
 */
export async function assertOllamaAvailable(client: OpenAI, host: string): Promise<void> {
  try {
    await client.models.list();
  } catch (error) {
    throw new GenerationUnavailableError(
      `Ollama is not reachable at ${host}. Is "ollama serve" running?`,
      error instanceof Error ? error : undefined
    );
  }
}
