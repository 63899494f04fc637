/**
 * Environment
 *
 * Provider keys and hosts, read from the process environment and an
 * optional .env file. Callers only learn whether a key is present; key
 * values never reach logs or error messages.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

dotenvConfig();

/**
 * Everything is optional here; only the provider in use needs its key.
 */
export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OLLAMA_HOST: z.string().default('http://localhost:11434'),
  // Any server speaking the OpenAI chat/embeddings API (vLLM, LM Studio, OpenRouter)
  OPENAI_COMPATIBLE_API_KEY: z.string().optional(),
  OPENAI_COMPATIBLE_BASE_URL: z.string().optional(),
  OPENAI_COMPATIBLE_MODEL: z.string().optional(),
  /** Overrides the data directory (~/.radv) */
  RADV_HOME: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

type EnvName = keyof typeof EnvSchema.shape;

const ENV_NAMES = Object.keys(EnvSchema.shape).filter(
  (name): name is EnvName => name in EnvSchema.shape
);

/** Parsed once per process; tests reset it with _clearEnvCache() */
let cached: EnvVars | null = null;

/**
 * Parse the provider-related environment. Key presence is only checked
 * when a provider is actually created.
 */
export function loadEnv(): EnvVars {
  if (cached === null) {
    const raw: Partial<Record<EnvName, string>> = {};
    for (const name of ENV_NAMES) {
      // Blank counts as unset, so OLLAMA_HOST="" still gets its default
      const value = process.env[name]?.trim();
      if (value) {
        raw[name] = value;
      }
    }
    cached = EnvSchema.parse(raw);
  }
  return cached;
}

export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Whether the provider's key is set. Never returns or logs the key itself.
 */
export function hasApiKey(provider: 'openai' | 'openai-compatible'): boolean {
  const key = provider === 'openai' ? getEnv('OPENAI_API_KEY') : getEnv('OPENAI_COMPATIBLE_API_KEY');
  return Boolean(key);
}

/**
 * Ollama server root, http://localhost:11434 unless OLLAMA_HOST is set.
 */
export function getOllamaHost(): string {
  return getEnv('OLLAMA_HOST');
}

export interface OpenAICompatibleEnv {
  apiKey: string | undefined;
  baseUrl: string | undefined;
  model: string | undefined;
}

export function getOpenAICompatibleConfig(): OpenAICompatibleEnv {
  const env = loadEnv();
  return {
    apiKey: env.OPENAI_COMPATIBLE_API_KEY,
    baseUrl: env.OPENAI_COMPATIBLE_BASE_URL,
    model: env.OPENAI_COMPATIBLE_MODEL,
  };
}

/**
 * An OpenAI-compatible server needs both a key and a base URL.
 */
export function isOpenAICompatibleConfigured(): boolean {
  const { apiKey, baseUrl } = getOpenAICompatibleConfig();
  return Boolean(apiKey && baseUrl);
}

/**
 * @internal
 */
export function _clearEnvCache(): void {
  cached = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Provider-specific setup instructions, shown when a provider is not ready.
 */
export const SETUP_INSTRUCTIONS: Record<'openai' | 'ollama' | 'openai-compatible', string> = {
  openai: `
To use OpenAI models:

1. Create an API key in your OpenAI account settings
2. Set the environment variable (or add it to a .env file):

   export OPENAI_API_KEY="your-api-key"

3. Restart your terminal
`.trim(),

  ollama: `
To use Ollama (local models):

1. Start the Ollama server:

   ollama serve

2. Pull a chat model and an embedding model:

   ollama pull llama3.1
   ollama pull nomic-embed-text

3. (Optional) Set a custom host:

   export OLLAMA_HOST="http://localhost:11434"
`.trim(),

  'openai-compatible': `
To use an OpenAI-compatible server (vLLM, LM Studio, OpenRouter):

1. Set the environment variables (or add them to a .env file):

   OPENAI_COMPATIBLE_API_KEY="your-api-key"
   OPENAI_COMPATIBLE_BASE_URL="http://localhost:8000/v1"
   OPENAI_COMPATIBLE_MODEL="model-name"

2. Restart your terminal
`.trim(),
};
