/**
 * API Key Validators
 *
 * Validates provider settings without exposing key values.
 *
 * SECURITY: These functions NEVER log or return the actual key.
 * They only report presence/absence and format validity.
 */

import { z } from 'zod';
import {
  getEnv,
  hasApiKey,
  getOpenAICompatibleConfig,
  SETUP_INSTRUCTIONS,
} from '../config/env.js';
import type { ProviderType } from '../config/schema.js';
import { APIKeyError } from '../errors/index.js';

// ============================================================================
// VALIDATION RESULT TYPE
// ============================================================================

/**
 * Result of validating a provider's settings.
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

/**
 * Keys are opaque tokens; a pasted key with stray whitespace inside is the
 * common mistake worth catching.
 */
export const ApiKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine((key) => !/\s/.test(key), 'API key must not contain whitespace');

/**
 * HTTP(S) URL, used for the Ollama host and OpenAI-compatible base URLs.
 */
export const HttpUrlSchema = z
  .string()
  .url('Invalid URL')
  .refine(
    (url) => url.startsWith('http://') || url.startsWith('https://'),
    'URL must use http:// or https://'
  );

function firstIssue(error: z.ZodError, fallback: string): string {
  return error.issues[0]?.message ?? fallback;
}

// ============================================================================
// VALIDATION FUNCTIONS
// ============================================================================

/**
 * Validate that OPENAI_API_KEY exists and is well-formed.
 */
export function validateOpenAIKey(): ValidationResult {
  const key = getEnv('OPENAI_API_KEY');
  if (!hasApiKey('openai') || key === undefined) {
    return {
      valid: false,
      error: 'OPENAI_API_KEY environment variable is not set',
      setupInstructions: SETUP_INSTRUCTIONS.openai,
    };
  }

  const result = ApiKeySchema.safeParse(key);
  if (!result.success) {
    return {
      valid: false,
      error: firstIssue(result.error, 'Invalid API key format'),
      setupInstructions: SETUP_INSTRUCTIONS.openai,
    };
  }

  return { valid: true };
}

/**
 * Validate a specific Ollama host URL.
 *
 * @example
 * ```typescript
 * const host = options.host ?? getOllamaHost();
 * const validation = validateOllamaHostUrl(host);
 * ```
 */
export function validateOllamaHostUrl(host: string): ValidationResult {
  const result = HttpUrlSchema.safeParse(host);
  if (!result.success) {
    return {
      valid: false,
      error: `Invalid Ollama host: ${firstIssue(result.error, 'Invalid URL')}`,
      setupInstructions: SETUP_INSTRUCTIONS.ollama,
    };
  }
  return { valid: true };
}

/**
 * Validate that the OpenAI-compatible key and base URL are both set.
 */
export function validateOpenAICompatible(): ValidationResult {
  const { apiKey, baseUrl } = getOpenAICompatibleConfig();
  if (!apiKey || !baseUrl) {
    return {
      valid: false,
      error: 'OPENAI_COMPATIBLE_API_KEY and OPENAI_COMPATIBLE_BASE_URL must both be set',
      setupInstructions: SETUP_INSTRUCTIONS['openai-compatible'],
    };
  }

  const keyResult = ApiKeySchema.safeParse(apiKey);
  if (!keyResult.success) {
    return {
      valid: false,
      error: firstIssue(keyResult.error, 'Invalid API key format'),
      setupInstructions: SETUP_INSTRUCTIONS['openai-compatible'],
    };
  }

  const urlResult = HttpUrlSchema.safeParse(baseUrl);
  if (!urlResult.success) {
    return {
      valid: false,
      error: `Invalid OPENAI_COMPATIBLE_BASE_URL: ${firstIssue(urlResult.error, 'Invalid URL')}`,
      setupInstructions: SETUP_INSTRUCTIONS['openai-compatible'],
    };
  }

  return { valid: true };
}

/**
 * Validate the settings for a given provider.
 * Call this before creating a client.
 *
 * @example
 * ```typescript
 * const result = validateProviderKey(config.default_provider);
 * if (!result.valid) {
 *   ctx.error(result.error);
 *   ctx.log(result.setupInstructions);
 *   return;
 * }
 * ```
 */
export function validateProviderKey(provider: ProviderType): ValidationResult {
  switch (provider) {
    case 'openai':
      return validateOpenAIKey();
    case 'ollama':
      return validateOllamaHostUrl(getEnv('OLLAMA_HOST'));
    case 'openai-compatible':
      return validateOpenAICompatible();
  }
}

// ============================================================================
// SECURE KEY ACCESS
// ============================================================================

/**
 * Get the OpenAI API key AFTER validation.
 *
 * This is the ONLY function that returns the actual key value.
 * Use it only when passing to an API client, never for logging.
 *
 * @throws APIKeyError if the key is missing or malformed
 */
export function getOpenAIKey(): string {
  const validation = validateOpenAIKey();
  const key = getEnv('OPENAI_API_KEY');
  if (!validation.valid || key === undefined) {
    throw new APIKeyError('OpenAI', 'OPENAI_API_KEY');
  }
  return key;
}
