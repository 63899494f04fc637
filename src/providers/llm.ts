/**
 * LLM Provider Factory
 *
 * Central entry point for creating the Generator from configuration.
 * Dispatches on config.default_provider and, when that provider cannot be
 * set up (missing key, server down), walks a fallback chain.
 *
 * USAGE:
 * ```typescript
 * const config = loadConfig();
 * const { generator, name, model, usedFallback } = await createGenerator(config);
 * const answer = await generator.complete('Which kettle boils fastest?');
 * ```
 *
 * Fallback happens at creation time only. A generator that fails mid-turn
 * is reported to the orchestrator, which answers with its fallback text.
 */

import type OpenAI from 'openai';
import type { Config, ProviderType } from '../config/schema.js';
import { getOpenAICompatibleConfig, isOpenAICompatibleConfigured } from '../config/env.js';
import { APIKeyError, GenerationUnavailableError } from '../errors/index.js';
import { createOpenAIClient, createOpenAIGenerator, DEFAULT_OPENAI_MODEL } from './openai.js';
import { createOllamaClient, assertOllamaAvailable, DEFAULT_OLLAMA_MODEL } from './ollama.js';
import { validateOpenAICompatible } from './validation.js';
import type { Generator } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Result of creating a generator.
 */
export interface GeneratorResult {
  generator: Generator;
  /** Provider name for identification in logs */
  name: ProviderType;
  model: string;
  /** True if a fallback provider was used instead of the primary */
  usedFallback: boolean;
  /** The provider that was originally requested (from config) */
  requestedProvider: ProviderType;
  /** All failed attempts before success (empty if primary succeeded) */
  failedAttempts: ProviderAttempt[];
}

/**
 * Record of a failed provider creation attempt.
 */
export interface ProviderAttempt {
  provider: ProviderType;
  error: Error;
  timestamp: Date;
}

/**
 * Callbacks for monitoring fallback behavior.
 */
export interface FallbackOptions {
  /** Called when falling back from one provider to another */
  onFallback?: (from: ProviderType, to: ProviderType, reason: string) => void;
  /** Called when a provider attempt fails */
  onProviderFailed?: (provider: ProviderType, error: Error) => void;
  /** If true, fail immediately without trying fallback providers */
  disableFallback?: boolean;
}

export interface GeneratorOptions {
  /** Override config.default_model for the primary provider */
  model?: string;
  /**
   * Skip the Ollama reachability probe.
   * @default false
   */
  skipAvailabilityCheck?: boolean;
  fallback?: FallbackOptions;
}

/**
 * Thrown when every provider in the chain failed to initialize.
 */
export class AllProvidersFailedError extends GenerationUnavailableError {
  public readonly attempts: ProviderAttempt[];

  constructor(attempts: ProviderAttempt[]) {
    const providers = attempts.map((a) => a.provider).join(' -> ');
    super(`All LLM providers failed. Tried: ${providers}`, attempts[attempts.length - 1]?.error);
    this.name = 'AllProvidersFailedError';
    this.attempts = attempts;
  }
}

// ============================================================================
// CLIENTS
// ============================================================================

/**
 * Settings shared by generator and embedding clients.
 */
export interface ProviderClientOptions {
  timeout?: number;
  maxRetries?: number;
  skipAvailabilityCheck?: boolean;
}

/**
 * Build an SDK client for any provider kind.
 *
 * @throws APIKeyError / ConfigError when settings are missing
 * @throws GenerationUnavailableError when Ollama does not answer
 */
export async function createProviderClient(
  provider: ProviderType,
  options: ProviderClientOptions = {}
): Promise<OpenAI> {
  switch (provider) {
    case 'openai':
      return createOpenAIClient({ timeout: options.timeout, maxRetries: options.maxRetries });

    case 'ollama': {
      const { client, host } = createOllamaClient({
        timeout: options.timeout,
        maxRetries: options.maxRetries,
      });
      if (!options.skipAvailabilityCheck) {
        await assertOllamaAvailable(client, host);
      }
      return client;
    }

    case 'openai-compatible': {
      const validation = validateOpenAICompatible();
      const { apiKey, baseUrl } = getOpenAICompatibleConfig();
      if (!validation.valid || !apiKey || !baseUrl) {
        throw new APIKeyError('OpenAI-compatible', 'OPENAI_COMPATIBLE_API_KEY');
      }
      return createOpenAIClient({
        apiKey,
        baseURL: baseUrl,
        timeout: options.timeout,
        maxRetries: options.maxRetries,
      });
    }
  }
}

// ============================================================================
// FALLBACK CHAIN
// ============================================================================

/**
 * Default fallback chain for a provider.
 * An OpenAI-compatible server configured via env goes first.
 */
function getDefaultFallbackChain(primary: ProviderType): ProviderType[] {
  const baseChains: Record<ProviderType, ProviderType[]> = {
    openai: ['ollama'],
    ollama: ['openai'],
    'openai-compatible': ['openai', 'ollama'],
  };

  const chain = baseChains[primary];
  if (isOpenAICompatibleConfigured() && primary !== 'openai-compatible') {
    return ['openai-compatible', ...chain];
  }
  return chain;
}

function getFallbackChain(config: Config, primary: ProviderType): ProviderType[] {
  if (config.llm?.fallback_providers) {
    return config.llm.fallback_providers.filter((p) => p !== primary);
  }
  return getDefaultFallbackChain(primary);
}

function getFallbackModel(config: Config, provider: ProviderType): string {
  const configured = config.llm?.fallback_models?.[provider];
  if (configured) {
    return configured;
  }
  switch (provider) {
    case 'openai':
      return DEFAULT_OPENAI_MODEL;
    case 'ollama':
      return DEFAULT_OLLAMA_MODEL;
    case 'openai-compatible':
      return getOpenAICompatibleConfig().model ?? DEFAULT_OPENAI_MODEL;
  }
}

async function tryCreateGenerator(
  config: Config,
  provider: ProviderType,
  model: string,
  options: GeneratorOptions
): Promise<Generator> {
  const client = await createProviderClient(provider, {
    timeout: config.generation.timeout_ms,
    maxRetries: config.generation.max_retries,
    skipAvailabilityCheck: options.skipAvailabilityCheck,
  });
  return createOpenAIGenerator(client, provider, model);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Create the Generator described by config, falling back through
 * llm.fallback_providers (or the default chain) if the primary fails.
 *
 * @throws AllProvidersFailedError if no provider could be created
 */
export async function createGenerator(
  config: Config,
  options: GeneratorOptions = {}
): Promise<GeneratorResult> {
  const primaryProvider = config.default_provider;
  const primaryModel = options.model ?? config.default_model;
  const failedAttempts: ProviderAttempt[] = [];

  try {
    const generator = await tryCreateGenerator(config, primaryProvider, primaryModel, options);
    return {
      generator,
      name: primaryProvider,
      model: primaryModel,
      usedFallback: false,
      requestedProvider: primaryProvider,
      failedAttempts: [],
    };
  } catch (error) {
    const err = toError(error);
    failedAttempts.push({ provider: primaryProvider, error: err, timestamp: new Date() });
    options.fallback?.onProviderFailed?.(primaryProvider, err);
  }

  if (options.fallback?.disableFallback) {
    throw new AllProvidersFailedError(failedAttempts);
  }

  for (const fallbackProvider of getFallbackChain(config, primaryProvider)) {
    const fallbackModel = getFallbackModel(config, fallbackProvider);
    const lastError = failedAttempts[failedAttempts.length - 1]?.error;
    options.fallback?.onFallback?.(
      primaryProvider,
      fallbackProvider,
      lastError?.message ?? 'Unknown error'
    );

    try {
      const generator = await tryCreateGenerator(config, fallbackProvider, fallbackModel, options);
      return {
        generator,
        name: fallbackProvider,
        model: fallbackModel,
        usedFallback: true,
        requestedProvider: primaryProvider,
        failedAttempts,
      };
    } catch (error) {
      const err = toError(error);
      failedAttempts.push({ provider: fallbackProvider, error: err, timestamp: new Date() });
      options.fallback?.onProviderFailed?.(fallbackProvider, err);
    }
  }

  throw new AllProvidersFailedError(failedAttempts);
}
