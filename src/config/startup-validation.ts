/**
 * Startup Configuration Validation
 *
 * Checks provider settings before a command that needs them runs, so a
 * missing key is reported up front instead of halfway through an ingest.
 *
 * This is a WARNING system, not a hard block: `radv status` and
 * `radv config` work without any keys.
 */

import chalk from 'chalk';
import { loadConfig } from './loader.js';
import { DEFAULT_CONFIG } from './defaults.js';
import type { Config, ProviderType } from './schema.js';
import { validateProviderKey } from '../providers/validation.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of startup validation.
 */
export interface StartupValidationResult {
  /** Whether all required providers are usable */
  valid: boolean;
  /** Non-fatal issues */
  warnings: string[];
  /** Issues that will make the command fail */
  errors: string[];
  /** Setup instructions matching `errors` */
  hints: string[];
}

export interface StartupValidationOptions {
  /** Skip LLM provider validation (for commands that don't generate) */
  skipLLM?: boolean;
  /** Skip embedding provider validation (for commands that don't embed) */
  skipEmbedding?: boolean;
}

// ============================================================================
// Validation
// ============================================================================

const PROVIDER_LABELS: Record<ProviderType, string> = {
  openai: 'OpenAI',
  ollama: 'Ollama',
  'openai-compatible': 'OpenAI-compatible',
};

/**
 * Validate configuration at CLI startup.
 *
 * Returns warnings/errors rather than throwing to allow partial functionality.
 *
 * @example
 * const result = validateStartupConfig(getValidationOptionsForCommand('ask'));
 * printStartupValidation(result);
 */
export function validateStartupConfig(
  options: StartupValidationOptions = {}
): StartupValidationResult {
  const { skipLLM = false, skipEmbedding = false } = options;
  const warnings: string[] = [];
  const errors: string[] = [];
  const hints: string[] = [];

  let config: Config;
  try {
    config = loadConfig(false);
  } catch (error) {
    warnings.push(
      `Config file could not be loaded, using defaults: ${error instanceof Error ? error.message : String(error)}`
    );
    config = DEFAULT_CONFIG;
  }

  const checks: Array<{ role: string; provider: ProviderType }> = [];
  if (!skipLLM) {
    checks.push({ role: 'LLM', provider: config.default_provider });
  }
  if (!skipEmbedding) {
    checks.push({ role: 'Embedding', provider: config.embedding.provider });
  }

  const seen = new Set<ProviderType>();
  for (const { role, provider } of checks) {
    if (seen.has(provider)) {
      continue;
    }
    seen.add(provider);

    const validation = validateProviderKey(provider);
    if (!validation.valid) {
      errors.push(`${role} provider ${PROVIDER_LABELS[provider]}: ${validation.error}`);
      hints.push(validation.setupInstructions);
    }
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
    hints,
  };
}

/**
 * Print startup validation warnings/errors to stderr.
 *
 * @param verbose - Whether to show warnings too (default: only errors)
 */
export function printStartupValidation(
  result: StartupValidationResult,
  verbose = false
): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }

  for (const hint of result.hints) {
    console.error(chalk.dim(`  ${hint}`));
  }

  if (verbose) {
    for (const warning of result.warnings) {
      console.warn(chalk.yellow(`⚠ ${warning}`));
    }
  }
}

/**
 * Commands that call the LLM.
 */
export const COMMANDS_REQUIRING_LLM = ['ask', 'chat'];

/**
 * Commands that call the embedding provider.
 */
export const COMMANDS_REQUIRING_EMBEDDING = ['ingest', 'search', 'ask', 'chat'];

/**
 * Validation options for a command name (e.g. 'ask', 'status').
 */
export function getValidationOptionsForCommand(command: string): StartupValidationOptions {
  return {
    skipLLM: !COMMANDS_REQUIRING_LLM.includes(command),
    skipEmbedding: !COMMANDS_REQUIRING_EMBEDDING.includes(command),
  };
}
