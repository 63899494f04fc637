/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create config directory (~/.radv)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import type { ZodIssue } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getRadvDir, getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

type PlainObject = Record<string, unknown>;

/** Settable scalar keys that have no default value */
const OPTIONAL_KEYS = ['retrieval.min_score'];

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTomlTable(value: TOML.AnyJson | undefined): value is TOML.JsonMap {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Ensure the ~/.radv directory exists
 */
function ensureRadvDir(): void {
  const dir = getRadvDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Deep merge two objects, with source values overriding target
 * This handles nested objects properly (unlike Object.assign or spread)
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Validate a merged config, enforcing the cross-field rules.
 */
function validateMerged(merged: PlainObject, hint: string, context: string): Config {
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`${context}:\n${formatIssues(result.error.issues)}`, hint);
  }
  return result.data;
}

/**
 * Parse a TOML config file, mapping syntax errors to ConfigError
 */
function readConfigFile(configPath: string): TOML.JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: radv config reset --force`
    );
  }
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, creates default config on first run
 * @throws ConfigError if config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureRadvDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    // Parsing yields a fresh copy callers may mutate
    return ConfigSchema.parse(DEFAULT_CONFIG);
  }

  const parsed = readConfigFile(configPath);

  // Validate against the partial schema first (allows missing fields)
  const validationResult = PartialConfigSchema.safeParse(parsed);
  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(validationResult.error.issues)}`,
      'Run: radv config reset --force  to restore defaults'
    );
  }

  return validateMerged(
    deepMerge(DEFAULT_CONFIG, validationResult.data),
    `Fix ${configPath} or run: radv config reset --force`,
    'Invalid configuration'
  );
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('embedding.model') => 'text-embedding-3-small'
 */
export function getConfigValue(key: string): unknown {
  const config = loadConfig();
  let current: unknown = config;

  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file after validating the result
 */
export function setConfigValue(key: string, value: string): void {
  const configPath = getConfigPath();
  ensureRadvDir();

  const parts = key.split('.').filter((part) => part.length > 0);
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError(
      'Invalid config key: empty key',
      'Run: radv config list  to see available keys'
    );
  }

  // Unknown keys would be stripped by the schema and never take effect
  if (![...listConfigKeys(DEFAULT_CONFIG), ...OPTIONAL_KEYS].includes(key)) {
    throw new ConfigError(
      `Unknown config key: '${key}'`,
      'Run: radv config list  to see available keys'
    );
  }

  const config: TOML.JsonMap = fs.existsSync(configPath) ? readConfigFile(configPath) : {};

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isTomlTable(next)) {
      current = next;
    } else {
      const table: TOML.JsonMap = {};
      current[part] = table;
      current = table;
    }
  }
  current[lastPart] = parseValue(value);

  validateMerged(
    deepMerge(DEFAULT_CONFIG, config),
    'Run: radv config list  to see current values and types',
    `Invalid value for '${key}'`
  );

  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * Overwrite config.toml with the default template
 */
export function resetConfig(): void {
  ensureRadvDir();
  fs.writeFileSync(getConfigPath(), CONFIG_TEMPLATE, 'utf-8');
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
function parseValue(value: string): boolean | number | string {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

function listConfigKeys(config: PlainObject): string[] {
  return flattenConfig(config).map(([key]) => key);
}

function flattenConfig(obj: PlainObject, prefix = ''): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];
  for (const [key, value] of Object.entries(obj)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(value)) {
      entries.push(...flattenConfig(value, fullKey));
    } else {
      entries.push([fullKey, value]);
    }
  }
  return entries;
}

/**
 * List all config values in a flat format
 * Returns entries like ['default_model', 'gpt-4o-mini']
 */
export function listConfig(): Array<[string, unknown]> {
  return flattenConfig(loadConfig());
}
