/**
 * Configuration Schema
 *
 * Defines the shape of ~/.radv/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Provider kinds reachable through the OpenAI SDK
 */
export const ProviderTypeSchema = z.enum(['openai', 'ollama', 'openai-compatible']);
export type ProviderType = z.infer<typeof ProviderTypeSchema>;

/**
 * Embedding provider configuration
 */
export const EmbeddingConfigSchema = z.object({
  provider: ProviderTypeSchema.describe('Embedding provider'),
  model: z.string().min(1).describe('Embedding model name'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(2048)
    .default(64)
    .describe('Number of reviews to embed per request (1-2048, default 64)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .default(60000)
    .describe('Timeout in milliseconds for one embedding request (1000-600000)'),
});

/**
 * Retrieval configuration
 */
export const RetrievalConfigSchema = z.object({
  top_k: z.number().int().min(1).max(50).describe('Number of reviews retrieved per turn'),
  min_score: z
    .number()
    .min(-1)
    .max(1)
    .optional()
    .describe('Drop passages whose cosine similarity is below this value'),
});

/**
 * Generation (LLM call) configuration
 */
export const GenerationConfigSchema = z.object({
  max_tokens: z.number().int().min(1).max(32000).describe('Maximum tokens per answer'),
  temperature: z.number().min(0).max(2).describe('Sampling temperature'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Client-side timeout per completion request'),
  max_retries: z
    .number()
    .int()
    .min(0)
    .max(10)
    .describe('Client-side retries per completion request'),
});

/**
 * Conversation memory configuration
 */
export const ConversationConfigSchema = z.object({
  summarize_threshold: z
    .number()
    .int()
    .min(2)
    .describe('Verbatim message count that triggers summarization'),
  retain_tail: z
    .number()
    .int()
    .min(0)
    .describe('Most recent messages kept verbatim after summarizing'),
  summary_max_tokens: z.number().int().min(16).max(4096).describe('Maximum tokens per summary'),
  max_threads: z.number().int().min(1).describe('Threads kept in memory before LRU eviction'),
  idle_ttl_minutes: z
    .number()
    .min(1)
    .describe('Idle minutes after which a thread is evicted'),
});

/**
 * Review ingestion configuration
 */
export const IngestConfigSchema = z.object({
  title_field: z.string().min(1).describe('CSV column holding the product title'),
  review_field: z.string().min(1).describe('CSV column holding the review text'),
  on_malformed: z
    .enum(['reject', 'skip'])
    .describe('reject: fail the whole run; skip: drop bad rows with a warning'),
});

/**
 * LLM configuration with fallback support
 * This section is optional - defaults work without it
 */
export const LLMConfigSchema = z.object({
  /** Fallback providers in order of preference (omit to use defaults) */
  fallback_providers: z
    .array(ProviderTypeSchema)
    .optional()
    .describe('Fallback providers if the primary is not configured (e.g., ["ollama"])'),
  /** Model to use per fallback provider (uses defaults if omitted) */
  fallback_models: z
    .record(ProviderTypeSchema, z.string())
    .optional()
    .describe('Model to use per fallback provider (e.g., { ollama = "llama3.1" })'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z
  .object({
    default_model: z.string().min(1).describe('Chat model used to answer'),
    default_provider: ProviderTypeSchema.describe('LLM provider to use'),
    embedding: EmbeddingConfigSchema,
    retrieval: RetrievalConfigSchema,
    generation: GenerationConfigSchema,
    conversation: ConversationConfigSchema,
    ingest: IngestConfigSchema,
    /** Optional LLM fallback configuration */
    llm: LLMConfigSchema.optional(),
  })
  .superRefine((config, ctx) => {
    if (config.conversation.retain_tail >= config.conversation.summarize_threshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['conversation', 'retain_tail'],
        message: `retain_tail (${config.conversation.retain_tail}) must be less than summarize_threshold (${config.conversation.summarize_threshold})`,
      });
    }
  });

/**
 * TypeScript type inferred from the schema
 * Use this for type-safe config access throughout the codebase
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.innerType().deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
