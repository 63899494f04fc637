/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Config = {
  default_model: 'gpt-4o-mini',
  default_provider: 'openai',

  // 1536 dimensions; switching models later requires a full re-ingest
  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small',
    batch_size: 64,
    timeout_ms: 60000,
  },

  retrieval: {
    top_k: 3,
  },

  generation: {
    max_tokens: 512,
    temperature: 0.3,
    timeout_ms: 60000,
    max_retries: 2,
  },

  conversation: {
    summarize_threshold: 10,
    retain_tail: 4,
    summary_max_tokens: 256,
    max_threads: 1000,
    idle_ttl_minutes: 60,
  },

  ingest: {
    title_field: 'product_title',
    review_field: 'review',
    on_malformed: 'reject',
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.radv/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# Review Advisor Configuration
# Location: ~/.radv/config.toml  (set RADV_HOME to move it)

# LLM Settings
# Providers: "openai", "ollama", "openai-compatible"
default_model = "${DEFAULT_CONFIG.default_model}"
default_provider = "${DEFAULT_CONFIG.default_provider}"

# Embedding Settings
# Changing provider/model requires: radv ingest <reviews.csv>
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}

# Retrieval Settings
[retrieval]
top_k = ${DEFAULT_CONFIG.retrieval.top_k}
# min_score = 0.2   # drop reviews less similar than this

# Generation Settings
[generation]
max_tokens = ${DEFAULT_CONFIG.generation.max_tokens}
temperature = ${DEFAULT_CONFIG.generation.temperature}
timeout_ms = ${DEFAULT_CONFIG.generation.timeout_ms}
max_retries = ${DEFAULT_CONFIG.generation.max_retries}

# Conversation Memory
# After summarize_threshold verbatim messages, all but the last retain_tail
# are folded into a running summary. retain_tail must be < summarize_threshold.
[conversation]
summarize_threshold = ${DEFAULT_CONFIG.conversation.summarize_threshold}
retain_tail = ${DEFAULT_CONFIG.conversation.retain_tail}
summary_max_tokens = ${DEFAULT_CONFIG.conversation.summary_max_tokens}
max_threads = ${DEFAULT_CONFIG.conversation.max_threads}
idle_ttl_minutes = ${DEFAULT_CONFIG.conversation.idle_ttl_minutes}

# Review Ingestion
# on_malformed: "reject" fails the whole run, "skip" drops bad rows with a warning
[ingest]
title_field = "${DEFAULT_CONFIG.ingest.title_field}"
review_field = "${DEFAULT_CONFIG.ingest.review_field}"
on_malformed = "${DEFAULT_CONFIG.ingest.on_malformed}"

# LLM fallback (used when the primary provider is not configured)
# [llm]
# fallback_providers = ["ollama"]
# fallback_models = { ollama = "llama3.1" }
`;
