/**
 * Advisor Factory
 *
 * Wires every collaborator of the orchestrator from config. Any collaborator
 * can be injected instead, which is how tests run without network access.
 */

import type { Config } from '../config/schema.js';
import { createConversationStore } from '../conversation/store.js';
import { createGeneratorSummarizer } from '../conversation/summarizer.js';
import type { ConversationStore } from '../conversation/store.js';
import { getDatabase, type DatabaseOperations } from '../database/operations.js';
import { createEmbeddingProvider } from '../providers/embedding.js';
import { createGenerator, type FallbackOptions } from '../providers/llm.js';
import type { EmbeddingProvider, Generator } from '../providers/types.js';
import { createRetriever, type Retriever } from '../search/retriever.js';
import { createVectorIndex, type LocalVectorIndex } from '../search/vector-index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { RAGOrchestrator } from './orchestrator.js';

export interface AdvisorOptions {
  logger?: Logger;
  database?: DatabaseOperations;
  embedder?: EmbeddingProvider;
  generator?: Generator;
  /** Override config.default_model */
  model?: string;
  skipAvailabilityCheck?: boolean;
  fallback?: FallbackOptions;
}

/**
 * Everything a front end needs to hold a conversation.
 */
export interface Advisor {
  orchestrator: RAGOrchestrator;
  conversations: ConversationStore;
  retriever: Retriever;
  index: LocalVectorIndex;
  generator: Generator;
  /** True if the generator is a fallback provider */
  usedFallback: boolean;
  /** Reviews loaded from the persisted index */
  indexedCount: number;
}

/**
 * @example
 * ```typescript
 * const advisor = await createAdvisor(loadConfig(), { logger: ctx });
 * const answer = await advisor.orchestrator.handleTurn('session-1', 'Which blender is quietest?');
 * ```
 */
export async function createAdvisor(config: Config, options: AdvisorOptions = {}): Promise<Advisor> {
  const logger = options.logger ?? silentLogger;

  const embedder =
    options.embedder ??
    (await createEmbeddingProvider(config.embedding, {
      skipAvailabilityCheck: options.skipAvailabilityCheck,
    }));
  const index = createVectorIndex(embedder, config.embedding, logger);
  const indexedCount = index.loadPersisted(options.database ?? getDatabase());
  if (indexedCount === 0) {
    logger.warn('No reviews are indexed yet; answers will not be based on reviews');
  }

  let generator: Generator;
  let usedFallback = false;
  if (options.generator) {
    generator = options.generator;
  } else {
    const result = await createGenerator(config, {
      model: options.model,
      skipAvailabilityCheck: options.skipAvailabilityCheck,
      fallback: options.fallback,
    });
    generator = result.generator;
    usedFallback = result.usedFallback;
  }

  const conversations = createConversationStore(
    config.conversation,
    createGeneratorSummarizer(generator, { maxTokens: config.conversation.summary_max_tokens }),
    logger
  );
  const retriever = createRetriever(index, config.retrieval);

  const orchestrator = new RAGOrchestrator({
    store: conversations,
    retriever,
    generator,
    topK: config.retrieval.top_k,
    maxTokens: config.generation.max_tokens,
    temperature: config.generation.temperature,
    logger,
  });

  return { orchestrator, conversations, retriever, index, generator, usedFallback, indexedCount };
}
