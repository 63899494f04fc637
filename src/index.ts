/**
 * Review Advisor - Library Entry Point
 *
 * The CLI (`radv`) covers most use. This module exposes the same building
 * blocks for embedding the advisor in another service.
 *
 * ```bash
 * radv ingest reviews.csv            # Build the review index
 * radv ask "Which kettle is quiet?"  # One grounded answer
 * radv chat                          # Interactive REPL
 * ```
 *
 * @example Wiring an orchestrator from the persisted config
 * ```typescript
 * import { loadConfig, runMigrations, createAdvisor } from 'review-advisor';
 *
 * runMigrations();
 * const { orchestrator } = await createAdvisor(loadConfig());
 * const answer = await orchestrator.handleTurn('web-session-42', 'Best blender for smoothies?');
 * ```
 *
 * @example Ingesting rows that came from somewhere other than a CSV
 * ```typescript
 * import { loadConfig, runMigrations, createIngestPipeline } from 'review-advisor';
 *
 * runMigrations();
 * const pipeline = await createIngestPipeline(loadConfig());
 * await pipeline.ingest(rows, { loadExisting: true });
 * ```
 *
 * @packageDocumentation
 */

// Orchestration
export {
  RAGOrchestrator,
  createAdvisor,
  buildTurnPrompt,
  SYSTEM_PROMPT,
  FALLBACK_RESPONSE,
} from './agent/index.js';
export type {
  Advisor,
  AdvisorOptions,
  OrchestratorOptions,
  RetrievalStatus,
  TurnOptions,
  TurnResult,
} from './agent/index.js';

// Ingestion
export { IngestPipeline, createIngestPipeline } from './ingest/index.js';
export type { IngestOptions, IngestResult, IngestMode } from './ingest/index.js';
export { DocumentStore, createDocumentStore, parseCsv, readReviewCsv } from './documents/index.js';
export type { Document, RawReviewRow, MalformedRowPolicy, CsvTable } from './documents/index.js';

// Retrieval
export { LocalVectorIndex, createVectorIndex, Retriever, createRetriever } from './search/index.js';
export type { VectorIndex, ScoredDocument, RetrievedPassage } from './search/index.js';

// Conversation state
export {
  ConversationStore,
  createConversationStore,
  createGeneratorSummarizer,
} from './conversation/index.js';
export type { Message, MessageRole, ThreadSnapshot, Summarizer } from './conversation/index.js';

// Providers
export { createGenerator, createEmbeddingProvider } from './providers/index.js';
export type { Generator, EmbeddingProvider, ChatMessage } from './providers/index.js';

// Storage and configuration
export { runMigrations, getDatabase, closeDb } from './database/index.js';
export { loadConfig, getDbPath, getRadvDir } from './config/index.js';
export type { Config } from './config/index.js';

// Errors
export {
  CLIError,
  ValidationError,
  MalformedRecordError,
  RetrievalUnavailableError,
  GenerationUnavailableError,
  InvalidThreadStateError,
  TurnAbortedError,
} from './errors/index.js';
export type { Logger } from './utils/index.js';
