/**
 * Conversation Module
 *
 * Per-thread message history with summarization, locking and eviction.
 */

export type {
  Message,
  MessageRole,
  NewMessage,
  ThreadState,
  ThreadSnapshot,
  SummarizeOutcome,
  SummarizeInput,
  Summarizer,
} from './types.js';
export { MESSAGE_ROLES } from './types.js';
export {
  ConversationStore,
  createConversationStore,
  SUMMARY_HEADER,
  DEFAULT_SUMMARIZE_THRESHOLD,
  DEFAULT_RETAIN_TAIL,
  DEFAULT_MAX_THREADS,
  DEFAULT_IDLE_TTL_MS,
  type ConversationStoreOptions,
} from './store.js';
export { KeyedMutex } from './lock.js';
export {
  createGeneratorSummarizer,
  buildSummaryPrompt,
  formatTranscript,
  type GeneratorSummarizerOptions,
} from './summarizer.js';
