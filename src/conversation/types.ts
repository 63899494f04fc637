/**
 * Conversation Module Types
 */

export const MESSAGE_ROLES = ['user', 'assistant', 'system'] as const;
export type MessageRole = (typeof MESSAGE_ROLES)[number];

/**
 * One message of a thread. Frozen once appended.
 */
export interface Message {
  /** `${threadId}:${sequence}`, unique within the store */
  readonly id: string;
  readonly role: MessageRole;
  readonly content: string;
  /** ISO timestamp */
  readonly timestamp: string;
}

/**
 * Input to ConversationStore.append. Role is checked at runtime, so
 * front ends can pass through whatever they received.
 */
export interface NewMessage {
  role: string;
  content: string;
}

/**
 * - active: accumulating messages
 * - summarizing: a compaction is in flight
 */
export type ThreadState = 'active' | 'summarizing';

/**
 * Read-only copy of a thread handed out by the store.
 */
export interface ThreadSnapshot {
  threadId: string;
  state: ThreadState;
  summary?: string;
  /** Messages since the last summarization point */
  messages: Message[];
  /** Messages folded into the summary so far */
  summarizedCount: number;
  createdAt: string;
  lastActiveAt: string;
  /** Reason the most recent summarization failed, cleared on success */
  lastSummaryError?: string;
}

export type SummarizeOutcome =
  | 'not_needed'
  | 'summarized'
  | 'failed'
  | 'in_progress'
  | 'unknown_thread';

export interface SummarizeInput {
  previousSummary?: string;
  /** Oldest verbatim messages, chronological */
  messages: readonly Message[];
}

/**
 * Condenses history. Throws when it cannot produce a summary.
 */
export interface Summarizer {
  summarize(input: SummarizeInput, options?: { signal?: AbortSignal }): Promise<string>;
}
