/**
 * Agent Module Types
 */

import type { ConversationStore } from '../conversation/store.js';
import type { SummarizeOutcome } from '../conversation/types.js';
import type { Generator } from '../providers/types.js';
import type { Retriever } from '../search/retriever.js';
import type { RetrievedPassage } from '../search/types.js';
import type { Logger } from '../utils/logger.js';

/**
 * - ok: passages were retrieved
 * - empty: retrieval worked but nothing was relevant
 * - unavailable: retrieval failed; the answer is not grounded in reviews
 */
export type RetrievalStatus = 'ok' | 'empty' | 'unavailable';

export interface OrchestratorOptions {
  store: ConversationStore;
  retriever: Retriever;
  generator: Generator;
  /** Passages per turn (default: the retriever's top_k) */
  topK?: number;
  maxTokens?: number;
  temperature?: number;
  /** Returned when generation fails */
  fallbackMessage?: string;
  logger?: Logger;
}

export interface TurnOptions {
  /** Aborting rolls the turn back and rejects with TurnAbortedError */
  signal?: AbortSignal;
}

/**
 * Timing breakdown for one turn.
 */
export interface TurnTiming {
  retrievalMs: number;
  generationMs: number;
  totalMs: number;
}

/**
 * Everything a front end may want to show about a turn.
 */
export interface TurnResult {
  threadId: string;
  response: string;
  passages: RetrievedPassage[];
  retrievalStatus: RetrievalStatus;
  /** False when `response` is the fallback message */
  generated: boolean;
  summarization: SummarizeOutcome;
  timing: TurnTiming;
}
