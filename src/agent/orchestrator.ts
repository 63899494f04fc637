/**
 * RAG Orchestrator
 *
 * Runs one conversational turn end to end:
 *
 * ```
 * handleTurn(threadId, text)
 *   └── store.runExclusive(threadId)        one turn per thread at a time
 *       ├── history = store.getContext()    captured before this turn
 *       ├── store.append(user)
 *       ├── retriever.search(text)          failure → answer without reviews
 *       ├── generator.complete(prompt)      failure → fallback message
 *       ├── store.append(assistant)         only for generated answers
 *       └── store.maybeSummarize()
 * ```
 *
 * Aborting via `signal` removes the user message again and rejects with
 * TurnAbortedError, so an aborted turn leaves no trace in the thread.
 */

import {
  RetrievalUnavailableError,
  TurnAbortedError,
  ValidationError,
} from '../errors/index.js';
import type { ConversationStore } from '../conversation/store.js';
import type { Message } from '../conversation/types.js';
import type { Generator } from '../providers/types.js';
import type { Retriever } from '../search/retriever.js';
import type { RetrievedPassage } from '../search/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { buildTurnPrompt } from './prompt.js';
import type {
  OrchestratorOptions,
  RetrievalStatus,
  TurnOptions,
  TurnResult,
} from './types.js';

export const FALLBACK_RESPONSE =
  "I'm unable to generate a response right now. Please try again in a moment.";

export const DEFAULT_MAX_TOKENS = 1024;
export const DEFAULT_TEMPERATURE = 0.3;

interface RetrievalOutcome {
  passages: RetrievedPassage[];
  status: RetrievalStatus;
}

export class RAGOrchestrator {
  private readonly store: ConversationStore;
  private readonly retriever: Retriever;
  private readonly generator: Generator;
  private readonly topK?: number;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly fallbackMessage: string;
  private readonly logger: Logger;

  constructor(options: OrchestratorOptions) {
    this.store = options.store;
    this.retriever = options.retriever;
    this.generator = options.generator;
    this.topK = options.topK;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.fallbackMessage = options.fallbackMessage ?? FALLBACK_RESPONSE;
    this.logger = options.logger ?? silentLogger;
  }

  get conversations(): ConversationStore {
    return this.store;
  }

  /**
   * Answer `text` in the context of thread `threadId`.
   *
   * Retrieval and generation failures do not reject: a failed retrieval
   * yields an answer without reviews, a failed generation the fallback
   * message.
   *
   * @throws ValidationError if text is empty or whitespace
   * @throws InvalidThreadStateError if threadId is empty
   * @throws TurnAbortedError if options.signal aborts before the turn completes
   */
  async handleTurn(threadId: string, text: string, options: TurnOptions = {}): Promise<string> {
    const result = await this.runTurn(threadId, text, options);
    return result.response;
  }

  /**
   * Same as handleTurn, returning the passages, flags and timings along
   * with the response.
   */
  async runTurn(threadId: string, text: string, options: TurnOptions = {}): Promise<TurnResult> {
    if (typeof text !== 'string' || text.trim() === '') {
      throw new ValidationError('Message is empty', ['Type a question about a product']);
    }
    return this.store.runExclusive(threadId, () => this.executeTurn(threadId, text, options));
  }

  private async executeTurn(threadId: string, text: string, options: TurnOptions): Promise<TurnResult> {
    const { signal } = options;
    const started = performance.now();

    if (signal?.aborted) {
      throw new TurnAbortedError(threadId);
    }

    const history = this.store.getContext(threadId);
    const userMessage = this.store.append(threadId, { role: 'user', content: text });

    const abort = (): never => {
      this.store.rollback(threadId, userMessage.id);
      this.logger.debug?.(`Turn aborted for thread "${threadId}", user message rolled back`);
      throw new TurnAbortedError(threadId);
    };

    // Retrieval
    const retrievalStarted = performance.now();
    let retrieval: RetrievalOutcome;
    try {
      retrieval = await this.retrieve(text, signal);
    } catch (error) {
      this.store.rollback(threadId, userMessage.id);
      throw error;
    }
    const retrievalMs = performance.now() - retrievalStarted;
    if (signal?.aborted) {
      abort();
    }

    // Generation
    const generationStarted = performance.now();
    const response = await this.generate(history, retrieval, text, signal);
    const generationMs = performance.now() - generationStarted;
    if (signal?.aborted) {
      abort();
    }

    if (response !== undefined) {
      this.store.append(threadId, { role: 'assistant', content: response });
    }

    const summarization = await this.store.maybeSummarize(threadId);

    return {
      threadId,
      response: response ?? this.fallbackMessage,
      passages: retrieval.passages,
      retrievalStatus: retrieval.status,
      generated: response !== undefined,
      summarization,
      timing: {
        retrievalMs,
        generationMs,
        totalMs: performance.now() - started,
      },
    };
  }

  private async retrieve(text: string, signal?: AbortSignal): Promise<RetrievalOutcome> {
    try {
      const passages = await this.retriever.search(text, { k: this.topK, signal });
      return { passages, status: passages.length > 0 ? 'ok' : 'empty' };
    } catch (error) {
      if (signal?.aborted) {
        return { passages: [], status: 'unavailable' };
      }
      if (error instanceof ValidationError) {
        throw error;
      }
      const reason =
        error instanceof RetrievalUnavailableError
          ? error.message
          : `Retrieval unavailable: ${error instanceof Error ? error.message : String(error)}`;
      this.logger.warn(`${reason}; answering without reviews`);
      return { passages: [], status: 'unavailable' };
    }
  }

  /**
   * @returns The answer, or undefined when the generator failed or
   *   produced only whitespace
   */
  private async generate(
    history: Message[],
    retrieval: RetrievalOutcome,
    text: string,
    signal?: AbortSignal
  ): Promise<string | undefined> {
    const prompt = buildTurnPrompt({
      history,
      passages: retrieval.passages,
      retrievalStatus: retrieval.status,
      userText: text,
    });

    try {
      const answer = await this.generator.complete(prompt, {
        maxTokens: this.maxTokens,
        temperature: this.temperature,
        signal,
      });
      if (answer.trim() === '') {
        this.logger.warn(`${this.generator.name} returned an empty answer; sending the fallback message`);
        return undefined;
      }
      return answer;
    } catch (error) {
      if (!signal?.aborted) {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Generation failed (${this.generator.name}): ${reason}`);
      }
      return undefined;
    }
  }
}
