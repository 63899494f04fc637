/**
 * ConversationStore
 *
 * Owns every conversation thread, keyed by the caller's thread id.
 *
 * Per thread the history is `[summary?] + verbatim messages`. Once the
 * verbatim part reaches `summarizeThreshold`, `maybeSummarize` folds all but
 * the newest `retainTail` messages into the summary. A failed summarization
 * loses nothing: the messages stay verbatim until a later trigger succeeds.
 *
 * Threads idle longer than `idleTtlMs` are evicted, and beyond `maxThreads`
 * the least recently active idle thread goes first. Threads with work in
 * `runExclusive` are never evicted.
 */

import { InvalidThreadStateError } from '../errors/index.js';
import type { Config } from '../config/schema.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { KeyedMutex } from './lock.js';
import {
  MESSAGE_ROLES,
  type Message,
  type MessageRole,
  type NewMessage,
  type SummarizeOutcome,
  type Summarizer,
  type ThreadSnapshot,
  type ThreadState,
} from './types.js';

/** Leading line of the synthetic system message carrying the summary */
export const SUMMARY_HEADER = 'Summary of the conversation so far:';

export const DEFAULT_SUMMARIZE_THRESHOLD = 10;
export const DEFAULT_RETAIN_TAIL = 4;
export const DEFAULT_MAX_THREADS = 1000;
export const DEFAULT_IDLE_TTL_MS = 60 * 60 * 1000;

export interface ConversationStoreOptions {
  summarizer: Summarizer;
  summarizeThreshold?: number;
  retainTail?: number;
  maxThreads?: number;
  idleTtlMs?: number;
  logger?: Logger;
  /** Milliseconds since epoch (default: Date.now) */
  now?: () => number;
}

interface ThreadRecord {
  threadId: string;
  state: ThreadState;
  summary?: string;
  summaryAt?: number;
  messages: Message[];
  summarizedCount: number;
  nextSequence: number;
  createdAt: number;
  lastActiveAt: number;
  lastSummaryError?: string;
}

function isRole(role: string): role is MessageRole {
  return MESSAGE_ROLES.some((known) => known === role);
}

function iso(ms: number): string {
  return new Date(ms).toISOString();
}

export class ConversationStore {
  private readonly threads = new Map<string, ThreadRecord>();
  private readonly mutex = new KeyedMutex();
  /** Pending runExclusive calls per thread id */
  private readonly inFlight = new Map<string, number>();

  private readonly summarizer: Summarizer;
  private readonly summarizeThreshold: number;
  private readonly retainTail: number;
  private readonly maxThreads: number;
  private readonly idleTtlMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: ConversationStoreOptions) {
    this.summarizer = options.summarizer;
    this.summarizeThreshold = options.summarizeThreshold ?? DEFAULT_SUMMARIZE_THRESHOLD;
    this.retainTail = options.retainTail ?? DEFAULT_RETAIN_TAIL;
    this.maxThreads = options.maxThreads ?? DEFAULT_MAX_THREADS;
    this.idleTtlMs = options.idleTtlMs ?? DEFAULT_IDLE_TTL_MS;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;

    if (!Number.isInteger(this.retainTail) || this.retainTail < 0) {
      throw new RangeError(`retainTail must be a non-negative integer (got ${this.retainTail})`);
    }
    if (this.retainTail >= this.summarizeThreshold) {
      throw new RangeError(
        `retainTail (${this.retainTail}) must be less than summarizeThreshold (${this.summarizeThreshold})`
      );
    }
  }

  // ==========================================================================
  // Messages
  // ==========================================================================

  /**
   * Append a message, creating the thread on first use.
   *
   * @throws InvalidThreadStateError for an empty thread id, an unknown role
   *   or non-string content; nothing is changed in that case
   */
  append(threadId: string, message: NewMessage): Message {
    if (typeof threadId !== 'string' || threadId.trim() === '') {
      throw new InvalidThreadStateError(String(threadId), 'Thread id must be a non-empty string');
    }
    if (!isRole(message.role)) {
      throw new InvalidThreadStateError(threadId, `Unknown message role "${message.role}"`);
    }
    if (typeof message.content !== 'string') {
      throw new InvalidThreadStateError(threadId, 'Message content must be a string');
    }

    const thread = this.threads.get(threadId) ?? this.createThread(threadId);
    const timestamp = this.now();
    const appended: Message = Object.freeze({
      id: `${threadId}:${thread.nextSequence}`,
      role: message.role,
      content: message.content,
      timestamp: iso(timestamp),
    });

    thread.nextSequence++;
    thread.messages.push(appended);
    this.touch(thread, timestamp);
    return appended;
  }

  /**
   * Summary (as a leading system message, if any) followed by the messages
   * since the last summarization point. Unknown threads yield [].
   */
  getContext(threadId: string): Message[] {
    const thread = this.threads.get(threadId);
    if (!thread) {
      return [];
    }

    const context = [...thread.messages];
    if (thread.summary !== undefined) {
      context.unshift(
        Object.freeze({
          id: `${threadId}:summary`,
          role: 'system',
          content: `${SUMMARY_HEADER}\n${thread.summary}`,
          timestamp: iso(thread.summaryAt ?? thread.createdAt),
        })
      );
    }
    return context;
  }

  /**
   * Remove the newest message if it has `messageId`. Used to undo the user
   * message of an aborted turn.
   *
   * @returns Whether a message was removed
   */
  rollback(threadId: string, messageId: string): boolean {
    const thread = this.threads.get(threadId);
    const last = thread?.messages.at(-1);
    if (!thread || last?.id !== messageId) {
      return false;
    }
    thread.messages.pop();
    return true;
  }

  // ==========================================================================
  // Summarization
  // ==========================================================================

  /**
   * Compact the thread if its verbatim history reached the threshold.
   *
   * Never throws for summarizer failures: they are logged, recorded on the
   * thread and reported as 'failed'.
   */
  async maybeSummarize(
    threadId: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<SummarizeOutcome> {
    const thread = this.threads.get(threadId);
    if (!thread) {
      return 'unknown_thread';
    }
    if (thread.state === 'summarizing') {
      return 'in_progress';
    }
    if (thread.messages.length < this.summarizeThreshold) {
      return 'not_needed';
    }

    const cut = thread.messages.length - this.retainTail;
    const folded = thread.messages.slice(0, cut);
    thread.state = 'summarizing';

    let summary: string;
    try {
      summary = await this.summarizer.summarize(
        { previousSummary: thread.summary, messages: folded },
        options
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      thread.state = 'active';
      thread.lastSummaryError = reason;
      this.logger.warn(
        `Summarization of thread "${threadId}" failed, will retry at the next trigger: ${reason}`
      );
      return 'failed';
    }

    // Reset or deleted while the summarizer ran
    if (this.threads.get(threadId) !== thread) {
      return 'not_needed';
    }

    thread.summary = summary;
    thread.summaryAt = this.now();
    thread.messages = thread.messages.slice(cut);
    thread.summarizedCount += cut;
    thread.state = 'active';
    thread.lastSummaryError = undefined;
    this.logger.debug?.(`Summarized ${cut} messages of thread "${threadId}"`);
    return 'summarized';
  }

  // ==========================================================================
  // Concurrency
  // ==========================================================================

  /**
   * Run `fn` while holding the thread's lock. Calls for one thread run in
   * arrival order; different threads run in parallel.
   */
  async runExclusive<T>(threadId: string, fn: () => Promise<T>): Promise<T> {
    this.inFlight.set(threadId, (this.inFlight.get(threadId) ?? 0) + 1);
    try {
      return await this.mutex.runExclusive(threadId, fn);
    } finally {
      const remaining = (this.inFlight.get(threadId) ?? 1) - 1;
      if (remaining > 0) {
        this.inFlight.set(threadId, remaining);
      } else {
        this.inFlight.delete(threadId);
      }
      const thread = this.threads.get(threadId);
      if (thread) {
        this.touch(thread, this.now());
      }
    }
  }

  // ==========================================================================
  // Thread management
  // ==========================================================================

  getThread(threadId: string): ThreadSnapshot | undefined {
    const thread = this.threads.get(threadId);
    return thread ? this.snapshot(thread) : undefined;
  }

  /** All threads, most recently active first */
  listThreads(): ThreadSnapshot[] {
    return [...this.threads.values()]
      .sort((a, b) => b.lastActiveAt - a.lastActiveAt)
      .map((thread) => this.snapshot(thread));
  }

  get size(): number {
    return this.threads.size;
  }

  /**
   * Forget the thread's history but keep the thread.
   *
   * @returns Whether the thread existed
   */
  reset(threadId: string): boolean {
    const thread = this.threads.get(threadId);
    if (!thread) {
      return false;
    }
    this.threads.set(threadId, {
      threadId,
      state: 'active',
      messages: [],
      summarizedCount: 0,
      nextSequence: thread.nextSequence,
      createdAt: thread.createdAt,
      lastActiveAt: this.now(),
    });
    return true;
  }

  delete(threadId: string): boolean {
    return this.threads.delete(threadId);
  }

  /**
   * Evict threads idle past the TTL, then the least recently active idle
   * threads while more than `maxThreads` remain.
   *
   * @returns Evicted thread ids
   */
  evictIdle(): string[] {
    return this.evict(this.maxThreads);
  }

  private evict(limit: number): string[] {
    const now = this.now();
    const evicted: string[] = [];

    const idle = [...this.threads.values()]
      .filter((thread) => !this.inFlight.has(thread.threadId) && thread.state === 'active')
      .sort((a, b) => a.lastActiveAt - b.lastActiveAt);

    for (const thread of idle) {
      const expired = now - thread.lastActiveAt > this.idleTtlMs;
      if (!expired && this.threads.size <= limit) {
        break;
      }
      this.threads.delete(thread.threadId);
      evicted.push(thread.threadId);
    }

    if (evicted.length > 0) {
      this.logger.debug?.(`Evicted ${evicted.length} idle thread(s)`);
    }
    if (this.threads.size > limit) {
      this.logger.warn(
        `Cannot evict: ${this.threads.size} conversation threads are busy (max_threads = ${this.maxThreads})`
      );
    }
    return evicted;
  }

  private createThread(threadId: string): ThreadRecord {
    // Make room for the new thread
    this.evict(this.maxThreads - 1);

    const now = this.now();
    const thread: ThreadRecord = {
      threadId,
      state: 'active',
      messages: [],
      summarizedCount: 0,
      nextSequence: 1,
      createdAt: now,
      lastActiveAt: now,
    };
    this.threads.set(threadId, thread);
    return thread;
  }

  private touch(thread: ThreadRecord, at: number): void {
    thread.lastActiveAt = at;
  }

  private snapshot(thread: ThreadRecord): ThreadSnapshot {
    return {
      threadId: thread.threadId,
      state: thread.state,
      summary: thread.summary,
      messages: [...thread.messages],
      summarizedCount: thread.summarizedCount,
      createdAt: iso(thread.createdAt),
      lastActiveAt: iso(thread.lastActiveAt),
      lastSummaryError: thread.lastSummaryError,
    };
  }
}

/**
 * Build a ConversationStore from the [conversation] config section.
 */
export function createConversationStore(
  conversation: Config['conversation'],
  summarizer: Summarizer,
  logger?: Logger
): ConversationStore {
  return new ConversationStore({
    summarizer,
    summarizeThreshold: conversation.summarize_threshold,
    retainTail: conversation.retain_tail,
    maxThreads: conversation.max_threads,
    idleTtlMs: conversation.idle_ttl_minutes * 60 * 1000,
    logger,
  });
}
