/**
 * In-process stand-ins for the embedding model, the LLM and SQLite.
 */

import type Database from 'better-sqlite3';
import { openDatabase } from '../database/connection.js';
import { runMigrations } from '../database/migrate.js';
import { DatabaseOperations } from '../database/operations.js';
import { GenerationUnavailableError } from '../errors/index.js';
import type {
  ChatMessage,
  CompletionOptions,
  EmbedOptions,
  EmbeddingProvider,
  Generator,
} from '../providers/types.js';

// ============================================================================
// Embeddings
// ============================================================================

export interface VocabularyEmbedder extends EmbeddingProvider {
  /** Texts passed to every embedBatch call, in call order */
  readonly calls: string[][];
  /** Make the next calls reject with this error */
  failWith(error: Error | null): void;
}

/**
 * Bag-of-words embedder: one dimension per vocabulary word, holding its
 * count in the text. Texts sharing no vocabulary word get a zero vector.
 */
export function createVocabularyEmbedder(
  vocabulary: readonly string[],
  options: { name?: string; model?: string } = {}
): VocabularyEmbedder {
  const words = vocabulary.map((word) => word.toLowerCase());
  const calls: string[][] = [];
  let failure: Error | null = null;

  const vectorize = (text: string): number[] => {
    const tokens = text.toLowerCase().split(/[^a-z0-9]+/);
    return words.map((word) => tokens.filter((token) => token === word).length);
  };

  return {
    name: options.name ?? 'fake',
    model: options.model ?? 'vocab-v1',
    calls,
    failWith(error: Error | null) {
      failure = error;
    },
    async embed(text: string, embedOptions?: EmbedOptions) {
      const [vector] = await this.embedBatch([text], embedOptions);
      return vector ?? [];
    },
    async embedBatch(texts: string[]) {
      calls.push([...texts]);
      if (failure) {
        throw failure;
      }
      return texts.map(vectorize);
    },
  };
}

// ============================================================================
// Generation
// ============================================================================

export interface GeneratorCall {
  messages: ChatMessage[];
  options?: CompletionOptions;
}

type Reply = string | Error | ((call: GeneratorCall) => string | Promise<string>);

/**
 * Generator that answers from a script.
 *
 * Replies queued with `reply()` are used first, in order; after that the
 * fallback reply (default "ok") answers every call. An Error reply rejects
 * the call.
 */
export class ScriptedGenerator implements Generator {
  readonly name = 'scripted';
  readonly model = 'scripted-v1';
  readonly calls: GeneratorCall[] = [];

  private queue: Reply[] = [];

  constructor(private fallback: Reply = 'ok') {}

  reply(...replies: Reply[]): this {
    this.queue.push(...replies);
    return this;
  }

  setFallback(reply: Reply): this {
    this.fallback = reply;
    return this;
  }

  async complete(prompt: string | ChatMessage[], options?: CompletionOptions): Promise<string> {
    const messages: ChatMessage[] =
      typeof prompt === 'string' ? [{ role: 'user', content: prompt }] : prompt;
    const call: GeneratorCall = { messages, options };
    this.calls.push(call);

    const next = this.queue.shift() ?? this.fallback;
    if (next instanceof Error) {
      throw next;
    }
    if (typeof next === 'function') {
      return next(call);
    }
    return next;
  }
}

/**
 * Error a real Generator throws when its provider is down.
 */
export function generatorDown(): GenerationUnavailableError {
  return new GenerationUnavailableError('scripted completion failed: connect ECONNREFUSED');
}

/**
 * A promise plus its resolver, for holding a fake call open.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

// ============================================================================
// Database
// ============================================================================

/**
 * Migrated in-memory SQLite database. Close `db` in afterEach.
 */
export function createTestDatabase(): { db: Database.Database; ops: DatabaseOperations } {
  const db = openDatabase(':memory:');
  runMigrations(db);
  return { db, ops: new DatabaseOperations(db) };
}
