/**
 * Local Vector Index
 *
 * Brute-force cosine similarity over an in-memory array, backed by an
 * EmbeddingProvider. Review sets are small enough that a linear scan per
 * query is fine; ties keep insertion order.
 *
 * Persistence is explicit: `persist()` writes the current contents to
 * SQLite, `loadPersisted()` reads them back without re-embedding.
 */

import { CLIError, EmbeddingUnavailableError } from '../errors/index.js';
import type { Config } from '../config/schema.js';
import type { DatabaseOperations } from '../database/operations.js';
import type { DocumentRecord } from '../database/schema.js';
import type { Document } from '../documents/types.js';
import type { EmbeddingProvider } from '../providers/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';
import { EmbeddingMismatchError } from './errors.js';
import type { ScoredDocument, UpsertOptions, VectorIndex } from './types.js';

/** Reviews per embedding request when no batch size is configured */
export const DEFAULT_BATCH_SIZE = 64;

interface IndexEntry {
  document: Document;
  vector: Float32Array;
  norm: number;
}

export interface LocalVectorIndexOptions {
  /** Texts per embedBatch request (default: 64) */
  batchSize?: number;
  /** Timeout per embedding request in ms (0 or omitted: none) */
  timeoutMs?: number;
  logger?: Logger;
}

function vectorNorm(vector: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < vector.length; i++) {
    const value = vector[i] ?? 0;
    sum += value * value;
  }
  return Math.sqrt(sum);
}

function cosine(a: ArrayLike<number>, normA: number, b: ArrayLike<number>, normB: number): number {
  if (normA === 0 || normB === 0) {
    return 0;
  }
  let dot = 0;
  for (let i = 0; i < a.length; i++) {
    dot += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return dot / (normA * normB);
}

function abortedError(): CLIError {
  return new CLIError('Embedding was aborted', undefined, 130);
}

/**
 * @example
 * ```typescript
 * const index = new LocalVectorIndex(embedder, { batchSize: 64, timeoutMs: 60000 });
 * await index.upsert(documents, { onProgress: ({ embedded, total }) => spinner.text = `${embedded}/${total}` });
 * const hits = await index.nearest(await index.embed('quiet blender'), 3);
 * ```
 */
export class LocalVectorIndex implements VectorIndex {
  private entries: IndexEntry[] = [];
  /** id -> slot in entries */
  private slots = new Map<string, number>();
  private dims: number | null = null;

  private readonly batchSize: number;
  private readonly timeoutMs?: number;
  private readonly logger: Logger;

  constructor(
    private readonly embedder: EmbeddingProvider,
    options: LocalVectorIndexOptions = {}
  ) {
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? silentLogger;
  }

  /** Dimensionality fixed by the first upsert, null while empty */
  get dimensions(): number | null {
    return this.dims;
  }

  get embeddingProvider(): string {
    return this.embedder.name;
  }

  get embeddingModel(): string {
    return this.embedder.model;
  }

  // ==========================================================================
  // Embedding
  // ==========================================================================

  async embed(text: string, options: { signal?: AbortSignal } = {}): Promise<number[]> {
    const [vector] = await this.embedTexts([text], options.signal);
    if (!vector) {
      throw new EmbeddingUnavailableError(`${this.embedder.name} returned no embedding`);
    }
    return vector;
  }

  private async embedTexts(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (signal?.aborted) {
      throw abortedError();
    }

    let vectors: number[][];
    try {
      vectors = await withTimeout(
        this.embedder.embedBatch(texts, { signal }),
        this.timeoutMs,
        `${this.embedder.name} embedding request`
      );
    } catch (error) {
      if (error instanceof CLIError) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new EmbeddingUnavailableError(
        error instanceof TimeoutError ? error.message : `Embedding failed: ${cause.message}`,
        cause
      );
    }

    if (vectors.length !== texts.length) {
      throw new EmbeddingUnavailableError(
        `${this.embedder.name} returned ${vectors.length} embeddings for ${texts.length} inputs`
      );
    }
    if (vectors.some((vector) => vector.length === 0)) {
      throw new EmbeddingUnavailableError(`${this.embedder.name} returned an empty embedding`);
    }
    return vectors;
  }

  // ==========================================================================
  // Index operations
  // ==========================================================================

  /**
   * Embed and add documents, replacing any with the same id.
   *
   * All-or-nothing: if any batch fails the index is left unchanged.
   */
  async upsert(documents: readonly Document[], options: UpsertOptions = {}): Promise<void> {
    const { signal, onProgress } = options;
    const vectors: number[][] = [];

    for (let i = 0; i < documents.length; i += this.batchSize) {
      const batch = documents.slice(i, i + this.batchSize);
      const embedded = await this.embedTexts(
        batch.map((doc) => embeddingText(doc)),
        signal
      );
      vectors.push(...embedded);
      onProgress?.({ embedded: vectors.length, total: documents.length });

      // Yield to event loop to keep the REPL responsive
      await new Promise((resolve) => setImmediate(resolve));
    }

    let dims = this.dims;
    const prepared = documents.map((document, i) => {
      const vector = new Float32Array(vectors[i] ?? []);
      if (dims === null) {
        dims = vector.length;
      } else if (vector.length !== dims) {
        throw new EmbeddingMismatchError(
          `Embedding for ${document.id} has ${vector.length} dimensions, index expects ${dims}`,
          dims,
          vector.length
        );
      }
      return { document, vector, norm: vectorNorm(vector) };
    });

    for (const entry of prepared) {
      this.put(entry);
    }
    this.dims = dims;
    this.logger.debug?.(`Indexed ${prepared.length} documents (${this.entries.length} total)`);
  }

  async nearest(vector: readonly number[], k: number): Promise<ScoredDocument[]> {
    if (this.entries.length === 0 || k <= 0) {
      return [];
    }
    if (vector.length !== this.dims) {
      throw new EmbeddingMismatchError(
        `Query vector has ${vector.length} dimensions, index expects ${this.dims ?? 0}`,
        this.dims ?? 0,
        vector.length
      );
    }

    const queryNorm = vectorNorm(vector);
    // Array.prototype.sort is stable, so equal scores stay in insertion order
    return this.entries
      .map((entry) => ({
        document: entry.document,
        score: cosine(vector, queryNorm, entry.vector, entry.norm),
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  count(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
    this.slots.clear();
    this.dims = null;
  }

  /** Documents in insertion order */
  documents(): Document[] {
    return this.entries.map((entry) => entry.document);
  }

  private put(entry: IndexEntry): void {
    const slot = this.slots.get(entry.document.id);
    if (slot === undefined) {
      this.slots.set(entry.document.id, this.entries.length);
      this.entries.push(entry);
    } else {
      this.entries[slot] = entry;
    }
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  /**
   * Write the current contents to SQLite, replacing what was there.
   */
  persist(store: DatabaseOperations, source?: string): void {
    const records: DocumentRecord[] = this.entries.map((entry, position) => ({
      id: entry.document.id,
      position,
      productTitle: entry.document.productTitle,
      reviewText: entry.document.reviewText,
      metadata: { ...entry.document.sourceMetadata },
      embedding: entry.vector,
    }));

    store.replaceDocuments(records, {
      embeddingProvider: this.embedder.name,
      embeddingModel: this.embedder.model,
      dimensions: this.dims ?? 0,
      documentCount: records.length,
      source,
      ingestedAt: new Date().toISOString(),
    });
  }

  /**
   * Replace the in-memory contents with the persisted index.
   *
   * @returns Number of documents loaded (0 when nothing was persisted)
   * @throws EmbeddingMismatchError if the persisted vectors come from another
   *   embedding model or have inconsistent dimensions
   */
  loadPersisted(store: DatabaseOperations): number {
    const meta = store.getIndexMeta();
    if (!meta) {
      return 0;
    }

    const persistedModel = `${meta.embeddingProvider}/${meta.embeddingModel}`;
    const currentModel = `${this.embedder.name}/${this.embedder.model}`;
    if (persistedModel !== currentModel) {
      throw new EmbeddingMismatchError(
        `Persisted index was built with ${persistedModel}, the configured embedding model is ${currentModel}`,
        persistedModel,
        currentModel
      );
    }

    const records = store.loadDocuments();
    const entries = records.map((record): IndexEntry => {
      if (record.embedding.length !== meta.dimensions) {
        throw new EmbeddingMismatchError(
          `Persisted embedding for ${record.id} has ${record.embedding.length} dimensions, index expects ${meta.dimensions}`,
          meta.dimensions,
          record.embedding.length
        );
      }
      return {
        document: Object.freeze({
          id: record.id,
          productTitle: record.productTitle,
          reviewText: record.reviewText,
          sourceMetadata: Object.freeze({ ...record.metadata }),
        }),
        vector: record.embedding,
        norm: vectorNorm(record.embedding),
      };
    });

    this.clear();
    for (const entry of entries) {
      this.put(entry);
    }
    this.dims = entries.length > 0 ? meta.dimensions : null;
    this.logger.debug?.(`Loaded ${entries.length} persisted documents (${persistedModel})`);
    return entries.length;
  }
}

/**
 * Text that gets embedded for a review: the title gives short reviews
 * ("Love it!") something to match on.
 */
export function embeddingText(document: Document): string {
  return `${document.productTitle}: ${document.reviewText}`;
}

/**
 * Build a LocalVectorIndex from the [embedding] config section.
 */
export function createVectorIndex(
  embedder: EmbeddingProvider,
  embedding: Config['embedding'],
  logger?: Logger
): LocalVectorIndex {
  return new LocalVectorIndex(embedder, {
    batchSize: embedding.batch_size,
    timeoutMs: embedding.timeout_ms,
    logger,
  });
}
