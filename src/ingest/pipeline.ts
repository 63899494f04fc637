/**
 * Ingestion Pipeline
 *
 * raw rows → DocumentStore → VectorIndex.upsert → SQLite
 *
 * With `loadExisting`, the persisted vectors are loaded instead and the
 * rows are not embedded again. Any failure aborts the run; the persisted
 * index is only replaced after every batch has been embedded.
 */

import type { Config } from '../config/schema.js';
import { getDatabase, type DatabaseOperations } from '../database/operations.js';
import { createDocumentStore, type DocumentStore } from '../documents/document-store.js';
import type { RawReviewRow } from '../documents/types.js';
import { createEmbeddingProvider } from '../providers/embedding.js';
import type { EmbeddingProvider } from '../providers/types.js';
import { createVectorIndex, type LocalVectorIndex } from '../search/vector-index.js';
import type { EmbeddingProgress } from '../search/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export type IngestMode = 'rebuilt' | 'loaded';

export interface IngestDependencies {
  documents: DocumentStore;
  index: LocalVectorIndex;
  database: DatabaseOperations;
  logger?: Logger;
}

export interface IngestOptions {
  /** Reuse persisted vectors instead of embedding the rows (default: false) */
  loadExisting?: boolean;
  /** Recorded in index_meta, e.g. the CSV path */
  source?: string;
  signal?: AbortSignal;
  onProgress?: (progress: EmbeddingProgress) => void;
}

export interface IngestResult {
  mode: IngestMode;
  documentCount: number;
  /** Rows dropped under on_malformed = "skip" */
  skippedCount: number;
  dimensions: number | null;
  durationMs: number;
}

/**
 * @example
 * ```typescript
 * const pipeline = new IngestPipeline({ documents, index, database: getDatabase(), logger: ctx });
 * const { rows } = await readReviewCsv('reviews.csv');
 * const result = await pipeline.ingest(rows, { source: 'reviews.csv' });
 * console.log(`${result.documentCount} reviews indexed`);
 * ```
 */
export class IngestPipeline {
  private readonly logger: Logger;

  constructor(private readonly deps: IngestDependencies) {
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Build the index from `rawRows`, or load the persisted one.
   *
   * Loading falls back to a rebuild when nothing has been persisted yet.
   *
   * @throws MalformedRecordError if rows are malformed and the policy is 'reject'
   * @throws EmbeddingMismatchError if the persisted index came from another
   *   embedding model
   * @throws EmbeddingUnavailableError if embedding fails
   * @throws DatabaseError if the index cannot be persisted
   */
  async ingest(rawRows: readonly RawReviewRow[], options: IngestOptions = {}): Promise<IngestResult> {
    const started = performance.now();
    const { index, database } = this.deps;

    if (options.loadExisting) {
      const loaded = index.loadPersisted(database);
      if (loaded > 0) {
        this.logger.debug?.(`Loaded ${loaded} persisted reviews`);
        return {
          mode: 'loaded',
          documentCount: loaded,
          skippedCount: 0,
          dimensions: index.dimensions,
          durationMs: performance.now() - started,
        };
      }
      this.logger.warn('No persisted index found, rebuilding from the review rows');
    }

    const documents = this.deps.documents.load(rawRows);
    const skippedCount = rawRows.length - documents.length;

    index.clear();
    try {
      await index.upsert(documents, { signal: options.signal, onProgress: options.onProgress });
      index.persist(database, options.source);
    } catch (error) {
      index.clear();
      throw error;
    }

    this.logger.debug?.(`Indexed ${documents.length} reviews (${skippedCount} skipped)`);
    return {
      mode: 'rebuilt',
      documentCount: documents.length,
      skippedCount,
      dimensions: index.dimensions,
      durationMs: performance.now() - started,
    };
  }
}

export interface IngestPipelineOptions {
  logger?: Logger;
  database?: DatabaseOperations;
  /** Use this embedder instead of the configured provider */
  embedder?: EmbeddingProvider;
  skipAvailabilityCheck?: boolean;
}

/**
 * Wire an IngestPipeline from config: configured embedding provider,
 * [ingest] row policy and the default database.
 */
export async function createIngestPipeline(
  config: Config,
  options: IngestPipelineOptions = {}
): Promise<IngestPipeline> {
  const embedder =
    options.embedder ??
    (await createEmbeddingProvider(config.embedding, {
      skipAvailabilityCheck: options.skipAvailabilityCheck,
    }));

  return new IngestPipeline({
    documents: createDocumentStore(config.ingest, options.logger),
    index: createVectorIndex(embedder, config.embedding, options.logger),
    database: options.database ?? getDatabase(),
    logger: options.logger,
  });
}
