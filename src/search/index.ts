/**
 * Search Module
 *
 * Vector index and top-k retrieval over ingested reviews.
 *
 * @example
 * ```typescript
 * import { LocalVectorIndex, createRetriever } from './search/index.js';
 *
 * const index = new LocalVectorIndex(embedder, { batchSize: config.embedding.batch_size });
 * index.loadPersisted(getDatabase());
 * const passages = await createRetriever(index, config.retrieval).search('quiet kettle');
 * ```
 */

export type {
  VectorIndex,
  ScoredDocument,
  RetrievedPassage,
  EmbeddingProgress,
  UpsertOptions,
  SearchOptions,
} from './types.js';
export {
  LocalVectorIndex,
  createVectorIndex,
  embeddingText,
  DEFAULT_BATCH_SIZE,
  type LocalVectorIndexOptions,
} from './vector-index.js';
export { Retriever, createRetriever, DEFAULT_TOP_K, type RetrieverOptions } from './retriever.js';
export { EmbeddingMismatchError } from './errors.js';
export {
  formatPassage,
  formatPassages,
  formatPassagesJSON,
  formatScore,
  truncateSnippet,
  type FormatOptions,
  type FormattedPassageJSON,
} from './formatter.js';
