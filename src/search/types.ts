/**
 * Search Module Types
 *
 * Contracts for the vector index and the retrieval results built on it.
 */

import type { Document } from '../documents/types.js';

/**
 * A document with its similarity to a query vector.
 */
export interface ScoredDocument {
  document: Document;
  /** Cosine similarity, -1 to 1 (higher = more similar) */
  score: number;
}

/**
 * A retrieval result handed to the orchestrator. Ephemeral, never persisted.
 */
export interface RetrievedPassage {
  document: Document;
  relevanceScore: number;
}

/**
 * Progress of a batched embedding run.
 */
export interface EmbeddingProgress {
  embedded: number;
  total: number;
}

export interface UpsertOptions {
  signal?: AbortSignal;
  onProgress?: (progress: EmbeddingProgress) => void;
}

/**
 * Embedding model + vector store behind one interface.
 *
 * `nearest` returns at most k results ordered by descending score, ties in
 * insertion order. An upsert of an id already present replaces the document
 * and its vector in place.
 */
export interface VectorIndex {
  embed(text: string, options?: { signal?: AbortSignal }): Promise<number[]>;
  nearest(vector: readonly number[], k: number): Promise<ScoredDocument[]>;
  upsert(documents: readonly Document[], options?: UpsertOptions): Promise<void>;
  count(): number;
  clear(): void;
}

/**
 * Options for Retriever.search
 */
export interface SearchOptions {
  /** Overrides the configured top_k */
  k?: number;
  /** Overrides the configured min_score */
  minScore?: number;
  signal?: AbortSignal;
}
