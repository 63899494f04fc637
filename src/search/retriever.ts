/**
 * Retriever
 *
 * Top-k policy over a VectorIndex: embed the query, take the k nearest
 * documents, drop those sharing nothing with the query or scoring under the
 * minimum score.
 */

import {
  CLIError,
  RetrievalUnavailableError,
  ValidationError,
} from '../errors/index.js';
import type { Config } from '../config/schema.js';
import type {
  RetrievedPassage,
  ScoredDocument,
  SearchOptions,
  VectorIndex,
} from './types.js';

/** Passages retrieved per turn when nothing is configured */
export const DEFAULT_TOP_K = 3;

export interface RetrieverOptions {
  topK?: number;
  /** No threshold when omitted */
  minScore?: number;
}

/**
 * @example
 * ```typescript
 * const retriever = new Retriever(index, { topK: 3 });
 * const passages = await retriever.search('blender that is not too loud');
 * for (const p of passages) {
 *   console.log(`${p.relevanceScore.toFixed(3)} ${p.document.productTitle}`);
 * }
 * ```
 */
export class Retriever {
  private readonly topK: number;
  private readonly minScore?: number;

  constructor(
    private readonly index: VectorIndex,
    options: RetrieverOptions = {}
  ) {
    this.topK = options.topK ?? DEFAULT_TOP_K;
    this.minScore = options.minScore;
  }

  /**
   * Retrieve the passages most relevant to `query`, best first.
   *
   * An empty result is a valid outcome (nothing cleared the threshold).
   * Hits scoring zero or less are never returned, threshold or not.
   *
   * @throws ValidationError if k is not a positive integer
   * @throws RetrievalUnavailableError if the index is empty or unreachable
   */
  async search(query: string, options: SearchOptions = {}): Promise<RetrievedPassage[]> {
    const k = options.k ?? this.topK;
    if (!Number.isInteger(k) || k < 1) {
      throw new ValidationError('Invalid search options', [`k must be a positive integer (got ${k})`]);
    }

    let hits: ScoredDocument[];
    try {
      if (this.index.count() === 0) {
        throw new RetrievalUnavailableError('The review index is empty');
      }
      const vector = await this.index.embed(query, { signal: options.signal });
      hits = await this.index.nearest(vector, k);
    } catch (error) {
      if (error instanceof RetrievalUnavailableError) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      const detail = error instanceof CLIError ? error.message : `Vector index failed: ${cause.message}`;
      throw new RetrievalUnavailableError(`Retrieval unavailable: ${detail}`, cause);
    }

    const minScore = options.minScore ?? this.minScore;
    return hits
      .filter((hit) => hit.score > 0 && (minScore === undefined || hit.score >= minScore))
      .map((hit) => ({ document: hit.document, relevanceScore: hit.score }));
  }
}

/**
 * Build a Retriever from the [retrieval] config section.
 */
export function createRetriever(index: VectorIndex, retrieval: Config['retrieval']): Retriever {
  return new Retriever(index, { topK: retrieval.top_k, minScore: retrieval.min_score });
}
