/**
 * Document Module Types
 */

/**
 * One customer review, normalized for indexing.
 *
 * Documents are frozen when created and never mutated; re-ingestion
 * replaces them wholesale.
 */
export interface Document {
  /** Deterministic id: `rev-` + 16 hex chars of sha256(position, title, review) */
  readonly id: string;
  readonly productTitle: string;
  readonly reviewText: string;
  /** Every other non-empty column of the source row */
  readonly sourceMetadata: Readonly<Record<string, string>>;
}

/**
 * A raw review record as it comes out of the CSV reader (or any other
 * source). Only string, number and boolean values are kept.
 */
export type RawReviewRow = Readonly<Record<string, unknown>>;

/**
 * How to treat rows that lack a title or review.
 * - reject: fail the whole batch (default)
 * - skip: drop the row and report it
 */
export type MalformedRowPolicy = 'reject' | 'skip';

export interface SkippedRow {
  /** 1-based row number within the batch */
  row: number;
  reason: string;
}

export interface DocumentStoreOptions {
  /** Column holding the product title (default: product_title) */
  titleField?: string;
  /** Column holding the review text (default: review) */
  reviewField?: string;
  onMalformed?: MalformedRowPolicy;
  /** Called once per dropped row when onMalformed is 'skip' */
  onSkip?: (skipped: SkippedRow) => void;
}
