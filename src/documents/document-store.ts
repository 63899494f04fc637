/**
 * DocumentStore
 *
 * Turns raw review rows into Documents. Output order is input order and the
 * same input always yields the same Documents, ids included.
 */

import { createHash } from 'node:crypto';
import { MalformedRecordError, type MalformedRecordIssue } from '../errors/types.js';
import type { Logger } from '../utils/logger.js';
import type { Config } from '../config/schema.js';
import type {
  Document,
  DocumentStoreOptions,
  MalformedRowPolicy,
  RawReviewRow,
} from './types.js';

export const DEFAULT_TITLE_FIELD = 'product_title';
export const DEFAULT_REVIEW_FIELD = 'review';

/**
 * Build the deterministic id for a review.
 *
 * Position is part of the hash so two identical reviews of the same product
 * stay distinct documents.
 */
export function documentId(position: number, productTitle: string, reviewText: string): string {
  const digest = createHash('sha256')
    .update(`${position}\u0000${productTitle}\u0000${reviewText}`)
    .digest('hex');
  return `rev-${digest.slice(0, 16)}`;
}

function cellToString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

export class DocumentStore {
  private readonly titleField: string;
  private readonly reviewField: string;
  private readonly onMalformed: MalformedRowPolicy;
  private readonly onSkip?: DocumentStoreOptions['onSkip'];

  constructor(options: DocumentStoreOptions = {}) {
    this.titleField = options.titleField ?? DEFAULT_TITLE_FIELD;
    this.reviewField = options.reviewField ?? DEFAULT_REVIEW_FIELD;
    this.onMalformed = options.onMalformed ?? 'reject';
    this.onSkip = options.onSkip;
  }

  /**
   * Map rows to Documents.
   *
   * @throws MalformedRecordError listing every bad row, when the policy is
   *   'reject'
   */
  load(rawRows: readonly RawReviewRow[]): Document[] {
    const documents: Document[] = [];
    const issues: MalformedRecordIssue[] = [];

    rawRows.forEach((raw, index) => {
      const row = index + 1;
      const title = cellToString(raw[this.titleField]) ?? '';
      const review = cellToString(raw[this.reviewField]) ?? '';

      const missing = [
        ...(title === '' ? [this.titleField] : []),
        ...(review === '' ? [this.reviewField] : []),
      ];
      if (missing.length > 0) {
        issues.push({ row, reason: `missing ${missing.join(', ')}` });
        return;
      }

      const sourceMetadata: Record<string, string> = {};
      for (const [key, value] of Object.entries(raw)) {
        if (key === this.titleField || key === this.reviewField) continue;
        const text = cellToString(value);
        if (text) {
          sourceMetadata[key] = text;
        }
      }

      documents.push(
        Object.freeze({
          id: documentId(index, title, review),
          productTitle: title,
          reviewText: review,
          sourceMetadata: Object.freeze(sourceMetadata),
        })
      );
    });

    if (issues.length > 0) {
      if (this.onMalformed === 'reject') {
        throw new MalformedRecordError(
          `${issues.length} of ${rawRows.length} review rows are malformed`,
          issues
        );
      }
      for (const issue of issues) {
        this.onSkip?.(issue);
      }
    }

    return documents;
  }
}

/**
 * Build a DocumentStore from the [ingest] config section. Skipped rows are
 * reported as warnings.
 */
export function createDocumentStore(ingest: Config['ingest'], logger?: Logger): DocumentStore {
  return new DocumentStore({
    titleField: ingest.title_field,
    reviewField: ingest.review_field,
    onMalformed: ingest.on_malformed,
    onSkip: logger
      ? (skipped) => logger.warn(`Skipping row ${skipped.row}: ${skipped.reason}`)
      : undefined,
  });
}
