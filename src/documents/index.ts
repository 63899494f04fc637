/**
 * Documents Module
 *
 * Review ingestion input: CSV reading and Document normalization.
 */

export type {
  Document,
  RawReviewRow,
  MalformedRowPolicy,
  SkippedRow,
  DocumentStoreOptions,
} from './types.js';
export {
  DocumentStore,
  createDocumentStore,
  documentId,
  DEFAULT_TITLE_FIELD,
  DEFAULT_REVIEW_FIELD,
} from './document-store.js';
export { parseCsv, readReviewCsv, type CsvTable } from './csv.js';
