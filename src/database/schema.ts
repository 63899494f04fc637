/**
 * Database row shapes and BLOB conversions.
 *
 * Application code uses camelCase records; the snake_case row types live
 * in validation.ts.
 */

/**
 * A persisted review with its embedding.
 */
export interface DocumentRecord {
  id: string;
  /** 0-based position in the ingested batch; defines insertion order */
  position: number;
  productTitle: string;
  reviewText: string;
  metadata: Record<string, string>;
  embedding: Float32Array;
}

/**
 * Facts about the persisted index, stored in index_meta.
 */
export interface IndexMeta {
  embeddingProvider: string;
  embeddingModel: string;
  dimensions: number;
  documentCount: number;
  /** Where the reviews came from (file path), if known */
  source?: string;
  /** ISO timestamp of the last ingestion */
  ingestedAt: string;
}

/**
 * Convert Float32Array to Buffer for BLOB storage.
 *
 * @example
 * ```ts
 * const blob = embeddingToBlob(new Float32Array([0.1, 0.2, 0.3]));
 * ```
 */
export function embeddingToBlob(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);
}

/**
 * Convert Buffer from BLOB back to Float32Array.
 *
 * Copies into a fresh ArrayBuffer: Buffers handed out by better-sqlite3 may
 * sit at an offset that is not 4-byte aligned.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  if (blob.length % Float32Array.BYTES_PER_ELEMENT !== 0) {
    throw new RangeError(`Embedding BLOB length ${blob.length} is not a multiple of 4`);
  }
  return new Float32Array(new Uint8Array(blob).buffer);
}
