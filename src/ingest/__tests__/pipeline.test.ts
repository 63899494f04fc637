/**
 * IngestPipeline Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { IngestPipeline, createIngestPipeline } from '../pipeline.js';
import { DocumentStore, createDocumentStore } from '../../documents/index.js';
import { LocalVectorIndex } from '../../search/vector-index.js';
import { EmbeddingMismatchError } from '../../search/errors.js';
import type { DatabaseOperations } from '../../database/index.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import { EmbeddingUnavailableError, MalformedRecordError } from '../../errors/index.js';
import {
  createTestDatabase,
  createVocabularyEmbedder,
  type VocabularyEmbedder,
} from '../../test-utils/index.js';

const VOCABULARY = ['kettle', 'blender', 'quiet', 'loud', 'ice'];

const rows = [
  { product_title: 'Kettle', review: 'quiet and fast', rating: '5' },
  { product_title: 'Blender', review: 'loud but crushes ice', rating: '3' },
  { product_title: 'Blender', review: 'quiet enough' },
];

describe('IngestPipeline', () => {
  let db: Database.Database;
  let ops: DatabaseOperations;
  let embedder: VocabularyEmbedder;
  let index: LocalVectorIndex;
  let logger: { warn: ReturnType<typeof vi.fn>; debug: ReturnType<typeof vi.fn> };
  let pipeline: IngestPipeline;

  beforeEach(() => {
    ({ db, ops } = createTestDatabase());
    embedder = createVocabularyEmbedder(VOCABULARY);
    index = new LocalVectorIndex(embedder, { batchSize: 2 });
    logger = { warn: vi.fn(), debug: vi.fn() };
    pipeline = new IngestPipeline({ documents: new DocumentStore(), index, database: ops, logger });
  });

  afterEach(() => {
    db.close();
  });

  describe('rebuild', () => {
    it('embeds every row and persists the index', async () => {
      const result = await pipeline.ingest(rows, { source: 'reviews.csv' });

      expect(result).toMatchObject({
        mode: 'rebuilt',
        documentCount: 3,
        skippedCount: 0,
        dimensions: 5,
      });
      expect(index.count()).toBe(3);
      expect(ops.countDocuments()).toBe(3);
      expect(ops.countProducts()).toBe(2);
      expect(ops.getIndexMeta()).toMatchObject({
        embeddingProvider: 'fake',
        embeddingModel: 'vocab-v1',
        dimensions: 5,
        documentCount: 3,
        source: 'reviews.csv',
      });
    });

    it('reports progress per batch', async () => {
      const onProgress = vi.fn();

      await pipeline.ingest(rows, { onProgress });

      expect(onProgress.mock.calls).toEqual([
        [{ embedded: 2, total: 3 }],
        [{ embedded: 3, total: 3 }],
      ]);
    });

    it('replaces the previous index on re-ingest', async () => {
      await pipeline.ingest(rows);
      await pipeline.ingest(rows.slice(0, 1));

      expect(index.count()).toBe(1);
      expect(ops.countDocuments()).toBe(1);
      expect(ops.loadDocuments().map((d) => d.reviewText)).toEqual(['quiet and fast']);
    });

    it('rejects a malformed batch without embedding anything', async () => {
      const bad = [...rows, { product_title: '', review: 'no title' }];

      await expect(pipeline.ingest(bad)).rejects.toThrow(MalformedRecordError);

      expect(embedder.calls).toHaveLength(0);
      expect(ops.countDocuments()).toBe(0);
    });

    it('skips malformed rows under the skip policy', async () => {
      const skipping = new IngestPipeline({
        documents: createDocumentStore({ ...DEFAULT_CONFIG.ingest, on_malformed: 'skip' }, logger),
        index,
        database: ops,
        logger,
      });

      const result = await skipping.ingest([
        rows[0] ?? {},
        { product_title: 'Blender', review: '' },
      ]);

      expect(result.documentCount).toBe(1);
      expect(result.skippedCount).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith('Skipping row 2: missing review');
    });

    it('keeps the persisted index when embedding fails', async () => {
      await pipeline.ingest(rows);
      embedder.failWith(new Error('rate limited'));

      await expect(pipeline.ingest(rows.slice(0, 1))).rejects.toThrow(EmbeddingUnavailableError);

      expect(index.count()).toBe(0);
      expect(ops.countDocuments()).toBe(3);
    });
  });

  describe('loadExisting', () => {
    it('reuses persisted vectors without embedding', async () => {
      await pipeline.ingest(rows);
      const freshEmbedder = createVocabularyEmbedder(VOCABULARY);
      const freshIndex = new LocalVectorIndex(freshEmbedder);
      const reloading = new IngestPipeline({
        documents: new DocumentStore(),
        index: freshIndex,
        database: ops,
      });

      const result = await reloading.ingest(rows, { loadExisting: true });

      expect(result).toMatchObject({ mode: 'loaded', documentCount: 3, dimensions: 5 });
      expect(freshEmbedder.calls).toHaveLength(0);
      expect(freshIndex.documents().map((d) => d.reviewText)).toEqual([
        'quiet and fast',
        'loud but crushes ice',
        'quiet enough',
      ]);
    });

    it('rebuilds with a warning when nothing is persisted', async () => {
      const result = await pipeline.ingest(rows, { loadExisting: true });

      expect(result.mode).toBe('rebuilt');
      expect(result.documentCount).toBe(3);
      expect(logger.warn).toHaveBeenCalledWith(
        'No persisted index found, rebuilding from the review rows'
      );
    });

    it('refuses vectors built by another embedding model', async () => {
      await pipeline.ingest(rows);
      const otherIndex = new LocalVectorIndex(
        createVocabularyEmbedder(VOCABULARY, { model: 'vocab-v2' })
      );
      const reloading = new IngestPipeline({
        documents: new DocumentStore(),
        index: otherIndex,
        database: ops,
      });

      await expect(reloading.ingest(rows, { loadExisting: true })).rejects.toThrow(
        EmbeddingMismatchError
      );
    });
  });

  describe('createIngestPipeline', () => {
    it('wires the configured row policy around an injected embedder', async () => {
      const configured = await createIngestPipeline(
        { ...DEFAULT_CONFIG, ingest: { ...DEFAULT_CONFIG.ingest, on_malformed: 'skip' } },
        { embedder, database: ops, logger }
      );

      const result = await configured.ingest([...rows, { product_title: 'Toaster' }]);

      expect(result.documentCount).toBe(3);
      expect(result.skippedCount).toBe(1);
      expect(ops.getIndexMeta()?.embeddingModel).toBe('vocab-v1');
    });
  });
});
