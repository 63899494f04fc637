/**
 * LocalVectorIndex Tests
 *
 * Uses a bag-of-words embedder so scores can be worked out by hand.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { LocalVectorIndex, embeddingText } from '../vector-index.js';
import { EmbeddingMismatchError } from '../errors.js';
import { DocumentStore } from '../../documents/index.js';
import { EmbeddingUnavailableError } from '../../errors/index.js';
import type { DatabaseOperations } from '../../database/index.js';
import {
  createTestDatabase,
  createVocabularyEmbedder,
  type VocabularyEmbedder,
} from '../../test-utils/index.js';

const VOCABULARY = ['kettle', 'blender', 'quiet', 'loud', 'ice'];

const documents = new DocumentStore().load([
  { product_title: 'Kettle', review: 'quiet and fast', rating: '5' },
  { product_title: 'Blender', review: 'loud but crushes ice' },
  { product_title: 'Blender', review: 'quiet enough' },
]);

function doc(i: number) {
  const found = documents[i];
  if (!found) throw new Error(`no document ${i}`);
  return found;
}

describe('LocalVectorIndex', () => {
  let embedder: VocabularyEmbedder;
  let index: LocalVectorIndex;

  beforeEach(() => {
    embedder = createVocabularyEmbedder(VOCABULARY);
    index = new LocalVectorIndex(embedder);
  });

  describe('upsert', () => {
    it('embeds title and review together', async () => {
      await index.upsert([doc(0)]);

      expect(embedder.calls).toEqual([['Kettle: quiet and fast']]);
      expect(embeddingText(doc(0))).toBe('Kettle: quiet and fast');
    });

    it('embeds in batches and reports progress', async () => {
      const batched = new LocalVectorIndex(embedder, { batchSize: 2 });
      const onProgress = vi.fn();

      await batched.upsert(documents, { onProgress });

      expect(embedder.calls.map((batch) => batch.length)).toEqual([2, 1]);
      expect(onProgress.mock.calls).toEqual([
        [{ embedded: 2, total: 3 }],
        [{ embedded: 3, total: 3 }],
      ]);
      expect(batched.count()).toBe(3);
      expect(batched.dimensions).toBe(5);
    });

    it('replaces documents with the same id in place', async () => {
      await index.upsert(documents);
      await index.upsert([doc(0)]);

      expect(index.count()).toBe(3);
      expect(index.documents().map((d) => d.id)).toEqual(documents.map((d) => d.id));
    });

    it('leaves the index unchanged when embedding fails', async () => {
      await index.upsert([doc(0)]);
      embedder.failWith(new Error('boom'));

      await expect(index.upsert([doc(1), doc(2)])).rejects.toThrow('Embedding failed: boom');
      expect(index.count()).toBe(1);
    });

    it('rejects embeddings whose dimensions differ from the index', async () => {
      let width = 2;
      const shifting = new LocalVectorIndex({
        ...embedder,
        embedBatch: async (texts: string[]) => texts.map(() => new Array<number>(width).fill(1)),
      });
      await shifting.upsert([doc(0)]);
      width = 3;

      await expect(shifting.upsert([doc(1)])).rejects.toThrow(
        `Embedding for ${doc(1).id} has 3 dimensions, index expects 2`
      );
      expect(shifting.count()).toBe(1);
    });
  });

  describe('nearest', () => {
    beforeEach(async () => {
      await index.upsert(documents);
    });

    it('orders by cosine similarity', async () => {
      const hits = await index.nearest(await index.embed('quiet kettle'), 3);

      expect(hits.map((h) => h.document.id)).toEqual([doc(0).id, doc(2).id, doc(1).id]);
      expect(hits[0]?.score).toBeCloseTo(1, 10);
      expect(hits[1]?.score).toBeCloseTo(0.5, 10);
      expect(hits[2]?.score).toBe(0);
    });

    it('returns at most k results', async () => {
      const hits = await index.nearest(await index.embed('blender'), 1);
      expect(hits).toHaveLength(1);
    });

    it('keeps insertion order for equal scores', async () => {
      const hits = await index.nearest(await index.embed('nothing relevant'), 3);

      expect(hits.map((h) => h.document.id)).toEqual(documents.map((d) => d.id));
      expect(hits.every((h) => h.score === 0)).toBe(true);
    });

    it('returns nothing for k <= 0 or an empty index', async () => {
      expect(await index.nearest([1, 0, 0, 0, 0], 0)).toEqual([]);
      index.clear();
      expect(await index.nearest([1, 0, 0, 0, 0], 3)).toEqual([]);
    });

    it('rejects query vectors of the wrong dimensionality', async () => {
      await expect(index.nearest([1, 0], 3)).rejects.toBeInstanceOf(EmbeddingMismatchError);
      await expect(index.nearest([1, 0], 3)).rejects.toThrow(
        'Query vector has 2 dimensions, index expects 5'
      );
    });
  });

  describe('embed', () => {
    it('times out slow embedding requests', async () => {
      const slow = new LocalVectorIndex(
        { ...embedder, embedBatch: () => new Promise<number[][]>(() => {}) },
        { timeoutMs: 20 }
      );

      await expect(slow.embed('kettle')).rejects.toThrow(
        'fake embedding request timed out after 20ms'
      );
    });

    it('passes provider errors through unchanged', async () => {
      const providerError = new EmbeddingUnavailableError('fake returned an empty completion');
      embedder.failWith(providerError);

      await expect(index.embed('kettle')).rejects.toBe(providerError);
    });

    it('refuses to start when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(index.embed('kettle', { signal: controller.signal })).rejects.toThrow(
        'Embedding was aborted'
      );
      expect(embedder.calls).toEqual([]);
    });
  });

  describe('persistence', () => {
    let db: Database.Database;
    let ops: DatabaseOperations;

    beforeEach(() => {
      ({ db, ops } = createTestDatabase());
    });

    afterEach(() => {
      db.close();
    });

    it('reloads persisted documents without re-embedding', async () => {
      await index.upsert(documents);
      index.persist(ops, 'reviews.csv');

      const reloaded = new LocalVectorIndex(embedder);
      const callsBefore = embedder.calls.length;

      expect(reloaded.loadPersisted(ops)).toBe(3);
      expect(embedder.calls).toHaveLength(callsBefore);
      expect(reloaded.documents()).toEqual(documents);
      expect(reloaded.dimensions).toBe(5);
      expect(ops.getIndexMeta()?.source).toBe('reviews.csv');
    });

    it('answers queries the same way after a reload', async () => {
      await index.upsert(documents);
      index.persist(ops);
      const reloaded = new LocalVectorIndex(embedder);
      reloaded.loadPersisted(ops);

      const query = await index.embed('loud blender');
      const before = await index.nearest(query, 3);
      const after = await reloaded.nearest(query, 3);

      expect(after.map((h) => h.document.id)).toEqual(before.map((h) => h.document.id));
    });

    it('returns 0 when nothing was persisted', () => {
      expect(index.loadPersisted(ops)).toBe(0);
      expect(index.count()).toBe(0);
    });

    it('refuses vectors built with another embedding model', async () => {
      await index.upsert(documents);
      index.persist(ops);

      const other = new LocalVectorIndex(createVocabularyEmbedder(VOCABULARY, { model: 'vocab-v2' }));

      expect(() => other.loadPersisted(ops)).toThrow(
        'Persisted index was built with fake/vocab-v1, the configured embedding model is fake/vocab-v2'
      );
      expect(other.count()).toBe(0);
    });
  });
});
