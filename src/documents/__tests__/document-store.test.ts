/**
 * DocumentStore Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { DocumentStore, createDocumentStore, documentId } from '../document-store.js';
import { MalformedRecordError } from '../../errors/index.js';
import type { RawReviewRow } from '../types.js';

const rows: RawReviewRow[] = [
  { product_title: 'Kettle', review: 'Boils fast and quietly', rating: '5' },
  { product_title: 'Blender', review: '  Crushes ice  ', rating: 4, verified: true },
  { product_title: 'Kettle', review: 'Lid broke after a month', rating: '' },
];

describe('DocumentStore.load', () => {
  it('produces one document per row in input order', () => {
    const docs = new DocumentStore().load(rows);

    expect(docs.map((d) => d.productTitle)).toEqual(['Kettle', 'Blender', 'Kettle']);
    expect(docs.map((d) => d.reviewText)).toEqual([
      'Boils fast and quietly',
      'Crushes ice',
      'Lid broke after a month',
    ]);
  });

  it('keeps other non-empty columns as string metadata', () => {
    const docs = new DocumentStore().load(rows);

    expect(docs[0]?.sourceMetadata).toEqual({ rating: '5' });
    expect(docs[1]?.sourceMetadata).toEqual({ rating: '4', verified: 'true' });
    expect(docs[2]?.sourceMetadata).toEqual({});
  });

  it('is deterministic across calls', () => {
    const store = new DocumentStore();
    expect(store.load(rows)).toEqual(store.load(rows));
  });

  it('derives ids from position and content', () => {
    const docs = new DocumentStore().load(rows);

    expect(docs[0]?.id).toBe(documentId(0, 'Kettle', 'Boils fast and quietly'));
    expect(docs[0]?.id).toMatch(/^rev-[0-9a-f]{16}$/);
    expect(new Set(docs.map((d) => d.id)).size).toBe(3);
  });

  it('gives duplicate reviews at different positions different ids', () => {
    const same = { product_title: 'Kettle', review: 'Great' };
    const [a, b] = new DocumentStore().load([same, same]);
    expect(a?.id).not.toBe(b?.id);
  });

  it('returns frozen documents', () => {
    const [doc] = new DocumentStore().load(rows);
    expect(Object.isFrozen(doc)).toBe(true);
    expect(Object.isFrozen(doc?.sourceMetadata)).toBe(true);
  });

  it('returns an empty array for no rows', () => {
    expect(new DocumentStore().load([])).toEqual([]);
  });

  it('honours custom field names', () => {
    const store = new DocumentStore({ titleField: 'name', reviewField: 'body' });
    const [doc] = store.load([{ name: 'Toaster', body: 'Even browning' }]);

    expect(doc?.productTitle).toBe('Toaster');
    expect(doc?.reviewText).toBe('Even browning');
    expect(doc?.sourceMetadata).toEqual({});
  });
});

describe('malformed rows', () => {
  const mixed: RawReviewRow[] = [
    { product_title: 'Kettle', review: 'Boils fast' },
    { product_title: '   ', review: 'No title here' },
    { product_title: 'Blender' },
    { rating: '3' },
  ];

  it('rejects the whole batch by default, listing every bad row', () => {
    try {
      new DocumentStore().load(mixed);
      expect.unreachable('load should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedRecordError);
      if (error instanceof MalformedRecordError) {
        expect(error.message).toBe('3 of 4 review rows are malformed');
        expect(error.issues).toEqual([
          { row: 2, reason: 'missing product_title' },
          { row: 3, reason: 'missing review' },
          { row: 4, reason: 'missing product_title, review' },
        ]);
        expect(error.code).toBe(7);
      }
    }
  });

  it('drops bad rows and reports them with the skip policy', () => {
    const onSkip = vi.fn();
    const docs = new DocumentStore({ onMalformed: 'skip', onSkip }).load(mixed);

    expect(docs.map((d) => d.reviewText)).toEqual(['Boils fast']);
    expect(onSkip).toHaveBeenCalledTimes(3);
    expect(onSkip).toHaveBeenNthCalledWith(1, { row: 2, reason: 'missing product_title' });
  });

  it('keeps ids stable for surviving rows when others are skipped', () => {
    const docs = new DocumentStore({ onMalformed: 'skip' }).load(mixed);
    expect(docs[0]?.id).toBe(documentId(0, 'Kettle', 'Boils fast'));
  });
});

describe('createDocumentStore', () => {
  it('logs skipped rows as warnings', () => {
    const logger = { warn: vi.fn() };
    const store = createDocumentStore(
      { title_field: 'product_title', review_field: 'review', on_malformed: 'skip' },
      logger
    );

    store.load([{ product_title: 'Kettle' }]);

    expect(logger.warn).toHaveBeenCalledWith('Skipping row 1: missing review');
  });
});
