import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { createAdvisor } from '../factory.js';
import { FALLBACK_RESPONSE } from '../orchestrator.js';
import { IngestPipeline } from '../../ingest/pipeline.js';
import { DocumentStore } from '../../documents/index.js';
import { LocalVectorIndex } from '../../search/vector-index.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import type { DatabaseOperations } from '../../database/index.js';
import {
  ScriptedGenerator,
  createTestDatabase,
  createVocabularyEmbedder,
  generatorDown,
} from '../../test-utils/index.js';

const VOCABULARY = ['kettle', 'blender', 'quiet', 'loud'];

describe('createAdvisor', () => {
  let db: Database.Database;
  let ops: DatabaseOperations;

  beforeEach(() => {
    ({ db, ops } = createTestDatabase());
  });

  afterEach(() => {
    db.close();
  });

  async function seed(): Promise<void> {
    const pipeline = new IngestPipeline({
      documents: new DocumentStore(),
      index: new LocalVectorIndex(createVocabularyEmbedder(VOCABULARY)),
      database: ops,
    });
    await pipeline.ingest([
      { product_title: 'Kettle', review: 'quiet' },
      { product_title: 'Blender', review: 'loud' },
    ]);
  }

  it('loads the persisted index and answers grounded turns', async () => {
    await seed();
    const generator = new ScriptedGenerator('Get the kettle.');

    const advisor = await createAdvisor(DEFAULT_CONFIG, {
      database: ops,
      embedder: createVocabularyEmbedder(VOCABULARY),
      generator,
    });
    const result = await advisor.orchestrator.runTurn('t1', 'quiet kettle');

    expect(advisor.indexedCount).toBe(2);
    expect(advisor.usedFallback).toBe(false);
    expect(result.response).toBe('Get the kettle.');
    expect(result.passages.map((p) => p.document.productTitle)).toEqual(['Kettle']);
    expect(generator.calls[0]?.options?.maxTokens).toBe(DEFAULT_CONFIG.generation.max_tokens);
  });

  it('warns when nothing is indexed', async () => {
    const logger = { warn: vi.fn() };

    const advisor = await createAdvisor(DEFAULT_CONFIG, {
      database: ops,
      embedder: createVocabularyEmbedder(VOCABULARY),
      generator: new ScriptedGenerator(),
      logger,
    });

    expect(advisor.indexedCount).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith(
      'No reviews are indexed yet; answers will not be based on reviews'
    );
    const result = await advisor.orchestrator.runTurn('t1', 'quiet kettle');
    expect(result.retrievalStatus).toBe('unavailable');
  });

  it('summarizes with the same generator using the configured thresholds', async () => {
    const generator = new ScriptedGenerator('answer');
    const config = {
      ...DEFAULT_CONFIG,
      conversation: { ...DEFAULT_CONFIG.conversation, summarize_threshold: 4, retain_tail: 2 },
    };
    const advisor = await createAdvisor(config, {
      database: ops,
      embedder: createVocabularyEmbedder(VOCABULARY),
      generator,
    });

    await advisor.orchestrator.handleTurn('t1', 'first');
    const second = await advisor.orchestrator.runTurn('t1', 'second');

    expect(second.summarization).toBe('summarized');
    expect(advisor.conversations.getThread('t1')?.summary).toBe('answer');
    expect(generator.calls).toHaveLength(3);
    expect(generator.calls[2]?.options?.maxTokens).toBe(DEFAULT_CONFIG.conversation.summary_max_tokens);
  });

  it('keeps answering with the fallback when the generator is down', async () => {
    const advisor = await createAdvisor(DEFAULT_CONFIG, {
      database: ops,
      embedder: createVocabularyEmbedder(VOCABULARY),
      generator: new ScriptedGenerator(generatorDown()),
    });

    expect(await advisor.orchestrator.handleTurn('t1', 'quiet kettle')).toBe(FALLBACK_RESPONSE);
  });
});
