/**
 * Tests for ingest command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import chalk from 'chalk';
import { createIngestCommand } from '../ingest.js';
import * as providers from '../../../providers/index.js';
import { getDatabase } from '../../../database/index.js';
import { FileNotFoundError } from '../../../errors/index.js';
import { createVocabularyEmbedder, type VocabularyEmbedder } from '../../../test-utils/index.js';
import {
  VOCABULARY,
  createTestContext,
  removeTempHome,
  runCommand,
  useTempHome,
  type TestContext,
} from './helpers.js';

vi.mock('../../../providers/index.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../providers/index.js')>()),
  createEmbeddingProvider: vi.fn(),
}));

const CSV = 'product_title,review,rating\nBlender,Quiet blender,5\nKettle,Loud kettle,2\n';

describe('createIngestCommand', () => {
  let home: string;
  let csvPath: string;
  let embedder: VocabularyEmbedder;
  let test: TestContext;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  const printed = (): string[] => consoleLogSpy.mock.calls.map((call) => String(call[0]));

  beforeEach(() => {
    chalk.level = 0;
    home = useTempHome();
    csvPath = join(home, 'reviews.csv');
    writeFileSync(csvPath, CSV, 'utf-8');
    embedder = createVocabularyEmbedder(VOCABULARY);
    vi.mocked(providers.createEmbeddingProvider).mockResolvedValue(embedder);
    test = createTestContext();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    removeTempHome(home);
    vi.clearAllMocks();
  });

  it('has the expected name and options', () => {
    const command = createIngestCommand(() => test.ctx);

    expect(command.name()).toBe('ingest');
    expect(command.options.map((o) => o.long)).toEqual(['--load-existing']);
  });

  it('embeds every row and persists the index', async () => {
    await runCommand(createIngestCommand(() => test.ctx), [csvPath]);

    expect(printed().slice(0, 9)).toEqual([
      'Reading...',
      'Reading complete: 2 rows read',
      'Embedding...',
      'Embedding complete: 2 reviews embedded',
      '',
      'Ingest Complete ✓',
      '',
      '  Reviews indexed:  2',
      '  Dimensions:       4',
    ]);
    expect(getDatabase().countDocuments()).toBe(2);
    expect(getDatabase().getIndexMeta()?.source).toBe(csvPath);
  });

  it('reuses the persisted index with --load-existing', async () => {
    await runCommand(createIngestCommand(() => test.ctx), [csvPath]);
    const embedCalls = embedder.calls.length;
    consoleLogSpy.mockClear();

    await runCommand(createIngestCommand(() => test.ctx), [csvPath, '--load-existing']);

    expect(printed().slice(0, 4)).toEqual([
      'Reading...',
      'Reading complete: 2 rows read',
      '',
      'Index Loaded ✓',
    ]);
    expect(embedder.calls).toHaveLength(embedCalls);
  });

  it('emits NDJSON events with --json', async () => {
    const jsonTest = createTestContext({ json: true });

    await runCommand(createIngestCommand(() => jsonTest.ctx), [csvPath]);

    const events = printed().map((line) => JSON.parse(line));
    expect(events.map((e: { type: string }) => e.type)).toEqual([
      'stage_start',
      'stage_complete',
      'stage_start',
      'stage_progress',
      'stage_complete',
      'complete',
    ]);
    expect(events.at(-1).data.result).toMatchObject({ mode: 'rebuilt', documentCount: 2 });
  });

  it('fails for a missing file', async () => {
    const command = createIngestCommand(() => test.ctx);

    await expect(runCommand(command, [join(home, 'missing.csv')])).rejects.toThrow(FileNotFoundError);
  });
});
