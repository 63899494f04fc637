/**
 * Tests for status command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import chalk from 'chalk';
import { createStatusCommand, formatBytes } from '../status.js';
import { createVocabularyEmbedder } from '../../../test-utils/index.js';
import {
  VOCABULARY,
  createTestContext,
  removeTempHome,
  runCommand,
  seedReviews,
  useTempHome,
  type TestContext,
} from './helpers.js';

describe('formatBytes', () => {
  it('formats zero', () => {
    expect(formatBytes(0)).toBe('0 Bytes');
  });

  it('picks the largest whole unit', () => {
    expect(formatBytes(512)).toBe('512 Bytes');
    expect(formatBytes(1024)).toBe('1 KB');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5 MB');
  });
});

describe('createStatusCommand', () => {
  let home: string;
  let test: TestContext;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    chalk.level = 0;
    home = useTempHome();
    test = createTestContext();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    removeTempHome(home);
  });

  it('suggests ingesting when the index is empty', async () => {
    await runCommand(createStatusCommand(() => test.ctx), []);

    const lines = (test.logs[0] ?? '').split('\n');
    expect(lines[0]).toBe('Review Advisor Status');
    expect(lines).toContain('Reviews:      0');
    expect(lines).toContain('No reviews indexed.');
  });

  it('shows counts and flags an index built with another embedding model', async () => {
    await seedReviews(createVocabularyEmbedder(VOCABULARY));

    await runCommand(createStatusCommand(() => test.ctx), []);

    const lines = (test.logs[0] ?? '').split('\n');
    expect(lines).toContain('Reviews:      2');
    expect(lines).toContain('Products:     2');
    expect(lines).toContain('Source:       reviews.csv');
    expect(lines).toContain('Embeddings:   text-embedding-3-small (openai)');
    expect(lines).toContain(
      'Index was built with fake/vocab-v1; the configured model is openai/text-embedding-3-small.'
    );
  });

  it('outputs JSON with --json', async () => {
    await seedReviews(createVocabularyEmbedder(VOCABULARY));
    const jsonTest = createTestContext({ json: true });

    await runCommand(createStatusCommand(() => jsonTest.ctx), []);

    const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output.reviews).toBe(2);
    expect(output.products).toBe(2);
    expect(output.index).toMatchObject({
      embeddingProvider: 'fake',
      embeddingModel: 'vocab-v1',
      dimensions: 4,
      source: 'reviews.csv',
      matchesConfig: false,
    });
    expect(output.database.path).toBe(join(home, 'advisor.db'));
    expect(output.config.path).toBe(join(home, 'config.toml'));
    expect(test.logs).toEqual([]);
  });
});
