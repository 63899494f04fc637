/**
 * Tests for config command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import { join } from 'node:path';
import chalk from 'chalk';
import { createConfigCommand } from '../config.js';
import { loadConfig } from '../../../config/loader.js';
import { createTestContext, removeTempHome, runCommand, useTempHome, type TestContext } from './helpers.js';

describe('createConfigCommand', () => {
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
    process.exitCode = undefined;
  });

  it('registers its subcommands', () => {
    const names = createConfigCommand(() => test.ctx).commands.map((c) => c.name());
    expect(names).toEqual(['get', 'set', 'list', 'path', 'reset']);
  });

  it('gets a value', async () => {
    await runCommand(createConfigCommand(() => test.ctx), ['get', 'embedding.model']);

    expect(test.logs).toEqual(['text-embedding-3-small']);
  });

  it('reports unknown keys on get', async () => {
    await runCommand(createConfigCommand(() => test.ctx), ['get', 'retrieval.depth']);

    expect(test.errors).toEqual(['Unknown config key: retrieval.depth']);
    expect(process.exitCode).toBe(1);
  });

  it('sets a numeric value and persists it', async () => {
    await runCommand(createConfigCommand(() => test.ctx), ['set', 'retrieval.top_k', '5']);

    expect(test.logs).toEqual(['✓ Set retrieval.top_k = 5']);
    expect(loadConfig().retrieval.top_k).toBe(5);
  });

  it('reminds to re-ingest after changing the embedding model', async () => {
    await runCommand(createConfigCommand(() => test.ctx), [
      'set',
      'embedding.model',
      'nomic-embed-text',
    ]);

    expect(test.logs).toEqual([
      '✓ Set embedding.model = nomic-embed-text',
      'The review index must be rebuilt: radv ingest <reviews.csv>',
    ]);
  });

  it('rejects a value the schema does not allow', async () => {
    await runCommand(createConfigCommand(() => test.ctx), ['set', 'retrieval.top_k', '0']);

    expect(test.errors[0]).toContain("Invalid value for 'retrieval.top_k'");
    expect(process.exitCode).toBe(1);
    expect(loadConfig().retrieval.top_k).toBe(3);
  });

  it('prints the config path', async () => {
    await runCommand(createConfigCommand(() => test.ctx), ['path']);

    expect(test.logs).toEqual([join(home, 'config.toml')]);
  });

  it('requires --force to reset', async () => {
    await runCommand(createConfigCommand(() => test.ctx), ['set', 'retrieval.top_k', '5']);

    await runCommand(createConfigCommand(() => test.ctx), ['reset']);
    expect(process.exitCode).toBe(1);
    expect(loadConfig().retrieval.top_k).toBe(5);

    await runCommand(createConfigCommand(() => test.ctx), ['reset', '--force']);
    expect(loadConfig().retrieval.top_k).toBe(3);
    expect(fs.readFileSync(join(home, 'config.toml'), 'utf-8')).toContain('# Review Advisor Configuration');
  });
});
