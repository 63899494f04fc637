/**
 * Shared setup for command tests.
 *
 * Commands read config and the database from RADV_HOME, so each test gets
 * a fresh temporary directory and a seeded review index.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Command } from 'commander';
import { vi } from 'vitest';
import type { CommandContext, GlobalOptions } from '../../types.js';
import { loadConfig } from '../../../config/loader.js';
import { runMigrations, getDatabase } from '../../../database/index.js';
import { createIngestPipeline } from '../../../ingest/index.js';
import type { EmbeddingProvider } from '../../../providers/index.js';
import { resetAll } from '../../../test-utils/index.js';

export const VOCABULARY = ['blender', 'kettle', 'quiet', 'loud'];

/**
 * "Blender: Quiet blender" embeds to [2, 0, 1, 0] and
 * "Kettle: Loud kettle" to [0, 2, 0, 1].
 */
export const REVIEW_ROWS = [
  { product_title: 'Blender', review: 'Quiet blender', rating: '5' },
  { product_title: 'Kettle', review: 'Loud kettle', rating: '2' },
];

export interface TestContext {
  ctx: CommandContext;
  logs: string[];
  warnings: string[];
  errors: string[];
}

export function createTestContext(options: Partial<GlobalOptions> = {}): TestContext {
  const logs: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];
  return {
    logs,
    warnings,
    errors,
    ctx: {
      options: { verbose: false, json: false, ...options },
      log: (message) => logs.push(message),
      debug: vi.fn(),
      warn: (message) => warnings.push(message),
      error: (message) => errors.push(message),
    },
  };
}

export function useTempHome(): string {
  const dir = mkdtempSync(join(tmpdir(), 'radv-cli-'));
  process.env.RADV_HOME = dir;
  return dir;
}

export function removeTempHome(dir: string): void {
  resetAll();
  delete process.env.RADV_HOME;
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Ingest REVIEW_ROWS into the RADV_HOME database.
 */
export async function seedReviews(embedder: EmbeddingProvider): Promise<void> {
  runMigrations();
  const pipeline = await createIngestPipeline(loadConfig(), {
    embedder,
    database: getDatabase(),
  });
  await pipeline.ingest(REVIEW_ROWS, { source: 'reviews.csv' });
}

/**
 * Parse `args` as if typed after the command name.
 */
export async function runCommand(command: Command, args: string[]): Promise<void> {
  command.exitOverride();
  await command.parseAsync(args, { from: 'user' });
}
