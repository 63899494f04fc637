/**
 * Ingest Command
 *
 * Builds the review index from a CSV export.
 *
 * Usage:
 *   radv ingest reviews.csv                  Embed every review and persist the index
 *   radv ingest reviews.csv --load-existing  Reuse persisted vectors if present
 *   radv ingest reviews.csv --json           Output progress as NDJSON
 *
 * The pipeline:
 * 1. Reading - Parse the CSV into rows
 * 2. Embedding - Normalize rows into reviews and embed them in batches
 * 3. Storing - Replace the persisted index in SQLite
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { createProgressReporter } from '../utils/progress.js';
import { loadConfig } from '../../config/loader.js';
import { runMigrations, getDatabase } from '../../database/index.js';
import { readReviewCsv, type CsvTable } from '../../documents/index.js';
import { createIngestPipeline, type IngestResult } from '../../ingest/index.js';
import { createEmbeddingProvider } from '../../providers/index.js';

interface IngestCommandOptions {
  loadExisting?: boolean;
}

export function createIngestCommand(getContext: () => CommandContext): Command {
  return new Command('ingest')
    .argument('<csv>', 'CSV file with one review per row')
    .description('Build the review index from a CSV file')
    .option('--load-existing', 'Reuse the persisted index instead of re-embedding', false)
    .action(async (csv: string, cmdOptions: IngestCommandOptions) => {
      const ctx = getContext();
      const csvPath = resolve(csv);
      ctx.debug(`Ingesting: ${csvPath}`);

      runMigrations();
      const config = loadConfig();
      ctx.debug(`Embedding: ${config.embedding.model} (${config.embedding.provider})`);

      const reporter = createProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
      });

      // ─────────────────────────────────────────────────────────────────────
      // 1. Read rows
      // ─────────────────────────────────────────────────────────────────────
      reporter.startStage('reading');
      let table: CsvTable;
      try {
        table = await readReviewCsv(csvPath);
      } catch (error) {
        reporter.fail('Failed to read reviews');
        throw error;
      }
      const { rows } = table;
      reporter.completeStage(rows.length);

      // ─────────────────────────────────────────────────────────────────────
      // 2. Embed and store
      // ─────────────────────────────────────────────────────────────────────
      const embedder = await createEmbeddingProvider(config.embedding);
      const pipeline = await createIngestPipeline(config, {
        embedder,
        database: getDatabase(),
        logger: { warn: (message) => reporter.warn(message), debug: ctx.debug },
      });

      // --load-existing only embeds when nothing usable is persisted
      let embedding = false;
      const startEmbedding = () => {
        if (!embedding) {
          embedding = true;
          reporter.startStage('embedding', rows.length);
        }
      };
      if (!cmdOptions.loadExisting) {
        startEmbedding();
      }
      let result: IngestResult;
      try {
        result = await pipeline.ingest(rows, {
          loadExisting: cmdOptions.loadExisting,
          source: csvPath,
          onProgress: ({ embedded }) => {
            startEmbedding();
            reporter.updateProgress(embedded);
          },
        });
      } catch (error) {
        reporter.fail('Ingestion failed');
        throw error;
      }
      if (embedding) {
        reporter.completeStage(result.documentCount);
      }

      reporter.showSummary(result);
      if (result.documentCount === 0 && !ctx.options.json) {
        ctx.log(chalk.yellow('No reviews were indexed. Check the CSV columns:'));
        ctx.log(chalk.dim(`  expected "${config.ingest.title_field}" and "${config.ingest.review_field}"`));
      }
    });
}
