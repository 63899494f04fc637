/**
 * Search Command
 *
 * Retrieval only: embeds the query and prints the most similar reviews,
 * without calling the LLM.
 *
 *   radv search "quiet blender"
 *   radv search "kettle that lasts" --top 5 --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { runMigrations, getDatabase } from '../../database/index.js';
import { loadConfig } from '../../config/loader.js';
import { createEmbeddingProvider } from '../../providers/index.js';
import {
  createVectorIndex,
  Retriever,
  formatPassages,
  formatPassagesJSON,
} from '../../search/index.js';
import { CLIError } from '../../errors/index.js';

// ============================================================================
// Types
// ============================================================================

interface SearchCommandOptions {
  /** Number of results (default: retrieval.top_k) */
  top?: string;
}

// ============================================================================
// Constants
// ============================================================================

const MAX_TOP_K = 50;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Parse and validate the --top option.
 *
 * @throws CLIError if invalid
 */
export function parseTopK(topStr: string): number {
  const topK = Number(topStr);

  if (!Number.isInteger(topK) || topK < 1) {
    throw new CLIError(
      `Invalid --top value: "${topStr}"`,
      `Must be a positive integer (1-${MAX_TOP_K})`
    );
  }

  if (topK > MAX_TOP_K) {
    throw new CLIError(`--top value too large: ${topK}`, `Maximum allowed is ${MAX_TOP_K}`);
  }

  return topK;
}

function displayEmptyResults(ctx: CommandContext, query: string): void {
  ctx.log(chalk.yellow(`No reviews found for "${query}"`));
  ctx.log('');
  ctx.log(chalk.dim('Tips:'));
  ctx.log(chalk.dim('  - Describe the product or the quality you care about'));
  ctx.log(chalk.dim('  - Lower retrieval.min_score if it is set'));
}

// ============================================================================
// Command Factory
// ============================================================================

export function createSearchCommand(getContext: () => CommandContext): Command {
  return new Command('search')
    .argument('<query>', 'Search query text')
    .description('Find the reviews most similar to a query')
    .option('-k, --top <number>', 'Number of results to return')
    .action(async (query: string, cmdOptions: SearchCommandOptions) => {
      const ctx = getContext();

      const trimmedQuery = query.trim();
      if (!trimmedQuery) {
        throw new CLIError(
          'Search query cannot be empty',
          'Provide a search term, e.g.: radv search "quiet blender"'
        );
      }

      const config = loadConfig();
      const topK = cmdOptions.top !== undefined ? parseTopK(cmdOptions.top) : config.retrieval.top_k;
      ctx.debug(`Query: "${trimmedQuery}", top-k: ${topK}`);

      // ─────────────────────────────────────────────────────────────────────
      // Load the persisted index
      // ─────────────────────────────────────────────────────────────────────
      runMigrations();
      const embedder = await createEmbeddingProvider(config.embedding);
      const index = createVectorIndex(embedder, config.embedding, ctx);
      const loaded = index.loadPersisted(getDatabase());
      if (loaded === 0) {
        throw new CLIError('No reviews indexed', 'Run: radv ingest <reviews.csv>  to build the index');
      }
      ctx.debug(`Loaded ${loaded} reviews (${embedder.name}/${embedder.model})`);

      // ─────────────────────────────────────────────────────────────────────
      // Search and output
      // ─────────────────────────────────────────────────────────────────────
      const searchStart = performance.now();
      const passages = await new Retriever(index, {
        topK,
        minScore: config.retrieval.min_score,
      }).search(trimmedQuery);
      ctx.debug(`Found ${passages.length} results in ${Math.round(performance.now() - searchStart)}ms`);

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            { query: trimmedQuery, count: passages.length, results: formatPassagesJSON(passages) },
            null,
            2
          )
        );
      } else if (passages.length === 0) {
        displayEmptyResults(ctx, trimmedQuery);
      } else {
        ctx.log(
          chalk.bold(`Found ${passages.length} review${passages.length === 1 ? '' : 's'}`) +
            chalk.dim(` for "${trimmedQuery}"`)
        );
        ctx.log('');
        ctx.log(formatPassages(passages));
      }
    });
}
